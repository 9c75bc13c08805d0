/**
 * header field extraction — `| Key: Value |` lines of a dumped note.
 * recognized keys: Title, Date, Tags. other keys stay in the header untouched.
 */

import { ok, err, type Result } from "neverthrow";
import type { HeaderFields, NoteError } from "./schema.js";

export const HEADER_LINE_PATTERN = /^\|\s*(.*?):\s*(.*?)\s*\|/;

export function extractHeaderFields(lines: readonly string[], pattern: RegExp = HEADER_LINE_PATTERN): HeaderFields {
  let title = "";
  let date = "";
  const tags: string[] = [];

  for (const line of lines) {
    const match = pattern.exec(line);
    if (!match) continue;

    const key = (match[1] ?? "").trim();
    const value = (match[2] ?? "").trim();

    if (key === "Title") {
      title = value.replaceAll("#", "").trim();
    } else if (key === "Date") {
      date = value;
    } else if (key === "Tags") {
      tags.push(...value.split(","));
    }
  }

  return { title, date, tags };
}

const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];
const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const DUMP_DATE_PATTERN = /^([A-Za-z]{3}),\s+(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})\s+(\d{1,2}):(\d{2}):(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * `Fri, 01 Sep 2023 02:33:35` → `2023-09-01T02:33:35+00:00`.
 * the dump has no zone; the value is taken as UTC and only reformatted.
 */
export function normalizeDate(input: string, title = ""): Result<string, NoteError> {
  const fail = (message: string): Result<string, NoteError> =>
    err({ _tag: "note.date", title, message: `${message}: "${input}"` });

  const match = DUMP_DATE_PATTERN.exec(input.trim());
  if (!match) return fail("unrecognized date");

  const [, weekday = "", dayText = "", monthText = "", yearText = "", hourText = "", minuteText = "", secondText = ""] =
    match;

  if (!WEEKDAYS.includes(weekday.toLowerCase())) return fail("unknown weekday");
  const month = MONTHS.indexOf(monthText.toLowerCase());
  if (month === -1) return fail("unknown month");

  const year = Number(yearText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  const probe = new Date(Date.UTC(year, month, day, hour, minute, second));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month ||
    probe.getUTCDate() !== day ||
    probe.getUTCHours() !== hour ||
    probe.getUTCMinutes() !== minute ||
    probe.getUTCSeconds() !== second
  ) {
    return fail("date out of range");
  }

  return ok(
    `${pad(year, 4)}-${pad(month + 1)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}+00:00`,
  );
}
