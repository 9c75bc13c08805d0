/**
 * helpers for errors crossing actor boundaries, where xstate hands them over
 * as `unknown`. errors in this codebase are tagged objects, not Error instances.
 */

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") {
    return e.message;
  }
  return String(e);
}

export function errorTag(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "_tag" in e && typeof e._tag === "string") {
    return e._tag;
  }
  return undefined;
}
