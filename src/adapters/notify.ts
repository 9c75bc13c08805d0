/**
 * notification adapter — gotify-style webhook.
 * POST {url}/message?token=… with form fields title and message.
 * without url or token this is a logged no-op.
 */

import { ResultAsync, okAsync, errAsync } from "neverthrow";

export type NotifyError = { _tag: "notify.send"; url: string; message: string };

export interface NotifyOptions {
  url?: string;
  token?: string;
  fetch?: typeof fetch;
}

export function notificationEndpoint(url: string, token: string): string {
  const query = new URLSearchParams({ token });
  return `${url.replace(/\/+$/, "")}/message?${query.toString()}`;
}

export function sendNotification(
  options: NotifyOptions,
  title: string,
  message: string,
): ResultAsync<void, NotifyError> {
  const { url, token } = options;
  if (!url || !token) {
    console.log("notification url and/or token not configured, no notification was sent");
    return okAsync(undefined);
  }

  const doFetch = options.fetch ?? fetch;
  const endpoint = notificationEndpoint(url, token);
  const toError = (e: unknown): NotifyError => ({
    _tag: "notify.send",
    url,
    message: e instanceof Error ? e.message : String(e),
  });

  return ResultAsync.fromPromise(
    doFetch(endpoint, {
      method: "POST",
      body: new URLSearchParams({ title, message }),
    }),
    toError,
  ).andThen((response) =>
    ResultAsync.fromPromise(response.text(), toError).andThen((text) => {
      if (!response.ok) {
        return errAsync<void, NotifyError>({
          _tag: "notify.send",
          url,
          message: `notification endpoint returned ${response.status}: ${text}`,
        });
      }
      console.log(`notification sent: ${text}`);
      return okAsync<void, NotifyError>(undefined);
    }),
  );
}
