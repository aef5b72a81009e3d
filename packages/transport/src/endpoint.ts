export const DEFAULT_API_URL = "https://api.telegram.org";

/** `{apiUrl}/bot{token}/{method}`, tolerating a trailing slash on the base URL. */
export function buildEndpoint(apiUrl: string, token: string, method: string): string {
  const base = apiUrl.replace(/\/+$/, "");
  return `${base}/bot${token}/${method}`;
}

/** Replace every occurrence of the token so it never reaches logs or error messages. */
export function redactToken(text: string, token: string): string {
  if (!token) return text;
  return text.split(token).join("<redacted>");
}
