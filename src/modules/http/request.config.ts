function parseTimeout(raw: string | undefined): number {
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 120000;
}

/**
 * Connection timeout applied to every outbound call. There is no retry.
 */
export const REQUEST_TIMEOUT_MS = parseTimeout(process.env.HTTP_TIMEOUT_MS);

export const JSON_HEADERS = {
  "Content-Type": "application/json",
};
