/**
 * Helpers for Discord REST errors.
 */

/** Unknown Channel / Unknown Message: the resource is already gone. */
export const UNKNOWN_CHANNEL = 10003;
export const UNKNOWN_MESSAGE = 10008;

export function discordErrorCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const code = Number(error.code);
  return Number.isFinite(code) ? code : undefined;
}

/** `true` when deleting/editing failed only because the target no longer exists. */
export function isUnknownResource(error: unknown): boolean {
  const code = discordErrorCode(error);
  return code === UNKNOWN_CHANNEL || code === UNKNOWN_MESSAGE;
}
