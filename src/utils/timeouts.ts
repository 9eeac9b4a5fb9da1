/** Largest delay setTimeout honours; anything above it fires after 1ms */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export function clampTimeout(ms: number): number {
  return Math.min(ms, MAX_TIMEOUT_MS);
}
