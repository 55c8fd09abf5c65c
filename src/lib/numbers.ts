/**
 * Parses a user-supplied cell. Blank or partially numeric text ("12abc")
 * yields null rather than a silent 0.
 */
export function parseNumberOrNull(value: string | undefined): number | null {
  if (value == null || value.trim() === '') return null;
  const num = Number(value.trim());
  return Number.isFinite(num) ? num : null;
}

/**
 * Rounds to 6 decimal places (inventory quantity precision).
 */
export function roundQuantity(value: number): number {
  return parseFloat(value.toFixed(6));
}
