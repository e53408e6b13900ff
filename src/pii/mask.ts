/**
 * Masking for detection reports. Distinct from redaction: a masked
 * value keeps its edges so a reader can tell findings apart.
 */

export const MASK_PLACEHOLDER = '***';

/**
 * Values of four characters or fewer are hidden completely; longer
 * values keep their first two and last two characters.
 */
export function maskValue(value: string): string {
  if (value.length <= 4) return MASK_PLACEHOLDER;
  return value.slice(0, 2) + MASK_PLACEHOLDER + value.slice(-2);
}
