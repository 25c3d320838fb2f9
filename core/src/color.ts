/**
 * Color strings of the form "#RRGGBB" (case-insensitive) as sent by clients.
 * Anything after the first seven characters is ignored.
 */

const COLOR_PATTERN = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})/;

/**
 * Parses a color string into its three RGB bytes, or null if it does not
 * start with "#" followed by six hex digits.
 */
export function parseColor(value: string): Uint8Array | null {
  const match = COLOR_PATTERN.exec(value);
  if (!match) return null;
  return Uint8Array.of(
    Number.parseInt(match[1], 16),
    Number.parseInt(match[2], 16),
    Number.parseInt(match[3], 16),
  );
}
