/**
 * Text truncation with a fixed marker
 */

export const TRUNCATED = '...<truncated>';
export const FURTHER_VALUES_TRUNCATED = '...<further values truncated>';

/**
 * Cut `text` to `limit` characters and append the marker when it is longer.
 * Text that already fits is returned unchanged.
 *
 * @example
 * truncate('SELECT * FROM users', 6) // "SELECT...<truncated>"
 * truncate('SELECT 1', 500) // "SELECT 1"
 */
export function truncate(text: string, limit: number, marker: string = TRUNCATED): string {
  if (text.length <= limit) {
    return text;
  }
  return text.slice(0, limit) + marker;
}
