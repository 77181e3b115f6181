/**
 * Split comma-separated text into trimmed, non-empty pieces.
 *
 * @example
 * splitList('verheiratet,1 Kind') // => ['verheiratet', '1 Kind']
 * splitList('')                   // => []
 */
export function splitList(text: string): string[] {
  return text
    .split(',')
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);
}
