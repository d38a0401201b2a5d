/** Counts code points, the unit SQLite's LENGTH() uses for text. */
export function charLength(text: string): number {
  return Array.from(text).length
}
