// Substring pattern for LIKE/ILIKE. Backslash is Postgres's default escape.
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}
