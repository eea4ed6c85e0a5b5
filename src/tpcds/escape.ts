/**
 * Escape identifier for DuckDB using double quotes.
 * Always quotes, so reserved words and mixed case pass through unchanged.
 * Doubles any existing double quotes in the name.
 */
export function escapeDuckDBIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Escape string literal for DuckDB.
 * Doubles single quotes.
 */
export function escapeDuckDBLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
