// Identifier quoting for PostgreSQL
export function quoteIdent(id: string): string {
  return '"' + id.replaceAll('"', '""') + '"';
}

export function quoteLiteral(value: string): string {
  return "'" + value.replaceAll("'", "''") + "'";
}

export function qualify(schema: string, name: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(name)}`;
}

/** Splits "schema.table" (defaulting to public) into its parts. */
export function parseTableName(value: string): { schema: string; name: string } {
  const trimmed = value.trim();
  const dot = trimmed.indexOf('.');
  if (dot === -1) return { schema: 'public', name: trimmed };
  return { schema: trimmed.slice(0, dot), name: trimmed.slice(dot + 1) };
}
