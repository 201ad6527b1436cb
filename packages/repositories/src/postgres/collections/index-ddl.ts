import type { IndexSpec } from '@runmeta/protocol';

function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * Build an idempotent CREATE INDEX statement for a collection table.
 * Document fields map one-to-one onto column names.
 */
export function buildCreateIndexSql(table: string, spec: IndexSpec): string {
  const columns = spec.keys
    .map(([field, direction]) => `${quoteIdentifier(field)} ${direction === -1 ? 'DESC' : 'ASC'}`)
    .join(', ');

  return [
    'CREATE',
    spec.unique ? 'UNIQUE INDEX' : 'INDEX',
    'IF NOT EXISTS',
    quoteIdentifier(spec.name),
    'ON',
    quoteIdentifier(table),
    `(${columns})`,
  ].join(' ');
}
