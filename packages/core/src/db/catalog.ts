/**
 * Schema catalog construction and rendering for prompts.
 */

import type { SchemaCatalog, CatalogTable } from './types.js';

export interface ColumnRow {
  table_name: string;
  column_name: string;
}

/**
 * Group information_schema rows (already ordered by table, ordinal position)
 * into catalog entries. Table order follows first appearance.
 */
export function catalogFromColumnRows(rows: ColumnRow[], capturedAt: Date = new Date()): SchemaCatalog {
  const byTable = new Map<string, CatalogTable>();
  for (const row of rows) {
    let table = byTable.get(row.table_name);
    if (!table) {
      table = { name: row.table_name, columns: [] };
      byTable.set(row.table_name, table);
    }
    table.columns.push(row.column_name);
  }
  return { tables: Array.from(byTable.values()), capturedAt };
}

/** One `- table (col1, col2, ...)` line per table. */
export function renderCatalog(catalog: SchemaCatalog): string {
  return catalog.tables.map((t) => `- ${t.name} (${t.columns.join(', ')})`).join('\n');
}
