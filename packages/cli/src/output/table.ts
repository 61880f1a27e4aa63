import Table from 'cli-table3';

/**
 * Two-column key/value table with the labels in the first column.
 */
export function formatTable(rows: Array<[string, string]>): string {
  const table = new Table({ style: { head: [], border: [] } });
  for (const [label, value] of rows) {
    table.push({ [label]: value });
  }
  return table.toString();
}
