import Table from 'cli-table3';

export type Colour = (text: string) => string;

/**
 * A titled table. Colours are applied by the caller so the table itself stays plain.
 */
export function renderTable(
  title: string,
  head: string[],
  rows: string[][],
  colour: Colour,
): string {
  const table = new Table({ head, style: { head: [], border: [] } });
  rows.forEach((row) => table.push(row.map((cell) => colour(cell))));
  return `${colour(title)}\n${table.toString()}`;
}
