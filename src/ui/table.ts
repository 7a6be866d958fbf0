import Table from 'cli-table3';

export function renderTable(head: string[], rows: string[][]): string {
  const table = new Table({ head, style: { head: ['cyan'] }, wordWrap: true });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function printTable(head: string[], rows: string[][]): void {
  console.log(renderTable(head, rows));
}
