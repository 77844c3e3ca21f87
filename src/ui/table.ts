import Table from 'cli-table3';

export function printTable(head: string[], rows: string[][], emptyMessage?: string): void {
  if (rows.length === 0 && emptyMessage) {
    console.log(emptyMessage);
    return;
  }
  const table = new Table({ head, style: { head: ['cyan'] } });
  table.push(...rows);
  console.log(table.toString());
}
