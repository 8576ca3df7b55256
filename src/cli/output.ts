/*
Purpose: shared stdout rendering for CLI commands (JSON or aligned text).
Assumptions: commands build plain data first; text rendering never changes the data.
Usage: emit(output, report, () => renderLines(report)).
*/

export type OutputOptions = {
  json: boolean;
};

export function emit(output: OutputOptions, value: unknown, renderText: () => string[]): void {
  if (output.json) {
    console.log(JSON.stringify(value, null, 2));
    return;
  }

  for (const line of renderText()) {
    console.log(line);
  }
}

export type TableColumn<Row> = {
  header: string;
  value: (row: Row) => string;
};

export function renderTable<Row>(rows: Row[], columns: TableColumn<Row>[]): string[] {
  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, index) =>
    columnWidth(
      cells.map((line) => line[index]),
      column.header,
    ),
  );

  const renderRow = (values: string[]): string =>
    values
      .map((value, index) => pad(value, widths[index]))
      .join("  ")
      .trimEnd();

  return [renderRow(columns.map((column) => column.header)), ...cells.map(renderRow)];
}

export function formatHours(hours: number | null): string {
  return hours === null ? "-" : `${hours}h`;
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}
