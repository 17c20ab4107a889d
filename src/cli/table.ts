// =============================================================================
// TYPES
// =============================================================================

export type TableSpec = {
  title?: string;
  headers: string[];
  /** Cells may span several lines; rows are padded to the tallest cell. */
  rows: string[][];
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderTable(table: TableSpec): string[] {
  const columnCount = table.headers.length;
  const cellLines = table.rows.map((row) =>
    Array.from({ length: columnCount }, (_, index) => (row[index] ?? "").split("\n")),
  );

  const widths = table.headers.map((header, index) =>
    columnWidth(
      cellLines.flatMap((row) => row[index]),
      header,
    ),
  );

  const lines: string[] = [];
  if (table.title) {
    lines.push(table.title);
  }
  lines.push(formatRow(table.headers, widths));
  lines.push(widths.map((width) => "-".repeat(width)).join("  "));

  for (const row of cellLines) {
    const height = Math.max(1, ...row.map((cell) => cell.length));
    for (let lineIndex = 0; lineIndex < height; lineIndex += 1) {
      lines.push(formatRow(row.map((cell) => cell[lineIndex] ?? ""), widths));
    }
  }

  return lines;
}

// =============================================================================
// UTILITIES
// =============================================================================

function formatRow(cells: string[], widths: number[]): string {
  return cells
    .map((cell, index) => pad(cell, widths[index]))
    .join("  ")
    .trimEnd();
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}
