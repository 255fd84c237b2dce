export interface MarkdownTable {
  header: string[];
  rows: string[][];
}

function splitRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith("|")) row = row.slice(1);
  if (row.endsWith("|")) row = row.slice(0, -1);
  return row.split("|").map((cell) => cell.trim());
}

/**
 * Reads a pipe-delimited grid: the first line is the header, the second the
 * divider, the rest data rows. Data rows are cut or padded to the header
 * width.
 */
export function parseMarkdownTable(text: string): MarkdownTable {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) {
    return { header: [], rows: [] };
  }

  const header = splitRow(lines[0]);
  const rows = lines.slice(2).map((line) => {
    const values = splitRow(line);
    return header.map((_, column) => values[column] ?? "");
  });
  return { header, rows };
}
