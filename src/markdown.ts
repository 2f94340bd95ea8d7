// src/markdown.ts
// Minimal GitHub-flavored markdown helpers shared by the notes renderers.

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\r?\n/g, "<br>");
}

function row(cells: readonly string[]): string {
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

/**
 * Render a table; every row must be as wide as the header.
 * @param headers column titles
 * @param rows table body
 * @returns table lines joined by "\n", no trailing newline
 */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  if (headers.length === 0) throw new Error("Table needs at least one column");
  const lines = [row(headers), row(headers.map(() => "---"))];
  rows.forEach((cells, i) => {
    if (cells.length !== headers.length) {
      throw new Error(`Row ${i + 1} has ${cells.length} cells, expected ${headers.length}`);
    }
    lines.push(row(cells));
  });
  return lines.join("\n");
}

/** @returns `text` as an inline code span */
export function code(text: string): string {
  return text.includes("`") ? `\`\` ${text} \`\`` : `\`${text}\``;
}
