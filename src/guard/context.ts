/**
 * Numbered source lines around `line`, with a caret under `column` on the
 * offending line:
 *
 *    2 | Notes:
 *    3 > Data: x = (1
 *               ^
 */
export function renderErrorContext(source: string, line: number, column: number, radius = 5): string[] {
  const lines = source.split("\n");
  if (line < 1 || lines.length === 0) return [];

  const index = Math.min(line, lines.length) - 1;
  const start = Math.max(0, index - radius);
  const end = Math.min(lines.length, index + radius + 1);
  const width = String(end).length;

  const out: string[] = [];
  for (let i = start; i < end; i++) {
    const marker = i === index ? ">" : "|";
    const prefix = `${String(i + 1).padStart(width)} ${marker} `;
    out.push(`${prefix}${lines[i].replace(/\r$/, "")}`);
    if (i === index && column >= 1) out.push(" ".repeat(prefix.length + column - 1) + "^");
  }
  return out;
}
