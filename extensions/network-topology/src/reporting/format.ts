/**
 * Shared text helpers for the report renderers.
 */

/** Sanitize a string for use as a Mermaid node ID. */
export function sanitizeId(id: string): string {
  return id.replace(/[^a-zA-Z0-9_]/g, "_");
}

/** Truncate long labels. */
export function truncate(s: string, max = 40): string {
  return s.length > max ? s.slice(0, max - 1) + "…" : s;
}

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

/** Escape user-supplied names placed inside quoted Mermaid labels. */
export function escapeLabel(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ENTITIES[c] ?? c);
}

/** Escape a Markdown table cell. */
export function escapeCell(s: string): string {
  return s.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

/** Render a GitHub-flavored Markdown table. */
export function markdownTable(headers: string[], rows: string[][]): string[] {
  const lines = [
    `| ${headers.map(escapeCell).join(" | ")} |`,
    `| ${headers.map(() => "---").join(" | ")} |`,
  ];
  for (const row of rows) {
    lines.push(`| ${row.map(escapeCell).join(" | ")} |`);
  }
  return lines;
}

/** "✅" when everything is up, "⚠️" when some are, "❌" otherwise. */
export function statusIcon(up: number, total: number): string {
  if (up === total) return "✅";
  return up > 0 ? "⚠️" : "❌";
}
