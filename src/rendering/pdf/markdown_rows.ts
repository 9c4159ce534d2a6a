/**
 * Line-oriented Markdown reader for PDF layout.
 *
 * Supports headings, paragraphs, bullet/ordered lists, pipe tables, fenced
 * code and horizontal rules. Inline markup is stripped to plain text.
 */

export type Row =
  | { kind: "blank" }
  | { kind: "rule" }
  | { kind: "heading"; level: number; text: string; anchor: string }
  | { kind: "bullet"; marker: string; text: string; depth: number }
  | { kind: "text"; text: string }
  | { kind: "code"; text: string }
  | { kind: "table"; head: string[]; rows: string[][] };

export type HeadingRow = Extract<Row, { kind: "heading" }>;

export function markdownRows(input: string): Row[] {
  const out: Row[] = [];
  const anchors = new AnchorRegistry();
  let code = false;
  const lines = input.replace(/\r/g, "").split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trimEnd();
    if (/^\s*(```|~~~)/.test(line)) {
      code = !code;
      continue;
    }
    if (code) {
      out.push({ kind: "code", text: line.replace(/\t/g, "    ") });
      continue;
    }
    if (!line.trim()) {
      out.push({ kind: "blank" });
      continue;
    }
    if (/^\s*(?:-{3,}|\*{3,}|_{3,})\s*$/.test(line)) {
      out.push({ kind: "rule" });
      continue;
    }

    const table = markdownTable(lines, i);
    if (table) {
      out.push({ kind: "table", head: table.head, rows: table.rows });
      i = table.next - 1;
      continue;
    }

    const heading = line.match(/^\s{0,3}(#{1,6})\s+(.+?)\s*#*\s*$/);
    if (heading) {
      const text = cleanInline(heading[2]);
      out.push({
        kind: "heading",
        level: heading[1].length,
        text,
        anchor: anchors.next(text),
      });
      continue;
    }

    const bullet = line.match(/^(\s*)[-*+]\s+(.+)$/);
    if (bullet) {
      out.push({
        kind: "bullet",
        marker: "•",
        text: cleanInline(bullet[2]),
        depth: indentDepth(bullet[1]),
      });
      continue;
    }

    const ordered = line.match(/^(\s*)(\d+)[.)]\s+(.+)$/);
    if (ordered) {
      out.push({
        kind: "bullet",
        marker: `${ordered[2]}.`,
        text: cleanInline(ordered[3]),
        depth: indentDepth(ordered[1]),
      });
      continue;
    }

    out.push({ kind: "text", text: cleanInline(line) });
  }

  return out;
}

export function headingRows(rows: Row[]): HeadingRow[] {
  return rows.filter((row): row is HeadingRow => row.kind === "heading");
}

export interface OutlineEntry {
  level: number;
  text: string;
  anchor: string;
}

export function outlineEntries(headings: HeadingRow[]): OutlineEntry[] {
  return headings.map(({ level, text, anchor }) => ({ level, text, anchor }));
}

function indentDepth(indent: string): number {
  return Math.min(3, Math.floor(indent.replace(/\t/g, "  ").length / 2));
}

function markdownTable(lines: string[], start: number) {
  const headLine = lines[start]?.trim();
  const splitLine = lines[start + 1]?.trim();
  if (!headLine?.startsWith("|")) return;
  if (!splitLine || !isTableDivider(splitLine)) return;

  const head = tableCells(headLine);
  if (!head.length) return;

  const rows: string[][] = [];
  let next = start + 2;
  while (next < lines.length) {
    const row = lines[next].trim();
    if (!row.startsWith("|")) break;
    if (isTableDivider(row)) {
      next++;
      continue;
    }
    rows.push(tableCells(row));
    next++;
  }

  return { head, rows, next };
}

function tableCells(line: string): string[] {
  return line
    .split("|")
    .slice(1, -1)
    .map((item) => cleanInline(item.trim()));
}

function isTableDivider(line: string): boolean {
  return /^\|(?:\s*:?-{3,}:?\s*\|)+\s*$/.test(line);
}

export function cleanInline(input: string): string {
  return input
    .replace(/!\[[^\]]*\]\([^)]+\)/g, "")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1")
    .replace(/`{1,3}([^`]+)`{1,3}/g, "$1")
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/__(.*?)__/g, "$1")
    .replace(/(^|[\s(])\*([^*\n]+)\*(?=[\s).,:;!?]|$)/g, "$1$2")
    .replace(/(^|[\s(])_([^_\n]+)_(?=[\s).,:;!?]|$)/g, "$1$2")
    .replace(/^>\s?/, "");
}

/**
 * GitHub-style heading slugs; repeated headings get -1, -2 suffixes.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .replace(/\s+/g, "-");
}

class AnchorRegistry {
  private readonly seen = new Map<string, number>();

  next(text: string): string {
    const base = slugify(text) || "section";
    const count = this.seen.get(base) ?? 0;
    this.seen.set(base, count + 1);
    return count === 0 ? base : `${base}-${count}`;
  }
}
