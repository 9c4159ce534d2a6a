/**
 * Markdown → PDF renderer built on pdf-lib standard fonts.
 *
 * Content pages are laid out first so every heading knows its page; the table
 * of contents is then inserted at the front with internal links, the same
 * headings become document bookmarks, and footers are stamped last so the
 * page count includes the TOC.
 */
import { readFile, stat } from "fs/promises";
import path from "path";
import {
  PDFDocument,
  PDFFont,
  PDFHexString,
  PDFName,
  PDFPage,
  StandardFonts,
} from "pdf-lib";
import {
  BlockError,
  IOError,
  RenderError,
  ValidationError,
  errorMessage,
} from "../../util/errors";
import { getLogger } from "../../util/logger";
import { sanitizeFilename, withExtension, writeFileAtomic } from "../files";
import {
  HeadingRow,
  markdownRows,
  OutlineEntry,
  outlineEntries,
  Row,
} from "./markdown_rows";
import { truncate, toWinAnsi, wrap } from "./text";
import { PAGE_HEIGHT, PAGE_WIDTH, PdfTheme, hex, resolveTheme } from "./themes";

const BAND_HEIGHT = 30;
const PRODUCER = "fundamental-report-blocks";
export const DEFAULT_TOC_TITLE = "Table of Contents";

export interface PdfSourceInput {
  content?: string | null;
  path?: string | null;
}

export type PdfSource = { kind: "content"; content: string } | { kind: "path"; path: string };

export interface PdfRenderOptions {
  title?: string;
  author?: string;
  theme?: string;
  includeToc: boolean;
  tocTitle?: string;
  /** A .pdf file path, or a directory that receives `outputFilename` */
  outputPath: string;
  outputFilename?: string;
}

export interface RenderedPdf {
  path: string;
  sizeBytes: number;
  pageCount: number;
  /** Entries of the generated table of contents; empty when include_toc is off */
  outline: OutlineEntry[];
  status: string;
}

type FontSet = {
  body: PDFFont;
  bold: PDFFont;
  heading: PDFFont;
  mono: PDFFont;
  ui: PDFFont;
};

type HeadingTarget = {
  row: HeadingRow;
  page: PDFPage;
  y: number;
};

/**
 * Exactly one of `content` or `path` must be given.
 */
export function resolvePdfSource(input: PdfSourceInput): PdfSource {
  const hasContent = typeof input.content === "string" && input.content.length > 0;
  const hasPath = typeof input.path === "string" && input.path.trim().length > 0;
  if (hasContent && hasPath) {
    throw new ValidationError("Provide either md_content or md_file_path, not both");
  }
  if (typeof input.content === "string" && hasContent) {
    return { kind: "content", content: input.content };
  }
  if (typeof input.path === "string" && hasPath) {
    return { kind: "path", path: input.path.trim() };
  }
  throw new ValidationError("Either md_content or md_file_path must be provided");
}

export function resolvePdfOutputPath(outputPath: string, outputFilename?: string): string {
  if (outputPath.toLowerCase().endsWith(".pdf")) return path.resolve(outputPath);
  const name = outputFilename?.trim() ? sanitizeFilename(outputFilename) : "document";
  return path.resolve(outputPath, withExtension(name, ".pdf"));
}

async function loadMarkdown(source: PdfSource): Promise<string> {
  if (source.kind === "content") return source.content;
  try {
    return await readFile(source.path, "utf8");
  } catch (err) {
    throw new IOError(`Cannot read Markdown file ${source.path}: ${errorMessage(err)}`, {
      path: source.path,
    });
  }
}

export async function renderMarkdownPdf(
  input: PdfSourceInput,
  options: PdfRenderOptions
): Promise<RenderedPdf> {
  const logger = getLogger("rendering/render_pdf");
  const source = resolvePdfSource(input);
  const theme = resolveTheme(options.theme);
  const markdown = await loadMarkdown(source);
  if (!markdown.trim()) {
    throw new ValidationError("Markdown content cannot be empty");
  }
  const target = resolvePdfOutputPath(options.outputPath, options.outputFilename);

  const rows = markdownRows(markdown);
  const firstH1 = rows.find(
    (row): row is HeadingRow => row.kind === "heading" && row.level === 1
  );
  const title = options.title?.trim() || firstH1?.text || "Document";

  let bytes: Uint8Array;
  let pageCount: number;
  let outline: OutlineEntry[] = [];
  try {
    const pdf = await PDFDocument.create();
    const fonts = await embedFonts(pdf, theme);
    const layout = new PageLayout(pdf, theme, fonts, title);
    const headings = layout.render(rows);

    if (options.includeToc && headings.length > 0) {
      insertToc(pdf, theme, fonts, headings, options.tocTitle || DEFAULT_TOC_TITLE, title);
      addBookmarks(pdf, headings);
      outline = outlineEntries(headings.map(({ row }) => row));
    }

    stampFooters(pdf, theme, fonts, title);

    pdf.setTitle(title);
    if (options.author?.trim()) pdf.setAuthor(options.author.trim());
    pdf.setProducer(PRODUCER);
    pdf.setCreator(PRODUCER);

    pageCount = pdf.getPageCount();
    bytes = await pdf.save();
  } catch (err) {
    if (err instanceof BlockError) throw err;
    throw new RenderError(`PDF generation failed: ${errorMessage(err)}`, {
      theme: theme.name,
    });
  }

  await writeFileAtomic(target, bytes);
  const sizeBytes = await fileSize(target);

  logger.info(
    { path: target, theme: theme.name, pageCount, sizeBytes, tocEntries: outline.length },
    "pdf written"
  );

  return {
    path: target,
    sizeBytes,
    pageCount,
    outline,
    status: `Successfully converted Markdown to PDF: ${target}`,
  };
}

async function fileSize(file: string): Promise<number> {
  try {
    return (await stat(file)).size;
  } catch (err) {
    throw new IOError(`Cannot stat written PDF ${file}: ${errorMessage(err)}`, { path: file });
  }
}

async function embedFonts(pdf: PDFDocument, theme: PdfTheme): Promise<FontSet> {
  const cache = new Map<StandardFonts, PDFFont>();
  const load = async (name: StandardFonts) => {
    const cached = cache.get(name);
    if (cached) return cached;
    const font = await pdf.embedFont(name);
    cache.set(name, font);
    return font;
  };
  return {
    body: await load(theme.fonts.body),
    bold: await load(theme.fonts.bold),
    heading: await load(theme.fonts.heading),
    mono: await load(theme.fonts.mono),
    ui: await load(StandardFonts.Helvetica),
  };
}

function contentTop(theme: PdfTheme): number {
  return PAGE_HEIGHT - theme.margin - (theme.headerBand ? BAND_HEIGHT : 0);
}

function contentBottom(theme: PdfTheme): number {
  return theme.margin;
}

function drawBand(page: PDFPage, theme: PdfTheme, fonts: FontSet, title: string) {
  if (!theme.headerBand) return;
  const top = PAGE_HEIGHT - theme.margin / 2;
  page.drawRectangle({
    x: theme.margin,
    y: top - BAND_HEIGHT + 8,
    width: PAGE_WIDTH - theme.margin * 2,
    height: BAND_HEIGHT - 8,
    color: theme.colors.heading,
  });
  page.drawRectangle({
    x: theme.margin,
    y: top - BAND_HEIGHT + 6,
    width: PAGE_WIDTH - theme.margin * 2,
    height: 2,
    color: theme.colors.accent,
  });
  const size = 9;
  page.drawText(truncate(toWinAnsi(title), PAGE_WIDTH - theme.margin * 2 - 16, fonts.ui, size), {
    x: theme.margin + 8,
    y: top - BAND_HEIGHT + 15,
    size,
    font: fonts.ui,
    color: hex("#FFFFFF"),
  });
}

class PageLayout {
  private page: PDFPage;
  private y: number;
  private readonly top: number;
  private readonly bottom: number;
  private readonly width: number;
  private readonly line: number;

  constructor(
    private readonly pdf: PDFDocument,
    private readonly theme: PdfTheme,
    private readonly fonts: FontSet,
    private readonly title: string
  ) {
    this.top = contentTop(theme);
    this.bottom = contentBottom(theme);
    this.width = PAGE_WIDTH - theme.margin * 2;
    this.line = theme.bodySize * theme.lineHeight;
    this.page = this.addPage();
    this.y = this.top;
  }

  render(rows: Row[]): HeadingTarget[] {
    const headings: HeadingTarget[] = [];
    rows.forEach((row) => {
      switch (row.kind) {
        case "blank":
          if (this.y < this.top) this.y -= this.line * 0.5;
          return;
        case "rule":
          this.rule();
          return;
        case "heading":
          headings.push(this.heading(row));
          return;
        case "bullet":
          this.bullet(row.marker, row.text, row.depth);
          return;
        case "code":
          this.code(row.text);
          return;
        case "table":
          this.table(row.head, row.rows);
          return;
        case "text":
          this.paragraph(row.text);
          return;
      }
    });
    return headings;
  }

  private addPage(): PDFPage {
    const page = this.pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    drawBand(page, this.theme, this.fonts, this.title);
    return page;
  }

  private ensure(space: number) {
    if (this.y - space >= this.bottom) return false;
    this.page = this.addPage();
    this.y = this.top;
    return true;
  }

  private rule() {
    this.ensure(12);
    const y = this.y - 4;
    this.page.drawLine({
      start: { x: this.theme.margin, y },
      end: { x: PAGE_WIDTH - this.theme.margin, y },
      thickness: 0.6,
      color: this.theme.colors.rule,
    });
    this.y -= 12;
  }

  private heading(row: HeadingRow): HeadingTarget {
    const { theme, fonts } = this;
    const size = theme.headingSizes[Math.min(row.level, 6) - 1];
    const leading = size * 1.25;
    const lines = wrap(toWinAnsi(row.text), this.width, fonts.heading, size);
    if (this.y < this.top) this.y -= size * 0.6;
    // keep the heading with at least two body lines
    this.ensure(lines.length * leading + this.line * 2);
    const anchorY = this.y;
    const color = row.level <= 2 ? theme.colors.heading : theme.colors.subheading;
    lines.forEach((text) => {
      this.y -= size;
      this.page.drawText(text, { x: theme.margin, y: this.y, size, font: fonts.heading, color });
      this.y -= leading - size;
    });
    if (theme.ruledLevels.includes(row.level)) {
      const y = this.y - 2;
      this.page.drawLine({
        start: { x: theme.margin, y },
        end: { x: PAGE_WIDTH - theme.margin, y },
        thickness: row.level === 1 ? 2 : 1,
        color: theme.colors.accent,
      });
      this.y -= 6;
    }
    this.y -= 4;
    return { row, page: this.page, y: anchorY };
  }

  private paragraph(text: string) {
    const { theme, fonts } = this;
    const lines = wrap(toWinAnsi(text), this.width, fonts.body, theme.bodySize);
    lines.forEach((value) => {
      this.ensure(this.line);
      this.y -= this.line;
      this.page.drawText(value, {
        x: theme.margin,
        y: this.y + (this.line - theme.bodySize) / 2,
        size: theme.bodySize,
        font: fonts.body,
        color: theme.colors.text,
      });
    });
  }

  private bullet(marker: string, text: string, depth: number) {
    const { theme, fonts } = this;
    const indent = 14 + depth * 14;
    const x = theme.margin + depth * 14;
    const lines = wrap(toWinAnsi(text), this.width - indent, fonts.body, theme.bodySize);
    lines.forEach((value, index) => {
      this.ensure(this.line);
      this.y -= this.line;
      const baseline = this.y + (this.line - theme.bodySize) / 2;
      if (index === 0) {
        this.page.drawText(toWinAnsi(marker), {
          x,
          y: baseline,
          size: theme.bodySize,
          font: fonts.bold,
          color: theme.colors.text,
        });
      }
      this.page.drawText(value, {
        x: theme.margin + indent,
        y: baseline,
        size: theme.bodySize,
        font: fonts.body,
        color: theme.colors.text,
      });
    });
  }

  private code(text: string) {
    const { theme, fonts } = this;
    const size = theme.bodySize - 1;
    const step = size * 1.45;
    const lines = text.trim() ? wrap(toWinAnsi(text), this.width - 8, fonts.mono, size) : [""];
    lines.forEach((value) => {
      this.ensure(step);
      this.y -= step;
      this.page.drawRectangle({
        x: theme.margin - 2,
        y: this.y,
        width: this.width + 4,
        height: step,
        color: theme.colors.codeBg,
      });
      if (value) {
        this.page.drawText(value, {
          x: theme.margin + 4,
          y: this.y + (step - size) / 2 + 1,
          size,
          font: fonts.mono,
          color: theme.colors.text,
        });
      }
    });
  }

  private table(head: string[], rows: string[][]) {
    const { theme, fonts } = this;
    const cols = Math.max(1, head.length, ...rows.map((cells) => cells.length));
    const col = this.width / cols;
    const pad = 4;
    const size = Math.max(8, theme.bodySize - 1);
    const textLine = size + 2;
    const normalize = (cells: string[]) =>
      Array.from({ length: cols }, (_, index) => toWinAnsi(cells[index] ?? ""));
    const cellLines = (cells: string[], font: PDFFont) =>
      normalize(cells).map((cell) => wrap(cell, col - pad * 2, font, size));
    const height = (lines: string[][]) =>
      Math.max(1, ...lines.map((cell) => cell.length)) * textLine + pad * 2;

    const draw = (cells: string[], isHead: boolean) => {
      const font = isHead ? fonts.bold : fonts.body;
      const lines = cellLines(cells, font);
      const rowHeight = height(lines);
      lines.forEach((cellText, index) => {
        const x = theme.margin + col * index;
        this.page.drawRectangle({
          x,
          y: this.y - rowHeight,
          width: col,
          height: rowHeight,
          color: isHead ? theme.colors.tableHead : hex("#FFFFFF"),
          borderColor: theme.colors.rule,
          borderWidth: 0.6,
        });
        cellText.forEach((value, lineIndex) => {
          this.page.drawText(value, {
            x: x + pad,
            y: this.y - pad - size - lineIndex * textLine,
            size,
            font,
            color: theme.colors.text,
          });
        });
      });
      this.y -= rowHeight;
    };

    [head, ...rows].forEach((cells, index) => {
      const isHead = index === 0;
      const rowHeight = height(cellLines(cells, isHead ? fonts.bold : fonts.body));
      const split = this.ensure(rowHeight + 2);
      // repeat the header row on continuation pages
      if (split && !isHead) draw(head, true);
      draw(cells, isHead);
    });
    this.y -= 6;
  }
}

function insertToc(
  pdf: PDFDocument,
  theme: PdfTheme,
  fonts: FontSet,
  headings: HeadingTarget[],
  tocTitle: string,
  title: string
) {
  const top = contentTop(theme);
  const bottom = contentBottom(theme);
  const size = theme.bodySize;
  const step = size * 1.8;
  const titleSize = theme.headingSizes[0];
  const titleSpace = titleSize * 2;
  const firstCapacity = Math.max(1, Math.floor((top - bottom - titleSpace) / step));
  const nextCapacity = Math.max(1, Math.floor((top - bottom) / step));
  const pageCount =
    headings.length <= firstCapacity
      ? 1
      : 1 + Math.ceil((headings.length - firstCapacity) / nextCapacity);

  const tocPages: PDFPage[] = [];
  for (let i = 0; i < pageCount; i++) {
    const page = pdf.insertPage(i, [PAGE_WIDTH, PAGE_HEIGHT]);
    drawBand(page, theme, fonts, title);
    tocPages.push(page);
  }

  const allPages = pdf.getPages();
  const numberOf = (page: PDFPage) => allPages.indexOf(page) + 1;

  let pageIndex = 0;
  let page = tocPages[0];
  let y = top - titleSize;
  page.drawText(toWinAnsi(tocTitle), {
    x: theme.margin,
    y,
    size: titleSize,
    font: fonts.heading,
    color: theme.colors.heading,
  });
  page.drawLine({
    start: { x: theme.margin, y: y - 6 },
    end: { x: PAGE_WIDTH - theme.margin, y: y - 6 },
    thickness: 2,
    color: theme.colors.accent,
  });
  y = top - titleSpace;
  let used = 0;
  let capacity = firstCapacity;

  headings.forEach((target) => {
    if (used >= capacity) {
      pageIndex += 1;
      page = tocPages[pageIndex];
      y = top;
      used = 0;
      capacity = nextCapacity;
    }
    y -= step;
    used += 1;

    const indent = (Math.min(target.row.level, 6) - 1) * 12;
    const label = String(numberOf(target.page));
    const labelWidth = fonts.ui.widthOfTextAtSize(label, size);
    const font = target.row.level === 1 ? fonts.bold : fonts.body;
    const available = PAGE_WIDTH - theme.margin * 2 - indent - labelWidth - 16;
    const text = truncate(toWinAnsi(target.row.text), available, font, size);

    page.drawText(text, {
      x: theme.margin + indent,
      y,
      size,
      font,
      color: theme.colors.accent,
    });
    page.drawText(label, {
      x: PAGE_WIDTH - theme.margin - labelWidth,
      y,
      size,
      font: fonts.ui,
      color: theme.colors.muted,
    });
    addInternalLink(pdf, page, target, [
      theme.margin + indent,
      y - 3,
      PAGE_WIDTH - theme.margin,
      y + size + 2,
    ]);
  });
}

function destination(pdf: PDFDocument, target: HeadingTarget) {
  return pdf.context.obj([target.page.ref, "XYZ", null, target.y, null]);
}

function addInternalLink(
  pdf: PDFDocument,
  page: PDFPage,
  target: HeadingTarget,
  rect: [number, number, number, number]
) {
  const annotation = pdf.context.obj({
    Type: "Annot",
    Subtype: "Link",
    Rect: rect,
    Border: [0, 0, 0],
    Dest: destination(pdf, target),
  });
  const ref = pdf.context.register(annotation);
  const annots = page.node.Annots();
  if (annots) {
    annots.push(ref);
    return;
  }
  page.node.set(PDFName.of("Annots"), pdf.context.obj([ref]));
}

/**
 * Flat bookmark list, one item per heading, in document order.
 */
function addBookmarks(pdf: PDFDocument, headings: HeadingTarget[]) {
  const context = pdf.context;
  const outlineRef = context.nextRef();
  const itemRefs = headings.map(() => context.nextRef());

  headings.forEach((target, index) => {
    const item = context.obj({
      Title: PDFHexString.fromText(target.row.text),
      Parent: outlineRef,
      Dest: destination(pdf, target),
      ...(index > 0 ? { Prev: itemRefs[index - 1] } : {}),
      ...(index < itemRefs.length - 1 ? { Next: itemRefs[index + 1] } : {}),
    });
    context.assign(itemRefs[index], item);
  });

  context.assign(
    outlineRef,
    context.obj({
      Type: "Outlines",
      First: itemRefs[0],
      Last: itemRefs[itemRefs.length - 1],
      Count: itemRefs.length,
    })
  );
  pdf.catalog.set(PDFName.of("Outlines"), outlineRef);
  pdf.catalog.set(PDFName.of("PageMode"), PDFName.of("UseOutlines"));
}

function stampFooters(pdf: PDFDocument, theme: PdfTheme, fonts: FontSet, title: string) {
  const pages = pdf.getPages();
  const total = pages.length;
  const size = 8.5;
  const y = Math.max(16, theme.margin / 2 - 4);
  pages.forEach((page, index) => {
    page.drawLine({
      start: { x: theme.margin, y: y + 12 },
      end: { x: PAGE_WIDTH - theme.margin, y: y + 12 },
      thickness: 0.5,
      color: theme.colors.rule,
    });
    const label = `Page ${index + 1}/${total}`;
    const labelWidth = fonts.ui.widthOfTextAtSize(label, size);
    page.drawText(label, {
      x: PAGE_WIDTH - theme.margin - labelWidth,
      y,
      size,
      font: fonts.ui,
      color: theme.colors.muted,
    });
    const left = truncate(
      toWinAnsi(title),
      PAGE_WIDTH - theme.margin * 2 - labelWidth - 24,
      fonts.ui,
      size
    );
    page.drawText(left, {
      x: theme.margin,
      y,
      size,
      font: fonts.ui,
      color: theme.colors.muted,
    });
  });
}
