import { mkdtemp, readdir, readFile, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { PDFDocument, PDFName } from "pdf-lib";
import { BlockError } from "../../util/errors";
import { renderMarkdownPdf, resolvePdfOutputPath } from "../pdf/render_pdf";
import { THEME_NAMES } from "../pdf/themes";

const markdown = [
  "# Quarterly Review",
  "",
  "Revenue grew **12%** on services demand.",
  "",
  "## Results",
  "",
  "- Services up",
  "- Hardware flat",
  "",
  "| Segment | Revenue |",
  "|---------|---------|",
  "| Services | 85B |",
  "",
  "## Outlook",
  "",
  "```",
  "guidance: stable",
  "```",
].join("\n");

async function captureError(promise: Promise<unknown>): Promise<BlockError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof BlockError) return err;
    throw err;
  }
  throw new Error("expected rendering to fail");
}

async function loadPdf(file: string) {
  return PDFDocument.load(await readFile(file), { updateMetadata: false });
}

describe("renderMarkdownPdf", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "pdf-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it.each(THEME_NAMES.map((theme) => [theme]))("renders with the %s theme", async (theme) => {
    const target = path.join(dir, `${theme}.pdf`);

    const result = await renderMarkdownPdf(
      { content: markdown },
      { theme, includeToc: false, outputPath: target }
    );

    expect(result.path).toBe(target);
    expect(result.sizeBytes).toBeGreaterThan(0);
    expect(result.sizeBytes).toBe((await stat(target)).size);
    expect(result.status).toBe(`Successfully converted Markdown to PDF: ${target}`);
    expect(await readdir(dir)).toEqual([`${theme}.pdf`]);
  });

  it("inserts a linked table of contents and bookmarks", async () => {
    const result = await renderMarkdownPdf(
      { content: markdown },
      { theme: "professional", includeToc: true, outputPath: path.join(dir, "toc.pdf") }
    );

    expect(result.outline.map((entry) => entry.text)).toEqual([
      "Quarterly Review",
      "Results",
      "Outlook",
    ]);
    expect(result.pageCount).toBe(2);

    const pdf = await loadPdf(result.path);
    expect(pdf.getPageCount()).toBe(2);
    expect(pdf.getPage(0).node.Annots()?.size()).toBe(3);
    expect(pdf.catalog.get(PDFName.of("Outlines"))).toBeDefined();
    expect(pdf.getTitle()).toBe("Quarterly Review");
  });

  it("spreads a long table of contents over several pages", async () => {
    const content = Array.from(
      { length: 80 },
      (_, index) => `## Section ${index + 1}\n\nBody ${index + 1}.`
    ).join("\n\n");

    const result = await renderMarkdownPdf(
      { content },
      { includeToc: true, outputPath: path.join(dir, "long.pdf") }
    );

    expect(result.outline).toHaveLength(80);
    const pdf = await loadPdf(result.path);
    const linksPerPage = [0, 1, 2].map(
      (index) => pdf.getPage(index).node.Annots()?.size() ?? 0
    );
    expect(linksPerPage).toEqual([36, 38, 6]);
  });

  it("skips the table of contents when disabled", async () => {
    const result = await renderMarkdownPdf(
      { content: markdown },
      { includeToc: false, outputPath: path.join(dir, "plain.pdf"), title: "Custom" }
    );

    expect(result.outline).toEqual([]);
    expect(result.pageCount).toBe(1);
    const pdf = await loadPdf(result.path);
    expect(pdf.catalog.get(PDFName.of("Outlines"))).toBeUndefined();
    expect(pdf.getTitle()).toBe("Custom");
  });

  it("reads markdown from a file and names the output in a directory", async () => {
    const source = path.join(dir, "notes.md");
    await writeFile(source, "Text with characters like 株式 outside WinAnsi.\n");

    const result = await renderMarkdownPdf(
      { path: source },
      { includeToc: true, outputPath: path.join(dir, "out"), outputFilename: "notes" }
    );

    expect(result.path).toBe(path.join(dir, "out", "notes.pdf"));
    expect(result.outline).toEqual([]);
    const pdf = await loadPdf(result.path);
    expect(pdf.getTitle()).toBe("Document");
  });

  it("rejects an unknown theme before writing anything", async () => {
    const err = await captureError(
      renderMarkdownPdf(
        { content: markdown },
        { theme: "neon", includeToc: true, outputPath: path.join(dir, "x.pdf") }
      )
    );

    expect(err.kind).toBe("validation");
    expect(await readdir(dir)).toEqual([]);
  });

  it("requires exactly one markdown source", async () => {
    const options = { includeToc: false, outputPath: path.join(dir, "x.pdf") };

    const both = await captureError(
      renderMarkdownPdf({ content: "# A", path: path.join(dir, "a.md") }, options)
    );
    expect(both.message).toBe("Provide either md_content or md_file_path, not both");

    const neither = await captureError(renderMarkdownPdf({}, options));
    expect(neither.message).toBe("Either md_content or md_file_path must be provided");
    expect(await readdir(dir)).toEqual([]);
  });

  it("rejects empty markdown and unreadable files", async () => {
    const options = { includeToc: false, outputPath: path.join(dir, "x.pdf") };

    const empty = await captureError(renderMarkdownPdf({ content: "  \n " }, options));
    expect(empty.kind).toBe("validation");
    expect(empty.message).toBe("Markdown content cannot be empty");

    const missing = await captureError(
      renderMarkdownPdf({ path: path.join(dir, "missing.md") }, options)
    );
    expect(missing.kind).toBe("io");
  });
});

describe("resolvePdfOutputPath", () => {
  it("treats non-.pdf paths as directories", () => {
    expect(resolvePdfOutputPath("/tmp/reports/final.PDF")).toBe("/tmp/reports/final.PDF");
    expect(resolvePdfOutputPath("/tmp/reports")).toBe("/tmp/reports/document.pdf");
    expect(resolvePdfOutputPath("/tmp/reports", "Q4 summary")).toBe(
      "/tmp/reports/Q4_summary.pdf"
    );
  });
});
