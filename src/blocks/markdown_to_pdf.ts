import path from "path";
import { z } from "zod";
import { getReportOutputDir } from "../fundamental/infrastructure/config";
import { renderMarkdownPdf, RenderedPdf } from "../rendering/pdf/render_pdf";
import { defineBlock } from "./base";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

export const markdownToPdfInputSchema = z.object({
  md_content: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  md_file_path: optionalText,
  output_path: optionalText,
  output_filename: optionalText,
  title: optionalText,
  author: optionalText,
  theme: z
    .string()
    .nullish()
    .transform((value) => value?.trim() || "default"),
  include_toc: z
    .boolean()
    .nullish()
    .transform((value) => value ?? true),
  toc_title: optionalText,
});

function sourceBasename(filePath: string | undefined): string | undefined {
  if (!filePath) return undefined;
  return path.basename(filePath, path.extname(filePath)) || undefined;
}

export const markdownToPdfBlock = defineBlock({
  name: "markdown_to_pdf",
  description:
    "Convert Markdown (inline or from a file) into a themed PDF with an optional table of contents.",
  schema: markdownToPdfInputSchema,
  handler: async (input) => {
    const rendered = await renderMarkdownPdf(
      { content: input.md_content, path: input.md_file_path },
      {
        title: input.title,
        author: input.author,
        theme: input.theme,
        includeToc: input.include_toc,
        tocTitle: input.toc_title,
        outputPath: input.output_path ?? getReportOutputDir(),
        outputFilename: input.output_filename ?? sourceBasename(input.md_file_path),
      }
    );
    return { payload: rendered, message: rendered.status };
  },
  toOutputs: (rendered: RenderedPdf | null) => ({
    pdf_path: rendered?.path ?? null,
    file_size: rendered?.sizeBytes ?? null,
  }),
});
