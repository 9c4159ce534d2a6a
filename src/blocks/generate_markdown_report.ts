import { z } from "zod";
import { getReportOutputDir } from "../fundamental/infrastructure/config";
import { reportDataSchema } from "../fundamental/schemas";
import {
  renderReportMarkdown,
  RenderedMarkdown,
} from "../rendering/markdown/report_markdown";
import { defineBlock } from "./base";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

export const generateMarkdownReportInputSchema = z.object({
  report_data: reportDataSchema,
  company_name: optionalText,
  output_filename: optionalText,
  output_dir: optionalText,
});

export const generateMarkdownReportBlock = defineBlock({
  name: "generate_markdown_report",
  description: "Render report data as a Markdown document and save it to disk.",
  schema: generateMarkdownReportInputSchema,
  handler: async (input) => {
    const rendered = await renderReportMarkdown(input.report_data, {
      companyName: input.company_name,
      outputFilename: input.output_filename,
      outputDir: input.output_dir ?? getReportOutputDir(),
    });
    return {
      payload: rendered,
      message: `Markdown report saved to ${rendered.path}`,
    };
  },
  toOutputs: (rendered: RenderedMarkdown | null) => ({
    md_content: rendered?.content ?? null,
    file_path: rendered?.path ?? null,
    title: rendered?.title ?? null,
  }),
});
