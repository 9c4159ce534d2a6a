import { z } from "zod";
import { cachedPeriodSchema } from "../fundamental/schemas";
import {
  PeriodsMarkdown,
  renderPeriodsMarkdown,
} from "../rendering/markdown/periods_markdown";
import { defineBlock } from "./base";

export const generatePeriodsMarkdownInputSchema = z.object({
  periods_list: z.array(cachedPeriodSchema, {
    required_error: "periods_list is required",
  }),
});

export const generatePeriodsMarkdownBlock = defineBlock({
  name: "generate_periods_markdown",
  description: "Format a cached periods list as a Markdown document grouped by ticker.",
  schema: generatePeriodsMarkdownInputSchema,
  handler: async (input) => {
    const rendered = renderPeriodsMarkdown(input.periods_list);
    return {
      payload: rendered,
      message: `Formatted ${rendered.count} cached periods as Markdown`,
    };
  },
  toOutputs: (rendered: PeriodsMarkdown | null) => ({
    markdown_output: rendered?.markdown ?? null,
    periods_count: rendered?.count ?? null,
  }),
});
