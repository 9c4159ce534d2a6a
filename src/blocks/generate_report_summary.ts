import { z } from "zod";
import { generateReportSummary } from "../fundamental/business/generate_report_summary";
import { formatPeriod, ReportData } from "../fundamental/domain/types";
import {
  apiKeySchema,
  baseUrlSchema,
  questionGroupSchema,
  questionsSchema,
  reportQueryFields,
  timeoutSchema,
} from "../fundamental/schemas";
import { defineBlock } from "./base";
import { defaultDependencies, DependencyFactory, resolveCallOptions } from "./shared";

export const generateReportSummaryInputSchema = z.object({
  api_key: apiKeySchema,
  ...reportQueryFields,
  question_group: questionGroupSchema,
  questions: questionsSchema,
  timeout_ms: timeoutSchema,
  base_url: baseUrlSchema,
});

export function createGenerateReportSummaryBlock(
  resolveDeps: DependencyFactory = defaultDependencies
) {
  return defineBlock({
    name: "generate_report_summary",
    description:
      "Generate answers to a question group (and optional custom questions) for a ticker and period.",
    schema: generateReportSummaryInputSchema,
    handler: async (input, context) => {
      const deps = resolveDeps();
      const summary = await generateReportSummary(
        {
          query: { ticker: input.ticker, year: input.year, quarter: input.quarter },
          questionGroup: input.question_group,
          questions: input.questions,
        },
        resolveCallOptions(input, deps, context),
        deps
      );
      return {
        payload: summary,
        message: `Generated ${input.question_group} summary for ${summary.ticker} ${formatPeriod(summary.period)} with ${summary.answers.length} answers`,
      };
    },
    toOutputs: (summary: ReportData | null) => ({ summary_result: summary }),
  });
}

export const generateReportSummaryBlock = createGenerateReportSummaryBlock();
