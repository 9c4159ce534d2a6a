import { z } from "zod";
import type { FundamentalDependencies, CallOptions } from "../fundamental/business/dependencies";
import { generateReportSummary } from "../fundamental/business/generate_report_summary";
import { getCachedPeriods } from "../fundamental/business/get_cached_periods";
import { getCachedReport } from "../fundamental/business/get_cached_report";
import { getPredefinedQuestions } from "../fundamental/business/get_predefined_questions";
import type {
  AnalysisType,
  CachedPeriod,
  Question,
  ReportData,
} from "../fundamental/domain/types";
import {
  apiKeySchema,
  baseUrlSchema,
  optionalQuestionGroupSchema,
  optionalTickerSchema,
  questionGroupSchema,
  questionsSchema,
  reportPeriodSchema,
  reportQueryFields,
  timeoutSchema,
} from "../fundamental/schemas";
import { defineBlock } from "./base";
import {
  defaultDependencies,
  DependencyFactory,
  resolveCallOptions,
  resolvePeriod,
} from "./shared";

/**
 * Single entry point over the four report endpoints, selected by
 * `analysis_type`. Each branch accepts the inputs of the matching block;
 * `report_period` ("2023Q4") may stand in for year/quarter.
 */

const common = {
  api_key: apiKeySchema,
  timeout_ms: timeoutSchema,
  base_url: baseUrlSchema,
};

const periodFields = {
  ...reportQueryFields,
  report_period: reportPeriodSchema,
};

export const financialReportAnalyzerInputSchema = z.discriminatedUnion(
  "analysis_type",
  [
    z.object({
      analysis_type: z.literal("cached_report"),
      ...common,
      ...periodFields,
    }),
    z.object({
      analysis_type: z.literal("cached_periods"),
      ...common,
      ticker: optionalTickerSchema,
    }),
    z.object({
      analysis_type: z.literal("predefined_questions"),
      ...common,
      question_group: optionalQuestionGroupSchema,
    }),
    z.object({
      analysis_type: z.literal("report_summary"),
      ...common,
      ...periodFields,
      question_group: questionGroupSchema,
      questions: questionsSchema,
    }),
  ]
);

export type FinancialReportAnalyzerInput = z.infer<
  typeof financialReportAnalyzerInputSchema
>;

export type AnalysisResult =
  | { analysis_type: "cached_report"; data: ReportData }
  | { analysis_type: "cached_periods"; data: CachedPeriod[] }
  | { analysis_type: "predefined_questions"; data: Question[] }
  | { analysis_type: "report_summary"; data: ReportData };

async function analyze(
  input: FinancialReportAnalyzerInput,
  options: CallOptions,
  deps: FundamentalDependencies
): Promise<AnalysisResult> {
  switch (input.analysis_type) {
    case "cached_report": {
      const query = { ticker: input.ticker, ...resolvePeriod(input) };
      return {
        analysis_type: input.analysis_type,
        data: await getCachedReport(query, options, deps),
      };
    }
    case "cached_periods":
      return {
        analysis_type: input.analysis_type,
        data: await getCachedPeriods({ ticker: input.ticker }, options, deps),
      };
    case "predefined_questions":
      return {
        analysis_type: input.analysis_type,
        data: await getPredefinedQuestions({ group: input.question_group }, options, deps),
      };
    case "report_summary": {
      const query = { ticker: input.ticker, ...resolvePeriod(input) };
      return {
        analysis_type: input.analysis_type,
        data: await generateReportSummary(
          { query, questionGroup: input.question_group, questions: input.questions },
          options,
          deps
        ),
      };
    }
  }
}

export function createFinancialReportAnalyzerBlock(
  resolveDeps: DependencyFactory = defaultDependencies
) {
  return defineBlock({
    name: "financial_report_analyzer",
    description:
      "Call one of the fundamental report endpoints selected by analysis_type.",
    schema: financialReportAnalyzerInputSchema,
    handler: async (input, context) => {
      const deps = resolveDeps();
      const result = await analyze(input, resolveCallOptions(input, deps, context), deps);
      const analysisType: AnalysisType = result.analysis_type;
      return {
        payload: result,
        message: `Successfully completed ${analysisType} analysis`,
      };
    },
    toOutputs: (result: AnalysisResult | null) => ({ result }),
  });
}

export const financialReportAnalyzerBlock = createFinancialReportAnalyzerBlock();
