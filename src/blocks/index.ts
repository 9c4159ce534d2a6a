import { financialReportAnalyzerBlock } from "./financial_report_analyzer";
import { generateMarkdownReportBlock } from "./generate_markdown_report";
import { generatePeriodsMarkdownBlock } from "./generate_periods_markdown";
import { generateReportSummaryBlock } from "./generate_report_summary";
import { getCachedPeriodsBlock } from "./get_cached_periods";
import { getCachedReportBlock } from "./get_cached_report";
import { getPredefinedQuestionsBlock } from "./get_predefined_questions";
import { markdownToPdfBlock } from "./markdown_to_pdf";

export * from "./base";
export * from "./financial_report_analyzer";
export * from "./generate_markdown_report";
export * from "./generate_periods_markdown";
export * from "./generate_report_summary";
export * from "./get_cached_periods";
export * from "./get_cached_report";
export * from "./get_predefined_questions";
export * from "./markdown_to_pdf";

/**
 * Registry of every block exposed to the workflow host, keyed by block name.
 */
export const blocks = {
  get_cached_report: getCachedReportBlock,
  get_cached_periods: getCachedPeriodsBlock,
  get_predefined_questions: getPredefinedQuestionsBlock,
  generate_report_summary: generateReportSummaryBlock,
  financial_report_analyzer: financialReportAnalyzerBlock,
  generate_markdown_report: generateMarkdownReportBlock,
  markdown_to_pdf: markdownToPdfBlock,
  generate_periods_markdown: generatePeriodsMarkdownBlock,
} as const;

export type BlockName = keyof typeof blocks;
