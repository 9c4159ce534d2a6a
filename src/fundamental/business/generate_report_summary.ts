import { getLogger } from "../../util/logger";
import {
  formatPeriod,
  QuestionGroup,
  ReportData,
  ReportQuery,
} from "../domain/types";
import { Endpoints } from "../infrastructure/http_client";
import { normalizeReportData } from "../infrastructure/normalize";
import type { CallOptions, FundamentalDependencies } from "./dependencies";

export interface GenerateReportSummaryParams {
  query: ReportQuery;
  questionGroup: QuestionGroup;
  /** Custom questions asked in addition to the group preset */
  questions?: string[];
}

/**
 * Asks the API to answer the question group for a ticker/period.
 * Analysis requests run long, so the summary timeout applies by default.
 */
export async function generateReportSummary(
  params: GenerateReportSummaryParams,
  options: CallOptions,
  deps: FundamentalDependencies
): Promise<ReportData> {
  const logger = getLogger("fundamental/generate_report_summary");
  const { query, questionGroup, questions } = params;
  const payload = await deps.client.request(
    Endpoints.reportSummary,
    {
      company_symbol: query.ticker,
      report_period:
        query.year !== undefined
          ? formatPeriod({ year: query.year, quarter: query.quarter ?? null })
          : undefined,
      question_group: questionGroup,
      questions,
    },
    {
      apiKey: options.apiKey,
      timeoutMs: options.timeoutMs ?? deps.config.summaryTimeoutMs,
      signal: options.signal,
      baseUrl: options.baseUrl,
    }
  );
  const summary = normalizeReportData(payload, query, questionGroup);
  logger.info(
    {
      ticker: summary.ticker,
      period: formatPeriod(summary.period),
      questionGroup,
      answers: summary.answers.length,
    },
    "report summary generated"
  );
  return summary;
}
