import { NotFoundError, isBlockError } from "../../util/errors";
import { getLogger } from "../../util/logger";
import { formatPeriod, ReportData, ReportQuery } from "../domain/types";
import { Endpoints } from "../infrastructure/http_client";
import { normalizeReportData } from "../infrastructure/normalize";
import type { CallOptions, FundamentalDependencies } from "./dependencies";

/**
 * Fetches a cached report for the ticker/period. Without year or quarter the
 * API picks the latest cached period.
 */
export async function getCachedReport(
  query: ReportQuery,
  options: CallOptions,
  deps: FundamentalDependencies
): Promise<ReportData> {
  const logger = getLogger("fundamental/get_cached_report");
  try {
    const payload = await deps.client.request(
      Endpoints.cachedReport,
      { ticker: query.ticker, year: query.year, quarter: query.quarter },
      {
        apiKey: options.apiKey,
        timeoutMs: options.timeoutMs ?? deps.config.timeoutMs,
        signal: options.signal,
        baseUrl: options.baseUrl,
      }
    );
    const report = normalizeReportData(payload, query);
    logger.debug(
      {
        ticker: report.ticker,
        period: formatPeriod(report.period),
        answers: report.answers.length,
      },
      "cached report loaded"
    );
    return report;
  } catch (err) {
    if (isBlockError(err) && err.kind === "not_found") {
      throw new NotFoundError(
        `No cached report data found for ${describeQuery(query)}. Try a different ticker or period.`,
        err.details
      );
    }
    throw err;
  }
}

export function describeQuery(query: ReportQuery): string {
  if (query.year == null) return query.ticker;
  return `${query.ticker} ${formatPeriod({
    year: query.year,
    quarter: query.quarter ?? null,
  })}`;
}
