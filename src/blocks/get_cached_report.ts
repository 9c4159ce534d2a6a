import { z } from "zod";
import { getCachedReport } from "../fundamental/business/get_cached_report";
import { formatPeriod, ReportData } from "../fundamental/domain/types";
import {
  apiKeySchema,
  baseUrlSchema,
  reportQueryFields,
  timeoutSchema,
} from "../fundamental/schemas";
import { defineBlock } from "./base";
import { defaultDependencies, DependencyFactory, resolveCallOptions } from "./shared";

export const getCachedReportInputSchema = z.object({
  api_key: apiKeySchema,
  ...reportQueryFields,
  timeout_ms: timeoutSchema,
  base_url: baseUrlSchema,
});

export function createGetCachedReportBlock(
  resolveDeps: DependencyFactory = defaultDependencies
) {
  return defineBlock({
    name: "get_cached_report",
    description:
      "Fetch a cached financial report for a ticker and period. Without year/quarter the latest cached period is returned.",
    schema: getCachedReportInputSchema,
    handler: async (input, context) => {
      const deps = resolveDeps();
      const report = await getCachedReport(
        { ticker: input.ticker, year: input.year, quarter: input.quarter },
        resolveCallOptions(input, deps, context),
        deps
      );
      return {
        payload: report,
        message: `Retrieved cached report for ${report.ticker} ${formatPeriod(report.period)} with ${report.answers.length} answers`,
      };
    },
    toOutputs: (report: ReportData | null) => ({ report_data: report }),
  });
}

export const getCachedReportBlock = createGetCachedReportBlock();
