import {
  CallOptions,
  createFundamentalDependencies,
  FundamentalDependencies,
} from "../fundamental/business/dependencies";
import { ParsedReportPeriod } from "../fundamental/schemas";
import { ValidationError } from "../util/errors";
import type { BlockContext } from "./base";

/** Resolved per invocation so env changes are picked up */
export type DependencyFactory = () => FundamentalDependencies;

export const defaultDependencies: DependencyFactory = () =>
  createFundamentalDependencies();

export function resolveCallOptions(
  input: { api_key?: string; timeout_ms?: number; base_url?: string },
  deps: FundamentalDependencies,
  context: BlockContext
): CallOptions {
  const apiKey = input.api_key ?? deps.config.apiKey;
  if (!apiKey) {
    throw new ValidationError(
      "api_key is required (pass it as an input or set FIN_API_KEY)"
    );
  }
  return {
    apiKey,
    timeoutMs: input.timeout_ms,
    signal: context.signal,
    baseUrl: input.base_url,
  };
}

/**
 * Explicit year/quarter inputs win over a parsed `report_period`.
 */
export function resolvePeriod(input: {
  year?: number;
  quarter?: number;
  report_period?: ParsedReportPeriod;
}): { year?: number; quarter?: number } {
  return {
    year: input.year ?? input.report_period?.year,
    quarter: input.quarter ?? input.report_period?.quarter,
  };
}
