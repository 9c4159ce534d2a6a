import "dotenv/config";
import { getEnvVar, getNumber, getStage, getString } from "../../util/env";

export const DEFAULT_BASE_URL = "https://market-lens.innolabs.cc";

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: 8000,
};

export interface FinancialApiConfig {
  baseUrl: string;
  /** Fallback credential when a block is invoked without api_key */
  apiKey: string | undefined;
  timeoutMs: number;
  summaryTimeoutMs: number;
  retry: RetryPolicy;
  stage: string;
}

export function loadFinancialApiConfig(): FinancialApiConfig {
  const baseUrl = getString("FIN_API_BASE_URL", DEFAULT_BASE_URL).replace(
    /\/+$/,
    ""
  );
  const apiKey = getEnvVar("FIN_API_KEY");
  const timeoutMs = getNumber("FIN_API_TIMEOUT_MS", 30_000);
  const summaryTimeoutMs = getNumber("FIN_API_SUMMARY_TIMEOUT_MS", 60_000);
  const retry: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: getNumber(
      "FIN_API_MAX_ATTEMPTS",
      DEFAULT_RETRY_POLICY.maxAttempts
    ),
    baseDelayMs: getNumber(
      "FIN_API_BASE_DELAY_MS",
      DEFAULT_RETRY_POLICY.baseDelayMs
    ),
  };
  return {
    baseUrl,
    apiKey,
    timeoutMs,
    summaryTimeoutMs,
    retry,
    stage: getStage(),
  };
}

export function getReportOutputDir(): string {
  return getString("REPORT_OUTPUT_DIR", "./reports");
}
