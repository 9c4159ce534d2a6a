import { FinancialApiClient } from "../infrastructure/http_client";
import {
  FinancialApiConfig,
  loadFinancialApiConfig,
} from "../infrastructure/config";

export interface FundamentalDependencies {
  client: FinancialApiClient;
  config: FinancialApiConfig;
}

export interface CallOptions {
  apiKey: string;
  /** Overrides the configured per-attempt timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Overrides the configured API base URL for this call */
  baseUrl?: string;
}

export function createFundamentalDependencies(
  overrides: Partial<FundamentalDependencies> = {}
): FundamentalDependencies {
  const config = overrides.config ?? loadFinancialApiConfig();
  const client =
    overrides.client ??
    new FinancialApiClient({ baseUrl: config.baseUrl, retry: config.retry });
  return { client, config };
}
