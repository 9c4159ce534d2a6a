import { getLogger } from "../../util/logger";
import type { CachedPeriod } from "../domain/types";
import { Endpoints } from "../infrastructure/http_client";
import { normalizePeriods } from "../infrastructure/normalize";
import type { CallOptions, FundamentalDependencies } from "./dependencies";

export interface GetCachedPeriodsParams {
  /** Only keep periods of this ticker */
  ticker?: string;
}

export async function getCachedPeriods(
  params: GetCachedPeriodsParams,
  options: CallOptions,
  deps: FundamentalDependencies
): Promise<CachedPeriod[]> {
  const logger = getLogger("fundamental/get_cached_periods");
  const payload = await deps.client.request(
    Endpoints.cachedPeriods,
    { ticker: params.ticker },
    {
      apiKey: options.apiKey,
      timeoutMs: options.timeoutMs ?? deps.config.timeoutMs,
      signal: options.signal,
      baseUrl: options.baseUrl,
    }
  );
  const periods = normalizePeriods(payload);
  // Older API versions ignore the filter
  const filtered = params.ticker
    ? periods.filter((p) => p.ticker === params.ticker)
    : periods;
  logger.debug(
    { ticker: params.ticker, count: filtered.length },
    "cached periods loaded"
  );
  return filtered;
}
