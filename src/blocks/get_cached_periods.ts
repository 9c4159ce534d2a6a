import { z } from "zod";
import { getCachedPeriods } from "../fundamental/business/get_cached_periods";
import type { CachedPeriod } from "../fundamental/domain/types";
import {
  apiKeySchema,
  baseUrlSchema,
  optionalTickerSchema,
  timeoutSchema,
} from "../fundamental/schemas";
import { defineBlock } from "./base";
import { defaultDependencies, DependencyFactory, resolveCallOptions } from "./shared";

export const getCachedPeriodsInputSchema = z.object({
  api_key: apiKeySchema,
  ticker: optionalTickerSchema,
  timeout_ms: timeoutSchema,
  base_url: baseUrlSchema,
});

export function createGetCachedPeriodsBlock(
  resolveDeps: DependencyFactory = defaultDependencies
) {
  return defineBlock({
    name: "get_cached_periods",
    description: "List the ticker/period combinations that have cached reports.",
    schema: getCachedPeriodsInputSchema,
    handler: async (input, context) => {
      const deps = resolveDeps();
      const periods = await getCachedPeriods(
        { ticker: input.ticker },
        resolveCallOptions(input, deps, context),
        deps
      );
      const scope = input.ticker ? ` for ${input.ticker}` : "";
      return {
        payload: periods,
        message: `Retrieved ${periods.length} cached periods${scope}`,
      };
    },
    toOutputs: (periods: CachedPeriod[] | null) => ({ periods_list: periods }),
  });
}

export const getCachedPeriodsBlock = createGetCachedPeriodsBlock();
