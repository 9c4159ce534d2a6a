// Host entrypoint for the Get Cached Periods block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { getCachedPeriodsBlock } from "../../src/blocks/get_cached_periods";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  getCachedPeriodsBlock.run(inputs, context);
