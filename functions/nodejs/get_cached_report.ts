// Host entrypoint for the Get Cached Report block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { getCachedReportBlock } from "../../src/blocks/get_cached_report";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  getCachedReportBlock.run(inputs, context);
