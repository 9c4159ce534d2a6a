// Host entrypoint for the Generate Report Summary block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { generateReportSummaryBlock } from "../../src/blocks/generate_report_summary";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  generateReportSummaryBlock.run(inputs, context);
