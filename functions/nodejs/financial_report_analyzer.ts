// Host entrypoint for the Financial Report Analyzer block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { financialReportAnalyzerBlock } from "../../src/blocks/financial_report_analyzer";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  financialReportAnalyzerBlock.run(inputs, context);
