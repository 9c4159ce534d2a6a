// Host entrypoint for the Generate Periods Markdown block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { generatePeriodsMarkdownBlock } from "../../src/blocks/generate_periods_markdown";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  generatePeriodsMarkdownBlock.run(inputs, context);
