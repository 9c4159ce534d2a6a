// Host entrypoint for the Generate Markdown Report block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { generateMarkdownReportBlock } from "../../src/blocks/generate_markdown_report";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  generateMarkdownReportBlock.run(inputs, context);
