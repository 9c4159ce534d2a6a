// Host entrypoint for the Markdown to PDF block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { markdownToPdfBlock } from "../../src/blocks/markdown_to_pdf";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  markdownToPdfBlock.run(inputs, context);
