// Host entrypoint for the Get Predefined Questions block (Node.js)
// This is a thin wrapper that delegates to the block definition.

import type { BlockContext } from "../../src/blocks/base";
import { getPredefinedQuestionsBlock } from "../../src/blocks/get_predefined_questions";

export const handler = async (inputs: unknown, context?: BlockContext) =>
  getPredefinedQuestionsBlock.run(inputs, context);
