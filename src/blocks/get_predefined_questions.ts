import { z } from "zod";
import { getPredefinedQuestions } from "../fundamental/business/get_predefined_questions";
import type { Question } from "../fundamental/domain/types";
import {
  apiKeySchema,
  baseUrlSchema,
  optionalQuestionGroupSchema,
  timeoutSchema,
} from "../fundamental/schemas";
import { defineBlock } from "./base";
import { defaultDependencies, DependencyFactory, resolveCallOptions } from "./shared";

export const getPredefinedQuestionsInputSchema = z.object({
  api_key: apiKeySchema,
  question_group: optionalQuestionGroupSchema,
  timeout_ms: timeoutSchema,
  base_url: baseUrlSchema,
});

export function createGetPredefinedQuestionsBlock(
  resolveDeps: DependencyFactory = defaultDependencies
) {
  return defineBlock({
    name: "get_predefined_questions",
    description: "List the predefined report questions, optionally for one question group.",
    schema: getPredefinedQuestionsInputSchema,
    handler: async (input, context) => {
      const deps = resolveDeps();
      const questions = await getPredefinedQuestions(
        { group: input.question_group },
        resolveCallOptions(input, deps, context),
        deps
      );
      const scope = input.question_group ? ` in group "${input.question_group}"` : "";
      return {
        payload: questions,
        message: `Retrieved ${questions.length} predefined questions${scope}`,
      };
    },
    toOutputs: (questions: Question[] | null) => ({ questions_list: questions }),
  });
}

export const getPredefinedQuestionsBlock = createGetPredefinedQuestionsBlock();
