import { getLogger } from "../../util/logger";
import type { Question, QuestionGroup } from "../domain/types";
import { Endpoints } from "../infrastructure/http_client";
import { normalizeQuestions } from "../infrastructure/normalize";
import type { CallOptions, FundamentalDependencies } from "./dependencies";

export interface GetPredefinedQuestionsParams {
  group?: QuestionGroup;
}

/**
 * Lists the predefined report questions, optionally restricted to one group.
 */
export async function getPredefinedQuestions(
  params: GetPredefinedQuestionsParams,
  options: CallOptions,
  deps: FundamentalDependencies
): Promise<Question[]> {
  const logger = getLogger("fundamental/get_predefined_questions");
  const payload = await deps.client.request(
    Endpoints.predefinedQuestions,
    { group: params.group },
    {
      apiKey: options.apiKey,
      timeoutMs: options.timeoutMs ?? deps.config.timeoutMs,
      signal: options.signal,
      baseUrl: options.baseUrl,
    }
  );
  const questions = normalizeQuestions(payload, params.group);
  const filtered = params.group
    ? questions.filter((q) => q.group === params.group)
    : questions;
  logger.debug(
    { group: params.group, count: filtered.length },
    "predefined questions loaded"
  );
  return filtered;
}
