/**
 * Response shape normalization for the financial API.
 *
 * The API wraps most payloads in `{ data: ... }` and names fields loosely
 * (`reports` vs `answers`, `question` as a string or an object). These helpers
 * turn that into the domain types; anything unusable raises ApiError.
 */
import { z } from "zod";
import { ApiError } from "../../util/errors";
import type {
  AnswerItem,
  CachedPeriod,
  Question,
  QuestionGroup,
  ReportData,
  ReportQuery,
} from "../domain/types";
import categoryKeywords from "./category_keywords.json";

const DEFAULT_CATEGORY = "general";

// Checked in order; the first category with a matching keyword wins
const KEYWORD_CATEGORIES = [
  "financial",
  "business",
  "analysis",
  "management",
  "governance",
] as const;

/**
 * Keyword category for an answer the API sent without one. Looks at the
 * question and the opening of the answer; "general" when nothing matches.
 */
export function classifyCategory(question: string, answer = ""): string {
  const haystack = `${question} ${answer.slice(0, 100)}`.toLowerCase();
  const match = KEYWORD_CATEGORIES.find((category) =>
    categoryKeywords[category].some((keyword) => haystack.includes(keyword))
  );
  return match ?? DEFAULT_CATEGORY;
}

const numberish = z.union([z.number(), z.string()]).nullish();

const rawQuestionObjectSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    text: z.string().nullish(),
    question: z.string().nullish(),
    category: z.string().nullish(),
    group: z.string().nullish(),
  })
  .passthrough();

const rawQuestionSchema = z.union([z.string(), rawQuestionObjectSchema]);

const rawAnswerSchema = z
  .object({
    question: rawQuestionSchema,
    answer: z.string().nullish(),
    category: z.string().nullish(),
  })
  .passthrough();

const rawReportSchema = z
  .object({
    ticker: z.string().nullish(),
    symbol: z.string().nullish(),
    year: numberish,
    quarter: numberish,
    period: z.object({ year: numberish, quarter: numberish }).nullish(),
    reports: z.array(rawAnswerSchema).nullish(),
    answers: z.array(rawAnswerSchema).nullish(),
  })
  .passthrough();

const rawPeriodSchema = z
  .object({
    ticker: z.string().nullish(),
    symbol: z.string().nullish(),
    year: numberish,
    quarter: numberish,
  })
  .passthrough();

type RawQuestion = z.infer<typeof rawQuestionSchema>;

/**
 * Returns `payload.data` when the payload is a `{ data }` envelope.
 */
export function unwrapData(payload: unknown): unknown {
  if (payload && typeof payload === "object" && "data" in payload) {
    return payload.data;
  }
  return payload;
}

export function toQuestionGroup(
  value: string | null | undefined,
  fallback: QuestionGroup = "brief"
): QuestionGroup {
  const lowered = value?.trim().toLowerCase();
  if (lowered === "brief" || lowered === "detailed") return lowered;
  return fallback;
}

function toInteger(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === "") return null;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isInteger(n) ? n : null;
}

function toQuestion(
  raw: RawQuestion,
  index: number,
  fallbackGroup: QuestionGroup,
  categoryHint?: string | null,
  answer?: string | null
): Question {
  if (typeof raw === "string") {
    const text = raw.trim();
    return {
      id: `q${index + 1}`,
      text,
      category: categoryHint?.trim() || classifyCategory(text, answer ?? ""),
      group: fallbackGroup,
    };
  }
  const text = (raw.text ?? raw.question ?? "").trim();
  return {
    id: raw.id != null ? String(raw.id) : `q${index + 1}`,
    text,
    category:
      raw.category?.trim() ||
      categoryHint?.trim() ||
      classifyCategory(text, answer ?? ""),
    group: toQuestionGroup(raw.group, fallbackGroup),
  };
}

/**
 * Normalizes a cached-report or summary payload into ReportData.
 * Missing ticker/period fields fall back to the query that produced the payload.
 */
export function normalizeReportData(
  payload: unknown,
  query: ReportQuery,
  fallbackGroup: QuestionGroup = "brief"
): ReportData {
  const parsed = rawReportSchema.safeParse(unwrapData(payload));
  if (!parsed.success) {
    throw new ApiError("Unexpected report response shape from financial API", undefined, {
      issues: parsed.error.issues.map((i) => i.message),
    });
  }
  const raw = parsed.data;
  const items = raw.answers ?? raw.reports;
  if (!items) {
    throw new ApiError("Report response contains no answers");
  }

  const year = toInteger(raw.period?.year ?? raw.year) ?? query.year ?? null;
  if (year === null) {
    throw new ApiError("Report response is missing the report year");
  }
  const quarter = toInteger(raw.period?.quarter ?? raw.quarter) ?? query.quarter ?? null;

  const answers: AnswerItem[] = items.map((item, index) => ({
    question: toQuestion(item.question, index, fallbackGroup, item.category, item.answer),
    answer: item.answer ?? "",
  }));

  return {
    ticker: (raw.ticker ?? raw.symbol ?? query.ticker).trim().toUpperCase(),
    period: { year, quarter },
    answers,
  };
}

/**
 * Reshapes a report payload (API envelope, top-level year/quarter,
 * `reports` list, string questions) into the ReportData layout without
 * validating it. Unreadable input is returned as is.
 */
export function reshapeReportPayload(payload: unknown): unknown {
  const parsed = rawReportSchema.safeParse(unwrapData(payload));
  if (!parsed.success) return unwrapData(payload);
  const raw = parsed.data;
  const items = raw.answers ?? raw.reports;
  return {
    ticker: (raw.ticker ?? raw.symbol)?.trim().toUpperCase(),
    period: {
      year: toInteger(raw.period?.year ?? raw.year) ?? undefined,
      quarter: toInteger(raw.period?.quarter ?? raw.quarter),
    },
    answers: items?.map((item, index) => ({
      question: toQuestion(item.question, index, "brief", item.category, item.answer),
      answer: item.answer ?? "",
    })),
  };
}

export function normalizePeriods(payload: unknown): CachedPeriod[] {
  const data = unwrapData(payload);
  const parsed = z.array(rawPeriodSchema).safeParse(data);
  if (!parsed.success) {
    throw new ApiError("Unexpected periods response shape: 'data' should be a list");
  }
  const periods: CachedPeriod[] = [];
  for (const row of parsed.data) {
    const year = toInteger(row.year);
    if (year === null) continue;
    periods.push({
      ticker: (row.ticker ?? row.symbol ?? "UNKNOWN").trim().toUpperCase(),
      year,
      quarter: toInteger(row.quarter),
    });
  }
  return periods;
}

export function normalizeQuestions(
  payload: unknown,
  fallbackGroup: QuestionGroup = "brief"
): Question[] {
  let data = unwrapData(payload);
  // Some deployments answer with { questions: [...] }
  if (data && typeof data === "object" && "questions" in data) {
    data = data.questions;
  }
  const parsed = z.array(rawQuestionSchema).safeParse(data);
  if (!parsed.success) {
    throw new ApiError("Unexpected questions response shape: expected a list");
  }
  return parsed.data
    .map((raw, index) => toQuestion(raw, index, fallbackGroup))
    .filter((question) => question.text.length > 0);
}
