import { z } from "zod";
import type { CachedPeriod, ReportData } from "./domain/types";
import { reshapeReportPayload } from "./infrastructure/normalize";

/**
 * Input schemas shared by the blocks.
 */

// Hosts send unset optional inputs as null or ""
export const apiKeySchema = z
  .string()
  .trim()
  .nullish()
  .transform((value) => value || undefined)
  .describe("Resolved API credential; falls back to FIN_API_KEY");

export const baseUrlSchema = z
  .union([z.literal(""), z.string().trim().url("base_url must be a URL")])
  .nullish()
  .transform((value) => value || undefined)
  .describe("Overrides FIN_API_BASE_URL for this call");

export const tickerSchema = z
  .string({ required_error: "ticker is required" })
  .trim()
  .min(1, "ticker must not be empty")
  .max(16, "ticker is too long")
  .transform((value) => value.toUpperCase())
  .describe("Stock exchange symbol, e.g. AAPL");

export const optionalTickerSchema = z
  .string()
  .trim()
  .max(16, "ticker is too long")
  .nullish()
  .transform((value) => (value ? value.toUpperCase() : undefined));

export const yearSchema = z
  .number()
  .int("year must be an integer")
  .min(1900)
  .max(2100)
  .nullish()
  .transform((value) => value ?? undefined);

export const quarterSchema = z
  .number()
  .int("quarter must be an integer")
  .min(1, "quarter must be between 1 and 4")
  .max(4, "quarter must be between 1 and 4")
  .nullish()
  .transform((value) => value ?? undefined);

const questionGroupEnum = z.enum(["brief", "detailed"]);

export const questionGroupSchema = questionGroupEnum
  .nullish()
  .transform((value) => value ?? "brief");

/** No default: an absent group means "all groups" */
export const optionalQuestionGroupSchema = questionGroupEnum
  .nullish()
  .transform((value) => value ?? undefined);

export const timeoutSchema = z
  .number()
  .positive("timeout must be positive")
  .nullish()
  .transform((value) => value ?? undefined)
  .describe("Per-attempt timeout in milliseconds");

export const reportQueryFields = {
  ticker: tickerSchema,
  year: yearSchema,
  quarter: quarterSchema,
};

export interface ParsedReportPeriod {
  year: number;
  quarter?: number;
}

/**
 * Reads "2023", "FY2023", "2023Q4", "2023-Q4" or "Q4 2023".
 */
export function parseReportPeriod(value: string): ParsedReportPeriod | undefined {
  const compact = value.trim().toUpperCase();
  const yearFirst = compact.match(/^(?:FY\s*)?(\d{4})(?:\s*[-_ ]?\s*Q([1-4]))?$/);
  if (yearFirst) {
    return yearFirst[2]
      ? { year: Number(yearFirst[1]), quarter: Number(yearFirst[2]) }
      : { year: Number(yearFirst[1]) };
  }
  const quarterFirst = compact.match(/^Q([1-4])\s*[-_ ]?\s*(\d{4})$/);
  if (quarterFirst) {
    return { year: Number(quarterFirst[2]), quarter: Number(quarterFirst[1]) };
  }
  return undefined;
}

export const reportPeriodSchema = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (!value || !value.trim()) return undefined;
    const parsed = parseReportPeriod(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${value}" is not a report period; use 2023, 2023Q4 or Q4 2023`,
      });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * Accepts a string array, a JSON array string, or a single question string.
 */
export const questionsSchema = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => parseQuestions(value));

export function parseQuestions(
  value: string[] | string | null | undefined
): string[] | undefined {
  if (value === null || value === undefined) return undefined;
  if (Array.isArray(value)) return cleanList(value);
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  const decoded = decodeJsonList(trimmed);
  return decoded ? cleanList(decoded) : [trimmed];
}

function decodeJsonList(raw: string): string[] | undefined {
  if (!raw.startsWith("[")) return undefined;
  try {
    const parsed = z.array(z.string()).safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function cleanList(values: string[]): string[] | undefined {
  const cleaned = values.map((v) => v.trim()).filter((v) => v.length > 0);
  return cleaned.length > 0 ? cleaned : undefined;
}

const nullableQuarter = z
  .number()
  .int()
  .min(1)
  .max(4)
  .nullish()
  .transform((value) => value ?? null);

/**
 * Report data as produced by the report blocks, or as the API returns it
 * (`{data: {...}}`, top-level year/quarter, a `reports` list).
 */
export const reportDataSchema: z.ZodType<ReportData, z.ZodTypeDef, unknown> = z.preprocess(
  reshapeReportPayload,
  z.object({
    ticker: z.string().trim().min(1, "report_data.ticker must not be empty"),
    period: z.object({
      year: z.number().int(),
      quarter: nullableQuarter,
    }),
    answers: z.array(
      z.object({
        question: z.object({
          id: z.string(),
          text: z.string(),
          category: z.string().default("general"),
          group: questionGroupEnum.default("brief"),
        }),
        answer: z.string(),
      })
    ),
  })
);

export const cachedPeriodSchema: z.ZodType<CachedPeriod, z.ZodTypeDef, unknown> = z.object({
  ticker: z.string().trim().min(1),
  year: z.number().int(),
  quarter: nullableQuarter,
});
