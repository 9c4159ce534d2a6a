/**
 * Domain types for cached fundamental reports.
 */
export type QuestionGroup = "brief" | "detailed";

export interface ReportQuery {
  ticker: string;
  year?: number;
  quarter?: number;
}

export interface ReportPeriod {
  year: number;
  quarter: number | null;
}

export interface Question {
  id: string;
  text: string;
  category: string;
  group: QuestionGroup;
}

export interface AnswerItem {
  question: Question;
  answer: string;
}

export interface ReportData {
  ticker: string;
  period: ReportPeriod;
  answers: AnswerItem[];
}

export interface CachedPeriod {
  ticker: string;
  year: number;
  quarter: number | null;
}

export type AnalysisType =
  | "cached_report"
  | "cached_periods"
  | "predefined_questions"
  | "report_summary";

/**
 * "2023Q4" when the quarter is known, "2023" for full-year data.
 */
export function formatPeriod(period: ReportPeriod): string {
  return period.quarter != null
    ? `${period.year}Q${period.quarter}`
    : `${period.year}`;
}
