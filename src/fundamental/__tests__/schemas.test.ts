import {
  parseQuestions,
  parseReportPeriod,
  reportDataSchema,
  reportPeriodSchema,
  tickerSchema,
  yearSchema,
} from "../schemas";

describe("parseQuestions", () => {
  it("parses JSON arrays and trims entries", () => {
    expect(parseQuestions('["Revenue?", "  Margins? ", ""]')).toEqual(["Revenue?", "Margins?"]);
  });

  it("treats other strings as a single question", () => {
    expect(parseQuestions("What is the outlook?")).toEqual(["What is the outlook?"]);
    expect(parseQuestions("[not json")).toEqual(["[not json"]);
  });

  it("returns undefined for empty input", () => {
    expect(parseQuestions("   ")).toBeUndefined();
    expect(parseQuestions(["", " "])).toBeUndefined();
    expect(parseQuestions(null)).toBeUndefined();
  });
});

describe("parseReportPeriod", () => {
  it.each([
    ["2023", { year: 2023 }],
    ["fy2023", { year: 2023 }],
    ["2023Q4", { year: 2023, quarter: 4 }],
    ["2023-q1", { year: 2023, quarter: 1 }],
    ["Q2 2024", { year: 2024, quarter: 2 }],
  ])("reads %s", (input, expected) => {
    expect(parseReportPeriod(input)).toEqual(expected);
  });

  it("rejects unknown formats", () => {
    expect(parseReportPeriod("H1 2023")).toBeUndefined();
    expect(reportPeriodSchema.safeParse("2023Q5").success).toBe(false);
    expect(reportPeriodSchema.parse("")).toBeUndefined();
  });
});

describe("field schemas", () => {
  it("upper-cases tickers and rejects empty ones", () => {
    expect(tickerSchema.parse(" aapl ")).toBe("AAPL");
    expect(tickerSchema.safeParse("  ").success).toBe(false);
  });

  it("maps null years to undefined and rejects fractions", () => {
    expect(yearSchema.parse(null)).toBeUndefined();
    expect(yearSchema.safeParse(2023.5).success).toBe(false);
  });

  it("reads report data in the API envelope layout", () => {
    const parsed = reportDataSchema.parse({
      data: {
        ticker: "msft",
        year: 2024,
        quarter: 2,
        reports: [{ question: "How did cash flow develop?", answer: "Strong." }],
      },
    });
    expect(parsed).toEqual({
      ticker: "MSFT",
      period: { year: 2024, quarter: 2 },
      answers: [
        {
          question: {
            id: "q1",
            text: "How did cash flow develop?",
            category: "financial",
            group: "brief",
          },
          answer: "Strong.",
        },
      ],
    });
  });

  it("reports a missing year in report data", () => {
    const result = reportDataSchema.safeParse({ ticker: "AAPL", answers: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path)).toEqual([["period", "year"]]);
    }
  });

  it("fills question defaults in report data", () => {
    const parsed = reportDataSchema.parse({
      ticker: "AAPL",
      period: { year: 2023 },
      answers: [{ question: { id: "a", text: "Q?" }, answer: "A." }],
    });
    expect(parsed).toEqual({
      ticker: "AAPL",
      period: { year: 2023, quarter: null },
      answers: [
        { question: { id: "a", text: "Q?", category: "general", group: "brief" }, answer: "A." },
      ],
    });
  });
});
