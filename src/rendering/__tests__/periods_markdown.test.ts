import { renderPeriodsMarkdown } from "../markdown/periods_markdown";

const now = new Date("2024-01-02T03:04:05.678Z");

describe("renderPeriodsMarkdown", () => {
  it("groups periods by ticker and sorts them", () => {
    const { markdown, count } = renderPeriodsMarkdown(
      [
        { ticker: "MSFT", year: 2022, quarter: null },
        { ticker: "AAPL", year: 2023, quarter: 4 },
        { ticker: "AAPL", year: 2023, quarter: 1 },
        { ticker: "AAPL", year: 2022, quarter: null },
      ],
      now
    );

    expect(count).toBe(4);
    expect(markdown.split("\n")).toEqual([
      "# Cached Report Periods",
      "",
      "*Generated on: 2024-01-02 03:04:05 UTC*",
      "",
      "**Total Periods Available: 4**",
      "",
      "## Available Periods by Ticker",
      "",
      "### AAPL",
      "",
      "| Year | Quarter | Period |",
      "|------|---------|--------|",
      "| 2022 | N/A | FY 2022 |",
      "| 2023 | 1 | Q1 2023 |",
      "| 2023 | 4 | Q4 2023 |",
      "",
      "### MSFT",
      "",
      "| Year | Quarter | Period |",
      "|------|---------|--------|",
      "| 2022 | N/A | FY 2022 |",
      "",
    ]);
  });

  it("states when nothing is cached", () => {
    const { markdown, count } = renderPeriodsMarkdown([], now);
    expect(count).toBe(0);
    expect(markdown.split("\n").pop()).toBe("No cached periods available.");
  });
});
