import type { CachedPeriod } from "../../fundamental/domain/types";

export interface PeriodsMarkdown {
  markdown: string;
  count: number;
}

function formatTimestamp(now: Date): string {
  return `${now.toISOString().replace("T", " ").slice(0, 19)} UTC`;
}

function periodLabel(period: CachedPeriod): string {
  return period.quarter != null
    ? `Q${period.quarter} ${period.year}`
    : `FY ${period.year}`;
}

/**
 * Lists cached periods grouped by ticker (alphabetical), each ticker as a
 * table sorted by year then quarter.
 */
export function renderPeriodsMarkdown(
  periods: CachedPeriod[],
  now: Date = new Date()
): PeriodsMarkdown {
  const lines: string[] = [
    "# Cached Report Periods",
    "",
    `*Generated on: ${formatTimestamp(now)}*`,
    "",
    `**Total Periods Available: ${periods.length}**`,
    "",
  ];

  if (periods.length === 0) {
    lines.push("No cached periods available.");
    return { markdown: lines.join("\n"), count: 0 };
  }

  const byTicker = new Map<string, CachedPeriod[]>();
  for (const period of periods) {
    const bucket = byTicker.get(period.ticker) ?? [];
    bucket.push(period);
    byTicker.set(period.ticker, bucket);
  }

  lines.push("## Available Periods by Ticker", "");

  const tickers = Array.from(byTicker.keys()).sort();
  for (const ticker of tickers) {
    const sorted = [...(byTicker.get(ticker) ?? [])].sort(
      (a, b) => a.year - b.year || (a.quarter ?? 0) - (b.quarter ?? 0)
    );
    lines.push(`### ${ticker}`, "", "| Year | Quarter | Period |", "|------|---------|--------|");
    for (const period of sorted) {
      lines.push(
        `| ${period.year} | ${period.quarter ?? "N/A"} | ${periodLabel(period)} |`
      );
    }
    lines.push("");
  }

  return { markdown: lines.join("\n"), count: periods.length };
}
