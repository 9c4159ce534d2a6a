import path from "path";
import {
  AnswerItem,
  formatPeriod,
  ReportData,
} from "../../fundamental/domain/types";
import { getLogger } from "../../util/logger";
import { sanitizeFilename, withExtension, writeFileAtomic } from "../files";

/**
 * Markdown rendering for report data.
 *
 * Layout: title, metadata list, then one numbered section per question
 * category (first-appearance order) with one numbered sub-heading per
 * question. Answers are copied verbatim. Output carries no timestamps, so the
 * same input always renders the same bytes.
 */

export interface MarkdownRenderOptions {
  companyName?: string;
  outputFilename?: string;
  outputDir: string;
}

export interface RenderedMarkdown {
  content: string;
  path: string;
  title: string;
}

export function buildReportTitle(
  report: ReportData,
  companyName?: string
): string {
  const name = companyName?.trim() || report.ticker;
  return `${name} Financial Analysis Report (${formatPeriod(report.period)})`;
}

export function humanizeCategory(category: string): string {
  const words = category
    .trim()
    .split(/[\s_-]+/)
    .filter(Boolean);
  if (words.length === 0) return "General";
  return words
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Groups answers by category, keeping first-appearance order of categories
 * and the original order within each category.
 */
export function groupByCategory(
  answers: AnswerItem[]
): Array<{ category: string; items: AnswerItem[] }> {
  const groups = new Map<string, AnswerItem[]>();
  for (const item of answers) {
    const key = item.question.category;
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return Array.from(groups, ([category, items]) => ({ category, items }));
}

function headingText(item: AnswerItem): string {
  const text = item.question.text.replace(/\s+/g, " ").trim();
  return text || `Question ${item.question.id}`;
}

export function buildReportMarkdown(
  report: ReportData,
  companyName?: string
): { content: string; title: string } {
  const title = buildReportTitle(report, companyName);
  const lines: string[] = [
    `# ${title}`,
    "",
    `- **Ticker:** ${report.ticker}`,
    `- **Period:** ${formatPeriod(report.period)}`,
    `- **Questions:** ${report.answers.length}`,
    "",
    "---",
    "",
  ];

  if (report.answers.length === 0) {
    lines.push("_No answers available for this period._", "");
  }

  groupByCategory(report.answers).forEach(({ category, items }, sectionIndex) => {
    const section = sectionIndex + 1;
    lines.push(`## ${section}. ${humanizeCategory(category)}`, "");
    items.forEach((item, itemIndex) => {
      lines.push(
        `### ${section}.${itemIndex + 1} ${headingText(item)}`,
        "",
        item.answer,
        "",
        "---",
        ""
      );
    });
  });

  return { content: lines.join("\n"), title };
}

export function defaultMarkdownFilename(report: ReportData): string {
  return `${sanitizeFilename(report.ticker)}_${formatPeriod(report.period)}_financial_report.md`;
}

/**
 * Renders the report and writes it under `options.outputDir`.
 * Throws IOError when the file cannot be written.
 */
export async function renderReportMarkdown(
  report: ReportData,
  options: MarkdownRenderOptions
): Promise<RenderedMarkdown> {
  const logger = getLogger("rendering/report_markdown");
  const { content, title } = buildReportMarkdown(report, options.companyName);
  const filename = options.outputFilename?.trim()
    ? withExtension(sanitizeFilename(options.outputFilename), ".md")
    : defaultMarkdownFilename(report);
  const filePath = path.resolve(options.outputDir, filename);

  await writeFileAtomic(filePath, content);
  logger.info(
    { path: filePath, answers: report.answers.length, bytes: Buffer.byteLength(content) },
    "markdown report written"
  );

  return { content, path: filePath, title };
}
