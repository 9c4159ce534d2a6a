import type { FundamentalDependencies } from "../business/dependencies";
import {
  DEFAULT_RETRY_POLICY,
  FinancialApiConfig,
} from "../infrastructure/config";
import {
  FinancialApiClient,
  HttpRequestInit,
  HttpResponse,
  SleepFn,
} from "../infrastructure/http_client";

export const TEST_API_KEY = "test-secret";

export const testConfig: FinancialApiConfig = {
  baseUrl: "https://api.test",
  apiKey: undefined,
  timeoutMs: 1000,
  summaryTimeoutMs: 2000,
  retry: { ...DEFAULT_RETRY_POLICY },
  stage: "test",
};

export function jsonResponse(status: number, body: unknown): HttpResponse {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: String(status),
    text: async () => text,
  };
}

/**
 * fetch stand-in answering from a queue; an Error entry is thrown as a
 * connection failure.
 */
export function queuedFetch(responses: Array<HttpResponse | Error>) {
  const queue = [...responses];
  return jest.fn<Promise<HttpResponse>, [string, HttpRequestInit]>(async () => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected request");
    if (next instanceof Error) throw next;
    return next;
  });
}

export function recordingSleep() {
  return jest.fn<ReturnType<SleepFn>, Parameters<SleepFn>>(async () => undefined);
}

export function makeDeps(
  fetch: jest.Mock<Promise<HttpResponse>, [string, HttpRequestInit]>,
  options: { sleep?: SleepFn; config?: Partial<FinancialApiConfig> } = {}
): FundamentalDependencies {
  const config = { ...testConfig, ...options.config };
  return {
    config,
    client: new FinancialApiClient({
      baseUrl: config.baseUrl,
      retry: config.retry,
      fetch,
      sleep: options.sleep ?? (async () => undefined),
    }),
  };
}

export const appleSummaryPayload = {
  data: {
    ticker: "AAPL",
    year: 2023,
    quarter: null,
    answers: [
      {
        question: {
          id: "rev",
          text: "How did revenue develop?",
          category: "financial_performance",
          group: "brief",
        },
        answer: "Revenue declined 3% year over year to $383.3B.",
      },
      {
        question: {
          id: "risk",
          text: "What are the main risks?",
          category: "risk_factors",
          group: "brief",
        },
        answer: "Supply chain concentration and regulatory pressure.",
      },
      {
        question: {
          id: "margin",
          text: "How did gross margin change?",
          category: "financial_performance",
          group: "brief",
        },
        answer: "Gross margin expanded to 44.1%.",
      },
    ],
  },
};
