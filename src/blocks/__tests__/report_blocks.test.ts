import {
  appleSummaryPayload,
  jsonResponse,
  makeDeps,
  queuedFetch,
  TEST_API_KEY,
} from "@src/fundamental/__tests__/fake_api";
import { createFinancialReportAnalyzerBlock } from "../financial_report_analyzer";
import { createGenerateReportSummaryBlock } from "../generate_report_summary";
import { createGetCachedPeriodsBlock } from "../get_cached_periods";
import { createGetCachedReportBlock } from "../get_cached_report";
import { createGetPredefinedQuestionsBlock } from "../get_predefined_questions";

describe("get_cached_report block", () => {
  it("returns normalized report data", async () => {
    const fetch = queuedFetch([jsonResponse(200, appleSummaryPayload)]);
    const block = createGetCachedReportBlock(() => makeDeps(fetch));

    const out = await block.run({ api_key: TEST_API_KEY, ticker: "aapl", year: 2023 });

    expect(out.status).toBe("success");
    expect(out.message).toBe("Retrieved cached report for AAPL 2023 with 3 answers");
    expect(out.report_data?.answers).toHaveLength(3);
    expect(fetch.mock.calls[0][0]).toBe(
      "https://api.test/api/fundamental/cached_report?ticker=AAPL&year=2023"
    );
  });

  it.each([
    [{ ticker: "" }, "Invalid input - ticker: ticker must not be empty"],
    [{ ticker: "AAPL", quarter: 5 }, "Invalid input - quarter: quarter must be between 1 and 4"],
    [{ ticker: "AAPL", year: 2023.5 }, "Invalid input - year: year must be an integer"],
  ])("rejects %j before any request", async (inputs, message) => {
    const fetch = queuedFetch([]);
    const block = createGetCachedReportBlock(() => makeDeps(fetch));

    const out = await block.run({ api_key: TEST_API_KEY, ...inputs });

    expect(out).toEqual({
      report_data: null,
      status: "error",
      message,
      error_kind: "validation",
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("requires an api key from inputs or configuration", async () => {
    const fetch = queuedFetch([jsonResponse(200, appleSummaryPayload)]);
    const missing = createGetCachedReportBlock(() => makeDeps(fetch));

    const failed = await missing.execute({ ticker: "AAPL" });
    expect(failed).toEqual({
      status: "error",
      kind: "validation",
      message: "api_key is required (pass it as an input or set FIN_API_KEY)",
    });
    expect(fetch).not.toHaveBeenCalled();

    const configured = createGetCachedReportBlock(() =>
      makeDeps(fetch, { config: { apiKey: TEST_API_KEY } })
    );
    const ok = await configured.execute({ ticker: "AAPL", api_key: null });
    expect(ok.status).toBe("success");
    expect(fetch.mock.calls[0][1].headers.Authorization).toBe("Bearer test-secret");
  });

  it("reports a missing cached report as not found", async () => {
    const fetch = queuedFetch([jsonResponse(404, { detail: "no report" })]);
    const block = createGetCachedReportBlock(() => makeDeps(fetch));

    const result = await block.execute({
      api_key: TEST_API_KEY,
      ticker: "ZZZZ",
      year: 2023,
      quarter: 2,
    });

    expect(result).toEqual({
      status: "error",
      kind: "not_found",
      message: "No cached report data found for ZZZZ 2023Q2. Try a different ticker or period.",
    });
  });

  it("turns unexpected failures into internal errors", async () => {
    const block = createGetCachedReportBlock(() => {
      throw new Error("boom");
    });

    const result = await block.execute({ api_key: TEST_API_KEY, ticker: "AAPL" });

    expect(result).toEqual({
      status: "error",
      kind: "internal",
      message: "Unexpected error: boom",
    });
  });
});

describe("get_cached_periods block", () => {
  it("filters periods to the requested ticker", async () => {
    const fetch = queuedFetch([
      jsonResponse(200, {
        data: [
          { ticker: "AAPL", year: 2023, quarter: 4 },
          { ticker: "MSFT", year: 2023, quarter: 4 },
        ],
      }),
    ]);
    const block = createGetCachedPeriodsBlock(() => makeDeps(fetch));

    const out = await block.run({ api_key: TEST_API_KEY, ticker: "aapl" });

    expect(out).toEqual({
      periods_list: [{ ticker: "AAPL", year: 2023, quarter: 4 }],
      status: "success",
      message: "Retrieved 1 cached periods for AAPL",
    });
    expect(fetch.mock.calls[0][0]).toBe(
      "https://api.test/api/fundamental/cached_report_periods?ticker=AAPL"
    );
  });
});

describe("get_predefined_questions block", () => {
  it("keeps questions of the requested group", async () => {
    const fetch = queuedFetch([
      jsonResponse(200, {
        data: [
          { id: "q1", text: "Revenue?", group: "brief" },
          { id: "q2", text: "Moat?", group: "detailed" },
        ],
      }),
    ]);
    const block = createGetPredefinedQuestionsBlock(() => makeDeps(fetch));

    const out = await block.run({ api_key: TEST_API_KEY, question_group: "detailed" });

    expect(out).toEqual({
      questions_list: [{ id: "q2", text: "Moat?", category: "general", group: "detailed" }],
      status: "success",
      message: 'Retrieved 1 predefined questions in group "detailed"',
    });
  });
});

describe("generate_report_summary block", () => {
  it("posts the question group and custom questions", async () => {
    const fetch = queuedFetch([jsonResponse(200, appleSummaryPayload)]);
    const block = createGenerateReportSummaryBlock(() => makeDeps(fetch));

    const out = await block.run({
      api_key: TEST_API_KEY,
      ticker: "AAPL",
      year: 2023,
      quarter: null,
      questions: '["What about buybacks?"]',
    });

    expect(out.status).toBe("success");
    expect(out.message).toBe("Generated brief summary for AAPL 2023 with 3 answers");
    expect(out.summary_result?.period).toEqual({ year: 2023, quarter: null });
    expect(fetch.mock.calls[0][1].body).toBe(
      '{"company_symbol":"AAPL","report_period":"2023","question_group":"brief","questions":["What about buybacks?"]}'
    );
  });

  it("rejects an empty ticker before any request", async () => {
    const fetch = queuedFetch([]);
    const block = createGenerateReportSummaryBlock(() => makeDeps(fetch));

    const out = await block.run({ api_key: TEST_API_KEY, ticker: "  ", year: 2023 });

    expect(out).toEqual({
      summary_result: null,
      status: "error",
      message: "Invalid input - ticker: ticker must not be empty",
      error_kind: "validation",
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("sends the request to base_url when given", async () => {
    const fetch = queuedFetch([jsonResponse(200, appleSummaryPayload)]);
    const block = createGenerateReportSummaryBlock(() => makeDeps(fetch));

    const out = await block.run({
      api_key: TEST_API_KEY,
      ticker: "AAPL",
      year: 2023,
      base_url: "https://staging.api.test/",
    });

    expect(out.status).toBe("success");
    expect(fetch.mock.calls[0][0]).toBe(
      "https://staging.api.test/api/fundamental/report_summary"
    );
  });

  it("uses the summary timeout for the request", async () => {
    const fetch = queuedFetch([jsonResponse(200, appleSummaryPayload)]);
    const deps = makeDeps(fetch, { config: { summaryTimeoutMs: 4321 } });
    const request = jest.spyOn(deps.client, "request");
    const block = createGenerateReportSummaryBlock(() => deps);

    await block.execute({ api_key: TEST_API_KEY, ticker: "AAPL", year: 2023 });

    expect(request.mock.calls[0][2].timeoutMs).toBe(4321);
  });
});

describe("financial_report_analyzer block", () => {
  it("dispatches on analysis_type", async () => {
    const fetch = queuedFetch([jsonResponse(200, [{ ticker: "AAPL", year: 2022 }])]);
    const block = createFinancialReportAnalyzerBlock(() => makeDeps(fetch));

    const out = await block.run({ api_key: TEST_API_KEY, analysis_type: "cached_periods" });

    expect(out).toEqual({
      result: {
        analysis_type: "cached_periods",
        data: [{ ticker: "AAPL", year: 2022, quarter: null }],
      },
      status: "success",
      message: "Successfully completed cached_periods analysis",
    });
  });

  it("reads year and quarter from report_period", async () => {
    const fetch = queuedFetch([jsonResponse(200, appleSummaryPayload)]);
    const block = createFinancialReportAnalyzerBlock(() => makeDeps(fetch));

    const result = await block.execute({
      api_key: TEST_API_KEY,
      analysis_type: "report_summary",
      ticker: "AAPL",
      report_period: "2023Q4",
      questions: "Single question?",
    });

    expect(result.status).toBe("success");
    expect(fetch.mock.calls[0][1].body).toBe(
      '{"company_symbol":"AAPL","report_period":"2023Q4","question_group":"brief","questions":["Single question?"]}'
    );
  });

  it.each(["cached_report", "report_summary"])(
    "rejects an empty ticker for %s before any request",
    async (analysisType) => {
      const fetch = queuedFetch([]);
      const block = createFinancialReportAnalyzerBlock(() => makeDeps(fetch));

      const out = await block.run({
        api_key: TEST_API_KEY,
        analysis_type: analysisType,
        ticker: "",
        year: 2023,
      });

      expect(out).toEqual({
        result: null,
        status: "error",
        message: "Invalid input - ticker: ticker must not be empty",
        error_kind: "validation",
      });
      expect(fetch).not.toHaveBeenCalled();
    }
  );

  it("rejects a base_url that is not a URL", async () => {
    const fetch = queuedFetch([]);
    const block = createFinancialReportAnalyzerBlock(() => makeDeps(fetch));

    const out = await block.run({
      api_key: TEST_API_KEY,
      analysis_type: "cached_periods",
      base_url: "not a url",
    });

    expect(out.error_kind).toBe("validation");
    expect(out.message).toBe("Invalid input - base_url: base_url must be a URL");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("rejects unknown analysis types", async () => {
    const fetch = queuedFetch([]);
    const block = createFinancialReportAnalyzerBlock(() => makeDeps(fetch));

    const result = await block.execute({ api_key: TEST_API_KEY, analysis_type: "forecast" });

    expect(result.status).toBe("error");
    if (result.status !== "error") return;
    expect(result.kind).toBe("validation");
    expect(result.message.startsWith("Invalid input - analysis_type: ")).toBe(true);
    expect(fetch).not.toHaveBeenCalled();
  });
});
