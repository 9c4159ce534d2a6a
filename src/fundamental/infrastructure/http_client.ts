/**
 * HTTP adapter for the financial data API.
 *
 * - Bearer auth on every request; GET params go to the query string, POST params to a JSON body
 * - Each attempt, body read included, is bounded by its own timeout
 * - Connection errors, attempt timeouts and 5xx responses are retried with exponential backoff
 * - Non-transient HTTP statuses map to the typed errors in util/errors
 */
import {
  ApiError,
  AuthenticationError,
  BlockError,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  errorMessage,
} from "../../util/errors";
import { getLogger } from "../../util/logger";
import { BlockResult, failure, success } from "../../util/result";
import {
  DEFAULT_BASE_URL,
  DEFAULT_RETRY_POLICY,
  RetryPolicy,
} from "./config";

export interface Endpoint {
  method: "GET" | "POST";
  path: string;
}

export const Endpoints = {
  cachedReport: { method: "GET", path: "/api/fundamental/cached_report" },
  cachedPeriods: {
    method: "GET",
    path: "/api/fundamental/cached_report_periods",
  },
  predefinedQuestions: {
    method: "GET",
    path: "/api/fundamental/predefined_report_questions",
  },
  reportSummary: { method: "POST", path: "/api/fundamental/report_summary" },
} as const satisfies Record<string, Endpoint>;

export type ParamValue = string | number | boolean | string[] | null | undefined;
export type RequestParams = Record<string, ParamValue>;

// Minimal fetch surface so tests can hand in plain stand-ins
export interface HttpRequestInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export type SleepFn = (ms: number) => Promise<void>;

export interface FinancialApiClientOptions {
  baseUrl?: string;
  retry?: RetryPolicy;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

export interface RequestOptions {
  apiKey: string;
  timeoutMs: number;
  signal?: AbortSignal;
  baseUrl?: string;
}

const defaultSleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows `attempt` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

export function buildUrl(
  baseUrl: string,
  path: string,
  params: RequestParams = {}
): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null || value === "") continue;
    if (Array.isArray(value)) {
      value.forEach((item) => query.append(key, item));
      continue;
    }
    query.set(key, String(value));
  }
  const qs = query.toString();
  const base = baseUrl.replace(/\/+$/, "");
  return qs ? `${base}${path}?${qs}` : `${base}${path}`;
}

function compactBody(params: RequestParams): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    body[key] = value;
  }
  return body;
}

type AttemptFailure =
  | { kind: "timeout" }
  | { kind: "cancelled" }
  | { kind: "network"; reason: string };

// Response with its body already read inside the attempt's timeout
interface ReadResponse {
  ok: boolean;
  status: number;
  text: string;
}

class AttemptError extends Error {
  constructor(public readonly failure: AttemptFailure) {
    super(failure.kind);
    this.name = "AttemptError";
  }
}

export class FinancialApiClient {
  private readonly baseUrl: string;
  private readonly retry: RetryPolicy;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly logger = getLogger("fundamental/http_client");

  constructor(options: FinancialApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Envelope form of `request`: never throws.
   */
  async call(
    endpoint: Endpoint,
    params: RequestParams,
    apiKey: string,
    timeoutMs: number
  ): Promise<BlockResult<unknown>> {
    try {
      const payload = await this.request(endpoint, params, {
        apiKey,
        timeoutMs,
      });
      return success(payload, `Successfully called ${endpoint.path}`);
    } catch (err) {
      return failure(err);
    }
  }

  /**
   * Issues the request with retries and returns the parsed JSON body.
   * Throws BlockError subclasses on failure.
   */
  async request(
    endpoint: Endpoint,
    params: RequestParams,
    options: RequestOptions
  ): Promise<unknown> {
    if (!options.apiKey || options.apiKey.trim() === "") {
      throw new ValidationError("api_key is required");
    }
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new ValidationError(
        `timeout must be a positive number of milliseconds, got ${options.timeoutMs}`
      );
    }

    const isGet = endpoint.method === "GET";
    const url = buildUrl(
      options.baseUrl ?? this.baseUrl,
      endpoint.path,
      isGet ? params : {}
    );
    const headers = {
      Authorization: `Bearer ${options.apiKey}`,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    const body = isGet ? undefined : JSON.stringify(compactBody(params));
    const maxAttempts = Math.max(1, this.retry.maxAttempts);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const isLast = attempt === maxAttempts;
      let response: ReadResponse;
      try {
        response = await this.attempt(
          url,
          { method: endpoint.method, headers, body },
          options
        );
      } catch (err) {
        if (!(err instanceof AttemptError)) throw err;
        const { failure: cause } = err;
        if (cause.kind === "cancelled") {
          throw new TimeoutError("Request was cancelled before completion", {
            path: endpoint.path,
            cancelled: true,
          });
        }
        const reason =
          cause.kind === "timeout"
            ? `timed out after ${options.timeoutMs}ms`
            : cause.reason;
        this.logger.warn(
          { path: endpoint.path, attempt, maxAttempts, reason },
          "financial api attempt failed"
        );
        if (isLast) {
          throw new TimeoutError(
            `Network connection failed after ${maxAttempts} attempts (${reason}). Please check connectivity and try again.`,
            { path: endpoint.path, attempts: maxAttempts }
          );
        }
        await this.sleep(backoffDelay(this.retry, attempt));
        continue;
      }

      if (response.status >= 500 && response.status < 600) {
        this.logger.warn(
          {
            path: endpoint.path,
            attempt,
            maxAttempts,
            status: response.status,
            detail: extractDetail(response.text),
          },
          "financial api server error"
        );
        if (isLast) {
          throw new ApiError(
            `Server error ${response.status}. Service may be temporarily unavailable.`,
            response.status,
            { path: endpoint.path, attempts: maxAttempts }
          );
        }
        await this.sleep(backoffDelay(this.retry, attempt));
        continue;
      }

      return this.parse(endpoint, response);
    }

    // maxAttempts >= 1 guarantees the loop returns or throws
    throw new ApiError(`No attempt was made for ${endpoint.path}`);
  }

  private async attempt(
    url: string,
    init: { method: string; headers: Record<string, string>; body?: string },
    options: RequestOptions
  ): Promise<ReadResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const external = options.signal;
    const onAbort = () => controller.abort();
    if (external?.aborted) {
      clearTimeout(timer);
      throw new AttemptError({ kind: "cancelled" });
    }
    external?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      const text = await readBody(response, controller.signal);
      return { ok: response.ok, status: response.status, text };
    } catch (err) {
      if (external?.aborted) throw new AttemptError({ kind: "cancelled" });
      if (timedOut) throw new AttemptError({ kind: "timeout" });
      throw new AttemptError({ kind: "network", reason: errorMessage(err) });
    } finally {
      clearTimeout(timer);
      external?.removeEventListener("abort", onAbort);
    }
  }

  private parse(endpoint: Endpoint, response: ReadResponse): unknown {
    const { text, status } = response;

    if (response.ok) {
      const parsed = tryParseJson(text);
      if (parsed === undefined) {
        throw new ApiError(
          "Retrieved data but failed to parse JSON response",
          status,
          { path: endpoint.path }
        );
      }
      return parsed;
    }

    const detail = extractDetail(text);
    const details = { path: endpoint.path, status };
    throw statusError(status, detail, details);
  }
}

function statusError(
  status: number,
  detail: string | undefined,
  details: Record<string, unknown>
): BlockError {
  const suffix = detail ? ` (${detail})` : "";
  switch (status) {
    case 400:
      return new ValidationError(
        `Bad request - invalid request parameters${suffix}`,
        details
      );
    case 401:
      return new AuthenticationError(
        "Authentication failed. Please check your API key.",
        details
      );
    case 403:
      return new AuthenticationError(
        "Access forbidden. Insufficient permissions for this endpoint.",
        details
      );
    case 404:
      return new NotFoundError(
        `No data found for the requested parameters${suffix}`,
        details
      );
    case 422:
      return new ValidationError(
        `Validation error. Please check ticker and report period format${suffix}`,
        details
      );
    case 429:
      return new RateLimitError(
        "Rate limit exceeded. Please retry after some time.",
        details
      );
    default:
      return new ApiError(
        `HTTP error ${status}${suffix}`,
        status,
        details
      );
  }
}

function extractDetail(text: string): string | undefined {
  if (!text) return undefined;
  const parsed = tryParseJson(text);
  if (parsed && typeof parsed === "object" && "detail" in parsed) {
    const detail = parsed.detail;
    return typeof detail === "string" ? detail : JSON.stringify(detail);
  }
  const trimmed = text.trim();
  return trimmed ? trimmed.slice(0, 200) : undefined;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads the body, rejecting as soon as the attempt is aborted even if the
 * response ignores the signal.
 */
function readBody(response: HttpResponse, signal: AbortSignal): Promise<string> {
  if (signal.aborted) return Promise.reject(new Error("aborted"));
  return new Promise<string>((resolve, reject) => {
    const onAbort = () => reject(new Error("aborted while reading the response body"));
    signal.addEventListener("abort", onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener("abort", onAbort);
        resolve(text);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
