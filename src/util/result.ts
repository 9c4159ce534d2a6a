import { ErrorKind, toBlockError } from "./errors";

/**
 * Envelope returned by every block. Blocks MUST NOT throw; callers branch on `status`.
 */
export type BlockResult<TPayload> =
  | { status: "success"; message: string; payload: TPayload }
  | { status: "error"; kind: ErrorKind; message: string };

export function success<TPayload>(
  payload: TPayload,
  message: string
): BlockResult<TPayload> {
  return { status: "success", message, payload };
}

export function failure<TPayload = never>(err: unknown): BlockResult<TPayload> {
  const blockError = toBlockError(err);
  return { status: "error", kind: blockError.kind, message: blockError.message };
}

export function isSuccess<TPayload>(
  result: BlockResult<TPayload>
): result is { status: "success"; message: string; payload: TPayload } {
  return result.status === "success";
}
