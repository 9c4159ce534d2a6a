import { z } from "zod";
import { ErrorKind, ValidationError, toBlockError } from "../util/errors";
import { withBlockContext } from "../util/logger";
import { BlockResult, failure, success } from "../util/result";

/**
 * Invocation details the host passes alongside the inputs.
 */
export interface BlockContext {
  invocationId?: string;
  flowId?: string;
  signal?: AbortSignal;
}

export interface HandlerOutcome<TPayload> {
  payload: TPayload;
  message: string;
}

/**
 * Flat output record handed back to the host: the block's own fields plus
 * the status/message pair. Fields are null when the block failed.
 */
export type BlockOutputs<TFields> = TFields & {
  status: "success" | "error";
  message: string;
  error_kind?: ErrorKind;
};

export interface Block<TInput, TPayload, TFields> {
  name: string;
  description: string;
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  /** Validates and runs; never throws */
  execute(rawInputs: unknown, context?: BlockContext): Promise<BlockResult<TPayload>>;
  /** `execute` mapped onto the host output contract */
  run(rawInputs: unknown, context?: BlockContext): Promise<BlockOutputs<TFields>>;
}

/**
 * Helper to define a block with input validation and unified error handling.
 * Handlers may throw; every failure is converted into the error branch of
 * BlockResult and logged.
 */
export function defineBlock<TInput, TPayload, TFields>(args: {
  name: string;
  description: string;
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  handler: (
    input: TInput,
    context: BlockContext
  ) => Promise<HandlerOutcome<TPayload>>;
  toOutputs: (payload: TPayload | null) => TFields;
}): Block<TInput, TPayload, TFields> {
  const { name, description, schema, handler, toOutputs } = args;

  const execute = async (
    rawInputs: unknown,
    context: BlockContext = {}
  ): Promise<BlockResult<TPayload>> => {
    const logger = withBlockContext(`blocks/${name}`, {
      invocationId: context.invocationId,
      flowId: context.flowId,
      blockName: name,
    });
    const startedAt = Date.now();
    try {
      const parsed = schema.safeParse(rawInputs ?? {});
      if (!parsed.success) {
        throw ValidationError.fromZod(parsed.error);
      }
      const outcome = await handler(parsed.data, context);
      logger.info({ durationMs: Date.now() - startedAt }, outcome.message);
      return success(outcome.payload, outcome.message);
    } catch (err) {
      const blockError = toBlockError(err);
      const fields = {
        kind: blockError.kind,
        details: blockError.details,
        durationMs: Date.now() - startedAt,
      };
      if (blockError.kind === "internal") {
        logger.error({ ...fields, err }, blockError.message);
      } else {
        logger.warn(fields, blockError.message);
      }
      return failure(blockError);
    }
  };

  const run = async (
    rawInputs: unknown,
    context?: BlockContext
  ): Promise<BlockOutputs<TFields>> => {
    const result = await execute(rawInputs, context);
    if (result.status === "success") {
      return { ...toOutputs(result.payload), status: "success", message: result.message };
    }
    return {
      ...toOutputs(null),
      status: "error",
      message: result.message,
      error_kind: result.kind,
    };
  };

  return { name, description, schema, execute, run };
}
