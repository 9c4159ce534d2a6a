/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function getStage(): string {
  // Explicit STAGE wins; otherwise derive from NODE_ENV
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isLocal(): boolean {
  // The workflow host marks its runners with BLOCK_RUNTIME; anything else is a dev machine
  if (process.env.IS_LOCAL === "true") return true;
  return !process.env.BLOCK_RUNTIME;
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse?: (raw: string) => T;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads an environment variable with fallbacks and optional parsing.
 * - If `stageAware` is true, checks NAME__<stage> first (e.g., FIN_API_KEY__prod), then NAME.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar(
  name: string,
  options?: GetEnvVarOptions<string>
): string | undefined;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> & { parse: (raw: string) => T }
): T | undefined;
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T> = {}
): T | string | undefined {
  const stage = getStage();
  const stageKey = `${name}__${stage}`;
  const stageAware = options.stageAware !== false; // default true

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") {
    return options.parse ? options.parse(candidate) : candidate;
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue });
}

export function getNumber(name: string, defaultValue: number): number;
export function getNumber(name: string): number | undefined;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar<number>(name, {
    defaultValue,
    parse: (raw) => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
}

export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(name: string): boolean | undefined;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar<boolean>(name, {
    defaultValue,
    parse: (raw) => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
}

