/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer explicit STAGE; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // Absence of Lambda execution env implies local (CLI or tests)
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return process.env.IS_LOCAL === "true" || !isLambda;
}

export interface GetEnvVarOptions<T> {
  parse: (raw: string) => T;
  defaultValue?: T;
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

function readRaw(name: string, stageAware: boolean): string | undefined {
  const candidate = stageAware
    ? process.env[`${name}__${getStage()}`] ?? process.env[name]
    : process.env[name];
  return candidate != null && candidate !== "" ? candidate : undefined;
}

/**
 * Reads an environment variable with fallbacks and parsing.
 * - If `stageAware` is true (default), checks NAME__<stage> first (e.g., NEWS_API_KEY__prod), then NAME.
 * - If not found, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>
): T | undefined {
  const stageAware = options.stageAware !== false;
  const raw = readRaw(name, stageAware);

  if (raw !== undefined) return options.parse(raw);

  if (options.defaultValue !== undefined) return options.defaultValue;

  if (options.required) {
    const tried = stageAware ? `${name}__${getStage()} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }

  return undefined;
}

export function getString(name: string): string | undefined;
export function getString(name: string, defaultValue: string): string;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name, { defaultValue, parse: raw => raw });
}

export function requireString(name: string): string {
  const value = getEnvVar(name, { required: true, parse: raw => raw });
  if (value === undefined) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function parseNumber(name: string) {
  return (raw: string): number => {
    const n = Number(raw);
    if (Number.isNaN(n))
      throw new Error(`Env var ${name} is not a number: ${raw}`);
    return n;
  };
}

export function getNumber(name: string): number | undefined;
export function getNumber(name: string, defaultValue: number): number;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  return getEnvVar(name, { defaultValue, parse: parseNumber(name) });
}

function parseBoolean(name: string) {
  return (raw: string): boolean => {
    const lowered = raw.toLowerCase();
    if (["1", "true", "yes", "y"].includes(lowered)) return true;
    if (["0", "false", "no", "n"].includes(lowered)) return false;
    throw new Error(`Env var ${name} is not a boolean: ${raw}`);
  };
}

export function getBoolean(name: string): boolean | undefined;
export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  return getEnvVar(name, { defaultValue, parse: parseBoolean(name) });
}
