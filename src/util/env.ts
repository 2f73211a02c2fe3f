/**
 * Environment utilities for stage detection and safe env var access.
 */
import { ConfigError } from "./errors";

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

export interface GetEnvVarOptions {
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads an environment variable.
 * - If `stageAware` is true (default), checks NAME__<stage> first
 *   (e.g. COPPER_CSV_FILE__prod), then NAME.
 * - Empty values count as missing. Throws when `required` is set and nothing
 *   is found.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions = {}
): string | undefined {
  const stage = getStage();
  const stageKey = `${name}__${stage}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") return candidate;

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new ConfigError(`Missing required env var: ${tried}`);
  }
  return undefined;
}

export function getString(name: string, defaultValue: string): string;
export function getString(name: string): string | undefined;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name) ?? defaultValue;
}

export function getNumber(name: string, defaultValue: number): number;
export function getNumber(name: string): number | undefined;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  const raw = getEnvVar(name);
  if (raw === undefined) return defaultValue;
  const n = Number(raw);
  if (Number.isNaN(n))
    throw new ConfigError(`Env var ${name} is not a number: ${raw}`);
  return n;
}

export function getBoolean(name: string, defaultValue: boolean): boolean;
export function getBoolean(name: string): boolean | undefined;
export function getBoolean(
  name: string,
  defaultValue?: boolean
): boolean | undefined {
  const raw = getEnvVar(name);
  if (raw === undefined) return defaultValue;
  const lowered = raw.toLowerCase();
  if (["1", "true", "yes", "y"].includes(lowered)) return true;
  if (["0", "false", "no", "n"].includes(lowered)) return false;
  throw new ConfigError(`Env var ${name} is not a boolean: ${raw}`);
}
