import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError, PathHelper, parseLogLevel, type LogLevel } from "@reqforge/shared";

export interface ReqforgeConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  logLevel: LogLevel;
  policyPath?: string;
  profilesDir?: string;
}

export type ConfigSource = Partial<ReqforgeConfig>;

export const DEFAULT_CONFIG: ReqforgeConfig = {
  model: "gpt-4o-mini",
  maxTokens: 4000,
  timeoutMs: 120_000,
  logLevel: "info",
};

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  cli?: ConfigSource;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parsePositiveInt = (value: unknown, label: string): number | undefined => {
  if (value === undefined || value === null || value === "") return undefined;
  const parsed = typeof value === "number" ? value : Number(String(value).trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Invalid ${label}: expected a positive integer.`, { label, value });
  }
  return parsed;
};

const parseOptionalString = (value: unknown, label: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ConfigurationError(`Invalid ${label}: expected string.`, { label });
  return value.trim() || undefined;
};

export const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => ({
  apiKey: parseOptionalString(env.REQFORGE_API_KEY, "REQFORGE_API_KEY"),
  baseUrl: parseOptionalString(env.REQFORGE_BASE_URL, "REQFORGE_BASE_URL"),
  model: parseOptionalString(env.REQFORGE_MODEL, "REQFORGE_MODEL"),
  maxTokens: parsePositiveInt(env.REQFORGE_MAX_TOKENS, "REQFORGE_MAX_TOKENS"),
  timeoutMs: parsePositiveInt(env.REQFORGE_TIMEOUT_MS, "REQFORGE_TIMEOUT_MS"),
  logLevel: parseLogLevel(env.REQFORGE_LOG_LEVEL, "REQFORGE_LOG_LEVEL"),
  policyPath: parseOptionalString(env.REQFORGE_POLICY_PATH, "REQFORGE_POLICY_PATH"),
  profilesDir: parseOptionalString(env.REQFORGE_PROFILES_DIR, "REQFORGE_PROFILES_DIR"),
});

/** Reads `.reqforge/config.yaml`; relative paths in it resolve against the workspace root. */
export const readConfigFile = async (configPath: string, cwd: string): Promise<ConfigSource> => {
  let content: string;
  try {
    content = await readFile(configPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return {};
    throw error;
  }
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${configPath}: ${message}`, { configPath });
  }
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ConfigurationError(`Invalid ${configPath}: expected a mapping.`, { configPath });
  const logLevel = parseOptionalString(raw.logLevel, "logLevel");
  const policyPath = parseOptionalString(raw.policyPath, "policyPath");
  const profilesDir = parseOptionalString(raw.profilesDir, "profilesDir");
  return {
    apiKey: parseOptionalString(raw.apiKey, "apiKey"),
    baseUrl: parseOptionalString(raw.baseUrl, "baseUrl"),
    model: parseOptionalString(raw.model, "model"),
    maxTokens: parsePositiveInt(raw.maxTokens, "maxTokens"),
    timeoutMs: parsePositiveInt(raw.timeoutMs, "timeoutMs"),
    logLevel: parseLogLevel(logLevel, "logLevel"),
    policyPath: policyPath ? path.resolve(cwd, policyPath) : undefined,
    profilesDir: profilesDir ? path.resolve(cwd, profilesDir) : undefined,
  };
};

const mergeConfig = (base: ReqforgeConfig, source: ConfigSource | undefined): ReqforgeConfig => ({
  apiKey: source?.apiKey ?? base.apiKey,
  baseUrl: source?.baseUrl ?? base.baseUrl,
  model: source?.model ?? base.model,
  maxTokens: source?.maxTokens ?? base.maxTokens,
  timeoutMs: source?.timeoutMs ?? base.timeoutMs,
  logLevel: source?.logLevel ?? base.logLevel,
  policyPath: source?.policyPath ?? base.policyPath,
  profilesDir: source?.profilesDir ?? base.profilesDir,
});

/** Defaults, then environment, then the workspace file, then CLI flags. */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<ReqforgeConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : PathHelper.getWorkspaceConfigPath(cwd);
  const fileConfig = await readConfigFile(configPath, cwd);
  return [loadEnvConfig(env), fileConfig, options.cli].reduce(mergeConfig, DEFAULT_CONFIG);
};
