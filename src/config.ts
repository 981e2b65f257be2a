import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigurationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { SessionConfig } from "./session.js";
import { isRecord } from "./types.js";

export interface Config {
  ip4?: string;
  ip6?: string;
  username: string;
  password?: string;
  domain: string;
  timeout?: number;
  insecure?: boolean;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function configDir(env: Env = process.env): string {
  return env.ND_CONFIG_DIR || join(homedir(), ".config", "nd-api-to-gui");
}

export function configFile(env: Env = process.env): string {
  return join(configDir(env), "config.json");
}

export function loadFileConfig(env: Env = process.env): Partial<Config> {
  const file = configFile(env);
  if (!existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Config file ${file} is not valid JSON`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${file} must contain a JSON object`);
  }
  const out: Partial<Config> = {};
  for (const key of ["ip4", "ip6", "username", "password", "domain"] as const) {
    const value = parsed[key];
    if (typeof value === "string") out[key] = value;
  }
  if (typeof parsed.timeout === "number") out.timeout = parsed.timeout;
  if (typeof parsed.insecure === "boolean") out.insecure = parsed.insecure;
  if (isLogLevel(parsed.logLevel)) out.logLevel = parsed.logLevel;
  return out;
}

export function saveConfig(config: Partial<Config>, env: Env = process.env): string {
  mkdirSync(configDir(env), { recursive: true });
  const existing = loadFileConfig(env);
  const merged = { ...existing, ...config };
  const file = configFile(env);
  writeFileSync(file, JSON.stringify(merged, null, 2) + "\n", { mode: 0o600 });
  return file;
}

function parseTimeout(value: unknown): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`timeout must be a positive integer number of seconds. Got ${String(value)}.`);
  }
  return n;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

/** CLI flags win over ND_* environment variables, which win over the config file. */
export function resolveConfig(cliOpts: Record<string, unknown>, env: Env = process.env): Config {
  const file = loadFileConfig(env);
  const logLevel = str(cliOpts.logLevel) ?? str(env.ND_LOG_LEVEL) ?? file.logLevel ?? "warn";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`log level must be one of debug, info, warn, error. Got ${logLevel}.`);
  }
  return {
    ip4: str(cliOpts.ip4) ?? str(env.ND_IP4) ?? file.ip4,
    ip6: str(cliOpts.ip6) ?? str(env.ND_IP6) ?? file.ip6,
    username: str(cliOpts.username) ?? str(env.ND_USERNAME) ?? file.username ?? "admin",
    password: str(cliOpts.password) ?? str(env.ND_PASSWORD) ?? file.password,
    domain: str(cliOpts.domain) ?? str(env.ND_DOMAIN) ?? file.domain ?? "local",
    timeout: parseTimeout(cliOpts.timeout) ?? parseTimeout(env.ND_TIMEOUT) ?? file.timeout,
    insecure: !!(cliOpts.insecure || env.ND_INSECURE === "1" || file.insecure),
    logLevel,
  };
}

export function requireConfig(config: Config): asserts config is Config & { password: string } {
  if (!config.ip4 && !config.ip6) {
    throw new ConfigurationError(
      "Missing controller address. Set via --ip4/--ip6, ND_IP4/ND_IP6 env vars, or run: nd-api-to-gui configure",
    );
  }
  if (!config.password) {
    throw new ConfigurationError(
      "Missing password. Set via --password, ND_PASSWORD env var, or run: nd-api-to-gui configure",
    );
  }
}

export function toSessionConfig(config: Config): SessionConfig {
  return {
    ip4: config.ip4 ?? "",
    ip6: config.ip6 ?? "",
    username: config.username,
    password: config.password ?? "",
    domain: config.domain,
    timeout: config.timeout,
  };
}
