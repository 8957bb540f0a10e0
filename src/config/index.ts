import { readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { buildValidator, formatValidationErrors } from "../schema/validator.js";
import { DEFAULT_RUNTIME_CONFIG, MAX_IP_LIMIT } from "./defaults.js";

export interface CliConfig {
  configFile?: string;
  logsDir?: string;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  debug: boolean;
  logsDir: string;
  maxLogEntries: number;
  defaultIpLimit: number;
}

export interface RuntimeConfigContext {
  cli: CliConfig;
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

interface RawConfigFile {
  host?: string;
  port?: number;
  debug?: boolean;
  logs_dir?: string;
  max_log_entries?: number;
  default_ip_limit?: number;
}

const validateRawConfig = buildValidator<RawConfigFile>({
  type: "object",
  additionalProperties: false,
  properties: {
    host: { type: "string", minLength: 1 },
    port: { type: "integer", minimum: 1, maximum: 65535 },
    debug: { type: "boolean" },
    logs_dir: { type: "string", minLength: 1 },
    max_log_entries: { type: "integer", minimum: 1 },
    default_ip_limit: { type: "integer", minimum: 1, maximum: MAX_IP_LIMIT },
  },
});

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function parseCliArgs(argv: string[], onHelp: () => never = () => printHelpAndExit(0)): CliConfig {
  let configFile: string | undefined;
  let logsDir: string | undefined;
  const invocationCwd = process.env.INIT_CWD ?? process.cwd();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--config") {
      const next = argv[i + 1];
      if (!next) {
        throw new Error("Missing value for --config");
      }
      configFile = resolvePath(next, invocationCwd);
      i += 1;
      continue;
    }

    if (arg === "--logs-dir") {
      const next = argv[i + 1];
      if (!next) {
        throw new Error("Missing value for --logs-dir");
      }
      logsDir = resolvePath(next, invocationCwd);
      i += 1;
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      onHelp();
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return { configFile, logsDir };
}

/** Config file values win over environment variables, which win over defaults. CLI flags win over all. */
export function resolveRuntimeConfig(context: RuntimeConfigContext): RuntimeConfig {
  const cwd = context.cwd ?? process.cwd();
  const { rawConfig, baseDir } = loadRawConfig(context.cli.configFile, cwd);
  const { env } = context;

  const logsDir =
    context.cli.logsDir ??
    (rawConfig.logs_dir !== undefined
      ? resolvePath(rawConfig.logs_dir, baseDir)
      : resolvePath(nonEmpty(env.LOGS_DIR) ?? DEFAULT_RUNTIME_CONFIG.logsDir, cwd));

  return {
    host: rawConfig.host ?? nonEmpty(env.HOST) ?? DEFAULT_RUNTIME_CONFIG.host,
    port: rawConfig.port ?? parsePort(env.PORT) ?? DEFAULT_RUNTIME_CONFIG.port,
    debug: rawConfig.debug ?? parseBoolean(env.DEBUG, "DEBUG") ?? DEFAULT_RUNTIME_CONFIG.debug,
    logsDir,
    maxLogEntries:
      rawConfig.max_log_entries ??
      parsePositiveInt(env.MAX_LOG_ENTRIES, "MAX_LOG_ENTRIES") ??
      DEFAULT_RUNTIME_CONFIG.maxLogEntries,
    defaultIpLimit:
      rawConfig.default_ip_limit ??
      parseIpLimit(env.DEFAULT_IP_LIMIT) ??
      DEFAULT_RUNTIME_CONFIG.defaultIpLimit,
  };
}

export function printHelpAndExit(exitCode: number): never {
  const lines = [
    "Usage: access-log-insight-mcp [options]",
    "",
    "Options:",
    "  --config <path>                JSON config file",
    "  --logs-dir <path>              Directory containing access log files",
    "  -h, --help                     Show help",
    "",
    "Environment:",
    "  LOGS_DIR, MAX_LOG_ENTRIES, DEFAULT_IP_LIMIT, DEBUG",
  ];

  // eslint-disable-next-line no-console
  console.error(lines.join("\n"));
  process.exit(exitCode);
}

export function resolvePath(value: string, baseDir: string): string {
  if (value === "~") {
    return os.homedir();
  }

  if (value.startsWith("~/")) {
    return path.resolve(os.homedir(), value.slice(2));
  }

  return path.isAbsolute(value) ? value : path.resolve(baseDir, value);
}

function loadRawConfig(configFile: string | undefined, cwd: string): { rawConfig: RawConfigFile; baseDir: string } {
  if (!configFile) {
    return { rawConfig: {}, baseDir: cwd };
  }

  let rawText: string;
  try {
    rawText = readFileSync(configFile, "utf8");
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read config file ${configFile}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in config file ${configFile}: ${message}`);
  }

  if (!parsed || Array.isArray(parsed) || typeof parsed !== "object") {
    throw new Error("Config file root must be a JSON object");
  }

  if (!validateRawConfig(parsed)) {
    throw new Error(`Invalid config file ${configFile}: ${formatValidationErrors(validateRawConfig.errors)}`);
  }

  return { rawConfig: parsed, baseDir: path.dirname(configFile) };
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return value.trim();
}

function parsePort(rawValue: string | undefined): number | undefined {
  const value = nonEmpty(rawValue);
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseStrictInt(value);
  if (parsed === null || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid PORT: ${value}`);
  }
  return parsed;
}

function parseIpLimit(rawValue: string | undefined): number | undefined {
  const parsed = parsePositiveInt(rawValue, "DEFAULT_IP_LIMIT");
  if (parsed !== undefined && parsed > MAX_IP_LIMIT) {
    throw new Error(`DEFAULT_IP_LIMIT must be at most ${MAX_IP_LIMIT}`);
  }
  return parsed;
}

function parsePositiveInt(rawValue: string | undefined, label: string): number | undefined {
  const value = nonEmpty(rawValue);
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseStrictInt(value);
  if (parsed === null || parsed <= 0) {
    throw new Error(`${label} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

function parseBoolean(rawValue: string | undefined, label: string): boolean | undefined {
  const value = nonEmpty(rawValue)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }

  if (TRUE_VALUES.has(value)) {
    return true;
  }
  if (FALSE_VALUES.has(value)) {
    return false;
  }
  throw new Error(`${label} must be a boolean, got: ${value}`);
}

function parseStrictInt(value: string): number | null {
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}
