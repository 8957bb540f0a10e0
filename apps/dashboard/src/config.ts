import { resolvePath, resolveRuntimeConfig, type CliConfig, type RuntimeConfig } from "../../../src/config/index.js";

interface DashboardConfigContext {
  cli: DashboardCliConfig;
  env: NodeJS.ProcessEnv;
}

export interface DashboardCliConfig extends CliConfig {
  host?: string;
  port?: number;
}

export type DashboardConfig = RuntimeConfig;

export function parseDashboardCliArgs(
  argv: string[],
  onHelp: () => never = () => printDashboardHelpAndExit(0),
): DashboardCliConfig {
  const cli: DashboardCliConfig = {};
  const invocationCwd = process.env.INIT_CWD ?? process.cwd();

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      onHelp();
    }

    if (arg !== "--config" && arg !== "--logs-dir" && arg !== "--host" && arg !== "--port") {
      throw new Error(`Unknown argument: ${arg}`);
    }

    const next = argv[i + 1];
    if (!next) {
      throw new Error(`Missing value for ${arg}`);
    }
    i += 1;

    if (arg === "--config") {
      cli.configFile = resolvePath(next, invocationCwd);
    } else if (arg === "--logs-dir") {
      cli.logsDir = resolvePath(next, invocationCwd);
    } else if (arg === "--host") {
      cli.host = next;
    } else {
      cli.port = parsePort(next, "--port");
    }
  }

  return cli;
}

export function resolveDashboardConfig(context: DashboardConfigContext): DashboardConfig {
  const runtimeConfig = resolveRuntimeConfig(context);

  return {
    ...runtimeConfig,
    host: context.cli.host ?? runtimeConfig.host,
    port: context.cli.port ?? runtimeConfig.port,
  };
}

export function printDashboardHelpAndExit(exitCode: number): never {
  const lines = [
    "Usage: access-log-insight-dashboard [options]",
    "",
    "Options:",
    "  --config <path>    JSON config file for dashboard runtime",
    "  --logs-dir <path>  Directory containing access log files",
    "  --host <host>      Interface to listen on",
    "  --port <port>      Port to listen on",
    "  -h, --help         Show help",
    "",
    "Environment:",
    "  HOST, PORT, DEBUG, LOGS_DIR, MAX_LOG_ENTRIES, DEFAULT_IP_LIMIT",
  ];

  // eslint-disable-next-line no-console
  console.error(lines.join("\n"));
  process.exit(exitCode);
}

function parsePort(rawValue: string, label: string): number {
  const parsed = /^\d+$/.test(rawValue) ? Number.parseInt(rawValue, 10) : Number.NaN;
  if (Number.isNaN(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid ${label}: ${rawValue}`);
  }
  return parsed;
}
