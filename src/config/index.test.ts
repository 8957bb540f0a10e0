import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { parseCliArgs, resolveRuntimeConfig } from "./index.js";

describe("resolveRuntimeConfig", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "access-log-insight-config-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("uses defaults without a file or environment", () => {
    expect(resolveRuntimeConfig({ cli: {}, env: {}, cwd: "/srv/app" })).toEqual({
      host: "0.0.0.0",
      port: 8000,
      debug: false,
      logsDir: "/srv/app/logs",
      maxLogEntries: 85000,
      defaultIpLimit: 20,
    });
  });

  it("reads environment variables", () => {
    const config = resolveRuntimeConfig({
      cli: {},
      env: {
        HOST: "127.0.0.1",
        PORT: "9000",
        DEBUG: "true",
        LOGS_DIR: "custom_logs",
        MAX_LOG_ENTRIES: "10000",
        DEFAULT_IP_LIMIT: "50",
      },
      cwd: "/srv/app",
    });

    expect(config).toEqual({
      host: "127.0.0.1",
      port: 9000,
      debug: true,
      logsDir: "/srv/app/custom_logs",
      maxLogEntries: 10000,
      defaultIpLimit: 50,
    });
  });

  it.each([
    [{ PORT: "not_a_number" }, "Invalid PORT: not_a_number"],
    [{ DEBUG: "not_a_bool" }, "DEBUG must be a boolean, got: not_a_bool"],
    [{ MAX_LOG_ENTRIES: "invalid" }, "MAX_LOG_ENTRIES must be a positive integer, got: invalid"],
    [{ DEFAULT_IP_LIMIT: "0" }, "DEFAULT_IP_LIMIT must be a positive integer, got: 0"],
  ])("rejects invalid environment %o", (env, message) => {
    expect(() => resolveRuntimeConfig({ cli: {}, env, cwd: "/srv/app" })).toThrow(message);
  });

  it("prefers the config file and resolves its paths against the file", async () => {
    const configFile = path.join(directory, "insight.json");
    await writeFile(configFile, JSON.stringify({ port: 8080, logs_dir: "data/logs", max_log_entries: 10 }));

    const config = resolveRuntimeConfig({
      cli: { configFile },
      env: { PORT: "9000", LOGS_DIR: "/ignored", HOST: "10.0.0.5" },
      cwd: "/srv/app",
    });

    expect(config.port).toBe(8080);
    expect(config.host).toBe("10.0.0.5");
    expect(config.logsDir).toBe(path.join(directory, "data/logs"));
    expect(config.maxLogEntries).toBe(10);
  });

  it("lets the --logs-dir flag win over every other source", async () => {
    const configFile = path.join(directory, "insight.json");
    await writeFile(configFile, JSON.stringify({ logs_dir: "data/logs" }));

    const config = resolveRuntimeConfig({ cli: { configFile, logsDir: "/var/log/nginx" }, env: {}, cwd: "/srv/app" });

    expect(config.logsDir).toBe("/var/log/nginx");
  });

  it("rejects unknown or mistyped config keys", async () => {
    const configFile = path.join(directory, "insight.json");
    await writeFile(configFile, JSON.stringify({ port: "eighty", logsdir: "x" }));

    expect(() => resolveRuntimeConfig({ cli: { configFile }, env: {}, cwd: "/srv/app" })).toThrow(
      `Invalid config file ${configFile}`,
    );
  });

  it("rejects a config file that is not a JSON object", async () => {
    const configFile = path.join(directory, "insight.json");
    await writeFile(configFile, "[1, 2]");

    expect(() => resolveRuntimeConfig({ cli: { configFile }, env: {}, cwd: "/srv/app" })).toThrow(
      "Config file root must be a JSON object",
    );
  });
});

describe("parseCliArgs", () => {
  it("resolves flag paths", () => {
    const cli = parseCliArgs(["--config", "/etc/insight.json", "--logs-dir", "/var/log/nginx"]);

    expect(cli).toEqual({ configFile: "/etc/insight.json", logsDir: "/var/log/nginx" });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseCliArgs(["--sink", "jsonl"])).toThrow("Unknown argument: --sink");
    expect(() => parseCliArgs(["--config"])).toThrow("Missing value for --config");
  });

  it("hands --help to the help callback", () => {
    expect(() =>
      parseCliArgs(["--help"], () => {
        throw new Error("help requested");
      }),
    ).toThrow("help requested");
  });
});
