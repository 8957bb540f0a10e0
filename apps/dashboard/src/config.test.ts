import { describe, expect, it } from "vitest";

import { parseDashboardCliArgs, resolveDashboardConfig } from "./config.js";

describe("dashboard config", () => {
  it("parses host and port flags", () => {
    expect(parseDashboardCliArgs(["--host", "127.0.0.1", "--port", "4319", "--logs-dir", "/var/log/nginx"])).toEqual({
      host: "127.0.0.1",
      port: 4319,
      logsDir: "/var/log/nginx",
    });
  });

  it("rejects an invalid port flag", () => {
    expect(() => parseDashboardCliArgs(["--port", "http"])).toThrow("Invalid --port: http");
    expect(() => parseDashboardCliArgs(["--port"])).toThrow("Missing value for --port");
  });

  it("lets flags override the environment", () => {
    const config = resolveDashboardConfig({
      cli: { port: 4319 },
      env: { HOST: "10.0.0.5", PORT: "9000", LOGS_DIR: "/data/logs" },
    });

    expect(config.host).toBe("10.0.0.5");
    expect(config.port).toBe(4319);
    expect(config.logsDir).toBe("/data/logs");
  });
});
