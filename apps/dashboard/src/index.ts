#!/usr/bin/env node

import { config as loadDotenv } from "dotenv";
import { createServer } from "node:http";

import { ingestDirectory } from "../../../src/ingest/index.js";
import { createLogger, describeError } from "../../../src/logger.js";
import { RecordStore } from "../../../src/store/index.js";
import { parseDashboardCliArgs, resolveDashboardConfig } from "./config.js";
import { createDashboardRequestHandler } from "./request-handler.js";

loadDotenv();

const config = resolveConfigOrExit();
const logger = createLogger("dashboard", { debug: config.debug });
const ingestLogger = createLogger("ingest", { debug: config.debug });

const store = new RecordStore(
  () => ingestDirectory(config.logsDir, { maxRecords: config.maxLogEntries, logger: ingestLogger }),
  { logger },
);
const requestHandler = createDashboardRequestHandler({ store, defaultIpLimit: config.defaultIpLimit });

const server = createServer((req, res) => {
  requestHandler(req, res).catch((error: unknown) => {
    logger.error(`request ${req.method ?? "GET"} ${req.url ?? ""} failed`, error);
    if (!res.headersSent) {
      res.writeHead(500, { "content-type": "application/json; charset=utf-8" });
    }
    res.end(JSON.stringify({ error: "Internal server error" }));
  });
});

store
  .refresh()
  .then((snapshot) => {
    server.listen(config.port, config.host, () => {
      logger.info(
        `listening on http://${config.host}:${config.port} with ${snapshot.records.length} log entries from ${config.logsDir}`,
      );
    });
  })
  .catch((error: unknown) => {
    logger.error("initial log load failed", error);
    process.exit(1);
  });

const shutdown = () => {
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

function resolveConfigOrExit() {
  try {
    const cli = parseDashboardCliArgs(process.argv.slice(2));
    return resolveDashboardConfig({ cli, env: process.env });
  } catch (error: unknown) {
    // eslint-disable-next-line no-console
    console.error(`[dashboard] ${describeError(error)}`);
    process.exit(1);
  }
}
