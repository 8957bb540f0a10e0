#!/usr/bin/env node

import { config as loadDotenv } from "dotenv";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import { parseCliArgs, resolveRuntimeConfig } from "./config/index.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { ingestDirectory } from "./ingest/index.js";
import { createLogger, describeError } from "./logger.js";
import { RecordStore } from "./store/index.js";
import { handleToolCall, listQueryTools } from "./tool/index.js";

async function main(): Promise<void> {
  loadDotenv();

  const runtimeConfig = resolveRuntimeConfig({ cli: parseCliArgs(process.argv.slice(2)), env: process.env });
  const logger = createLogger("mcp", { debug: runtimeConfig.debug });
  const ingestLogger = createLogger("ingest", { debug: runtimeConfig.debug });

  const store = new RecordStore(
    () => ingestDirectory(runtimeConfig.logsDir, { maxRecords: runtimeConfig.maxLogEntries, logger: ingestLogger }),
    { logger },
  );
  await store.refresh();

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: listQueryTools(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments, {
      store,
      defaultIpLimit: runtimeConfig.defaultIpLimit,
    });
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`serving ${store.current().records.length} log entries from ${runtimeConfig.logsDir}`);
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`[mcp] ${SERVER_NAME} server failed to start: ${describeError(error)}`);
  process.exit(1);
});
