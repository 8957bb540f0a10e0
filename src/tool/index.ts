import { ErrorCode, McpError, type CallToolResult, type Tool } from "@modelcontextprotocol/sdk/types.js";

import {
  DEFAULT_TOP_ADDRESSES,
  LogAnalyzer,
  resolveGranularity,
} from "../analysis/index.js";
import { MAX_IP_LIMIT } from "../config/defaults.js";
import { buildValidator, formatValidationErrors } from "../schema/validator.js";
import type { RecordStore } from "../store/index.js";
import { SOFTWARE_FAMILIES, type FilterCriteria, type Granularity, type SoftwareFamily } from "../types.js";

export interface QueryToolArguments {
  date?: string;
  hour?: number;
  ip?: string;
  browser?: SoftwareFamily;
  granularity?: Granularity;
  limit?: number;
}

export interface QueryToolContext {
  store: RecordStore;
  defaultIpLimit?: number;
}

const FILTER_PROPERTIES = {
  date: { type: "string", description: "Calendar date YYYY-MM-DD; an unparsable value is ignored" },
  hour: { type: "integer", minimum: 0, maximum: 23, description: "Hour of day 0-23" },
  ip: { type: "string", description: "Exact client address" },
  browser: { type: "string", enum: [...SOFTWARE_FAMILIES], description: "Client software family" },
};

type InputSchema = {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  additionalProperties: false;
};

interface QueryToolDefinition {
  name: string;
  description: string;
  inputSchema: InputSchema;
}

function buildInputSchema(extraProperties: Record<string, Record<string, unknown>> = {}): InputSchema {
  return {
    type: "object",
    properties: { ...FILTER_PROPERTIES, ...extraProperties },
    additionalProperties: false,
  };
}

const QUERY_TOOLS: QueryToolDefinition[] = [
  {
    name: "traffic_over_time",
    description:
      "Request counts by hour of day (all 24 hours) or by calendar date. A date filter alone forces hourly, an hour filter alone forces daily.",
    inputSchema: buildInputSchema({
      granularity: { type: "string", enum: ["hourly", "daily"], description: 'Defaults to "hourly"' },
    }),
  },
  {
    name: "top_addresses",
    description: "Most frequent client addresses, count descending.",
    inputSchema: buildInputSchema({
      limit: { type: "integer", minimum: 1, maximum: MAX_IP_LIMIT, description: "How many addresses to return" },
    }),
  },
  {
    name: "software_distribution",
    description: "Request counts per client software family, in first-seen order.",
    inputSchema: buildInputSchema(),
  },
  {
    name: "log_summary",
    description: "Totals, unique addresses, date range and processed files for the (filtered) record set.",
    inputSchema: buildInputSchema(),
  },
  {
    name: "refresh_logs",
    description: "Re-read every log file and replace the loaded record set.",
    inputSchema: { type: "object", properties: {}, additionalProperties: false },
  },
];

const VALIDATORS = new Map(
  QUERY_TOOLS.map((tool) => [tool.name, buildValidator<QueryToolArguments>(tool.inputSchema)] as const),
);

export function listQueryTools(): Tool[] {
  return QUERY_TOOLS.map((tool) => ({ ...tool }));
}

export async function handleToolCall(
  name: string,
  rawArguments: Record<string, unknown> | undefined,
  context: QueryToolContext,
): Promise<CallToolResult> {
  const validate = VALIDATORS.get(name);
  if (!validate) {
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }

  const args: QueryToolArguments = rawArguments ?? {};
  if (!validate(args)) {
    return buildToolErrorResult(`Invalid ${name} arguments: ${formatValidationErrors(validate.errors)}`);
  }

  if (name === "refresh_logs") {
    try {
      const snapshot = await context.store.refresh();
      return buildToolJsonResult({
        message: `Reloaded ${snapshot.records.length} log entries`,
        generation: snapshot.generation,
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return buildToolErrorResult(`Failed to reload log records: ${message}`);
    }
  }

  const criteria = toFilterCriteria(args);
  const analyzer = new LogAnalyzer(context.store.current().records).filter(criteria);

  switch (name) {
    case "traffic_over_time":
      return buildToolJsonResult(analyzer.trafficOverTime(resolveGranularity(criteria, args.granularity ?? "hourly")));
    case "top_addresses":
      return buildToolJsonResult(
        analyzer.addressFrequency(args.limit ?? context.defaultIpLimit ?? DEFAULT_TOP_ADDRESSES),
      );
    case "software_distribution":
      return buildToolJsonResult(analyzer.softwareDistribution());
    default:
      return buildToolJsonResult(analyzer.summary(criteria));
  }
}

export function toFilterCriteria(args: QueryToolArguments): FilterCriteria {
  return {
    date: args.date ?? null,
    hour: args.hour ?? null,
    clientAddress: args.ip ?? null,
    softwareFamily: args.browser ?? null,
  };
}

export function buildToolErrorResult(message: string): CallToolResult {
  return {
    isError: true,
    content: [{ type: "text" as const, text: message }],
  };
}

export function buildToolJsonResult(payload: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
  };
}
