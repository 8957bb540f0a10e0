import { ABSENT_FIELD } from "./software.js";

export interface ExtractedFields {
  clientAddress: string;
  rawTimestamp: string;
  method: string;
  path: string;
  protocolVersion: string;
  statusCode: number;
  responseSize: string;
  referer: string;
  userAgent: string;
}

export interface LogFormat {
  name: string;
  pattern: RegExp;
  extract(groups: Record<string, string>): ExtractedFields;
}

const REQUEST_PREFIX =
  String.raw`^(?<address>\S+) - - \[(?<timestamp>[^\]]+)\] ` +
  String.raw`"(?<method>\S+) (?<path>\S+) (?<protocol>[^"]+)" ` +
  String.raw`(?<status>\d+) (?<size>\S+)`;

function extractRequestFields(groups: Record<string, string>): Omit<ExtractedFields, "referer" | "userAgent"> {
  return {
    clientAddress: groups.address,
    rawTimestamp: groups.timestamp,
    method: groups.method,
    path: groups.path,
    protocolVersion: groups.protocol,
    statusCode: Number.parseInt(groups.status, 10),
    responseSize: groups.size,
  };
}

/**
 * Known line shapes, richest first. The first pattern that matches a line decides how it
 * is read; add a new shape by appending an entry here.
 */
export const LOG_FORMATS: readonly LogFormat[] = [
  {
    // ADDR - - [TIMESTAMP] "METHOD PATH PROTOCOL" STATUS SIZE "REFERER" "USERAGENT"
    name: "full",
    pattern: new RegExp(`${REQUEST_PREFIX} "(?<referer>[^"]*)" "(?<userAgent>[^"]*)"`),
    extract: (groups) => ({
      ...extractRequestFields(groups),
      referer: groups.referer,
      userAgent: groups.userAgent,
    }),
  },
  {
    // ADDR - - [TIMESTAMP] "METHOD PATH PROTOCOL" STATUS SIZE
    name: "minimal",
    pattern: new RegExp(REQUEST_PREFIX),
    extract: (groups) => ({
      ...extractRequestFields(groups),
      referer: ABSENT_FIELD,
      userAgent: ABSENT_FIELD,
    }),
  },
];
