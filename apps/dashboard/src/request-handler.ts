import type { IncomingMessage, ServerResponse } from "node:http";

import { LogAnalyzer, resolveGranularity } from "../../../src/analysis/index.js";
import { MAX_IP_LIMIT } from "../../../src/config/defaults.js";
import { isSoftwareFamily, softwareFamilyLabel } from "../../../src/parser/index.js";
import type { RecordStore } from "../../../src/store/index.js";
import type { FilterCriteria, Granularity, SoftwareFamily } from "../../../src/types.js";
import { renderDashboardHtml } from "./html.js";

export interface DashboardContext {
  store: RecordStore;
  defaultIpLimit: number;
}

export interface DashboardResponse {
  status: number;
  contentType: string;
  body: string;
}

export function createDashboardRequestHandler(context: DashboardContext) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (!req.url) {
      respond(res, jsonResponse(400, { error: "Missing URL" }));
      return;
    }

    const url = new URL(req.url, `http://${req.headers.host ?? "localhost"}`);
    respond(res, await routeDashboardRequest(req.method ?? "GET", url, context));
  };
}

export async function routeDashboardRequest(
  method: string,
  url: URL,
  context: DashboardContext,
): Promise<DashboardResponse> {
  try {
    if (url.pathname === "/") {
      return { status: 200, contentType: "text/html; charset=utf-8", body: renderDashboardHtml() };
    }

    if (url.pathname === "/api/refresh") {
      if (method !== "GET" && method !== "POST") {
        return jsonResponse(405, { error: "Method not allowed" });
      }
      const snapshot = await context.store.refresh();
      return jsonResponse(200, {
        message: `Reloaded ${snapshot.records.length} log entries`,
        generation: snapshot.generation,
      });
    }

    if (url.pathname === "/healthz") {
      return jsonResponse(200, { ok: true, generation: context.store.current().generation });
    }

    if (!url.pathname.startsWith("/api/")) {
      return jsonResponse(404, { error: "Not found" });
    }

    const criteria = parseFilterQuery(url.searchParams);
    const analyzer = new LogAnalyzer(context.store.current().records).filter(criteria);

    if (url.pathname === "/api/traffic") {
      const requested = parseGranularity(url.searchParams.get("granularity"));
      return jsonResponse(200, analyzer.trafficOverTime(resolveGranularity(criteria, requested)));
    }

    if (url.pathname === "/api/addresses") {
      const limit = parseLimit(url.searchParams.get("limit")) ?? context.defaultIpLimit;
      return jsonResponse(200, analyzer.addressFrequency(limit));
    }

    if (url.pathname === "/api/software") {
      const distribution = analyzer.softwareDistribution();
      return jsonResponse(200, {
        title: distribution.title,
        entries: distribution.entries.map((entry) => ({ ...entry, label: softwareFamilyLabel(entry.value) })),
      });
    }

    if (url.pathname === "/api/logs") {
      return jsonResponse(200, analyzer.summary(criteria));
    }

    return jsonResponse(404, { error: "Not found" });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    const statusCode = message.startsWith("Invalid query") ? 400 : 500;
    return jsonResponse(statusCode, { error: message });
  }
}

export function parseFilterQuery(searchParams: URLSearchParams): FilterCriteria {
  return {
    date: parseOptionalString(searchParams.get("date")) ?? null,
    hour: parseHour(searchParams.get("hour")),
    clientAddress: parseOptionalString(searchParams.get("ip")) ?? null,
    softwareFamily: parseSoftwareFamily(searchParams.get("browser")),
  };
}

function parseOptionalString(rawValue: string | null): string | undefined {
  if (!rawValue || rawValue.trim() === "") {
    return undefined;
  }
  return rawValue.trim();
}

function parseHour(rawValue: string | null): number | null {
  const value = parseOptionalString(rawValue);
  if (value === undefined) {
    return null;
  }

  const parsed = /^\d{1,2}$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(parsed) || parsed > 23) {
    throw new Error("Invalid query: hour must be an integer between 0 and 23.");
  }
  return parsed;
}

function parseSoftwareFamily(rawValue: string | null): SoftwareFamily | null {
  const value = parseOptionalString(rawValue);
  if (value === undefined) {
    return null;
  }

  if (!isSoftwareFamily(value)) {
    throw new Error(`Invalid query: unknown browser "${value}".`);
  }
  return value;
}

function parseLimit(rawValue: string | null): number | undefined {
  const value = parseOptionalString(rawValue);
  if (value === undefined) {
    return undefined;
  }

  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(parsed) || parsed < 1 || parsed > MAX_IP_LIMIT) {
    throw new Error(`Invalid query: limit must be an integer between 1 and ${MAX_IP_LIMIT}.`);
  }
  return parsed;
}

function parseGranularity(rawValue: string | null): Granularity {
  const value = parseOptionalString(rawValue);
  if (value === undefined) {
    return "hourly";
  }

  if (value === "hourly" || value === "daily") {
    return value;
  }

  throw new Error("Invalid query: granularity must be hourly or daily.");
}

function jsonResponse(status: number, body: unknown): DashboardResponse {
  return { status, contentType: "application/json; charset=utf-8", body: JSON.stringify(body) };
}

function respond(res: ServerResponse, response: DashboardResponse): void {
  res.writeHead(response.status, { "content-type": response.contentType });
  res.end(response.body);
}
