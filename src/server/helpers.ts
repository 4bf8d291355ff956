/**
 * Common HTTP helpers
 */

import type { OutgoingHttpHeaders } from "http";

/**
 * The part of ServerResponse the JSON helpers need
 */
export interface JsonSink {
  writeHead(status: number, headers: OutgoingHttpHeaders): unknown;
  end(body: string): unknown;
}

/**
 * Send JSON response
 */
export function jsonResponse(res: JsonSink, data: object, status = 200): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Set CORS headers
 */
export function setCorsHeaders(res: { setHeader(name: string, value: string): unknown }): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}
