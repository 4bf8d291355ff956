/**
 * Event Stream Routes - live device status over SSE and WebSocket
 */

import type { OutgoingHttpHeaders } from "http";
import { SSE_KEEPALIVE, sseFrame, type Subscriber } from "../../events/broadcaster";
import type { DeviceMonitor } from "../../monitor/device-monitor";
import { createLogger } from "../../logger";

export interface EventStreamDependencies {
  monitor: Pick<DeviceMonitor, "start" | "subscribe" | "unsubscribe">;
  /** Idle time before a keepalive goes out */
  keepaliveMs: number;
}

/**
 * The parts of IncomingMessage / ServerResponse a stream uses
 */
export interface StreamRequest {
  on(event: "close", listener: () => void): unknown;
}

export interface StreamResponse {
  readonly destroyed: boolean;
  readonly writableEnded: boolean;
  writeHead(status: number, headers: OutgoingHttpHeaders): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: "close" | "error", listener: (err?: Error) => void): unknown;
  once(event: "drain" | "close", listener: () => void): unknown;
  off(event: "drain" | "close", listener: () => void): unknown;
}

/**
 * The parts of a ws WebSocket a stream uses
 */
export interface EventSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  ping(): void;
  on(event: "close" | "error", listener: () => void): unknown;
}

const SSE_HEADERS: OutgoingHttpHeaders = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};

const log = createLogger("EventStream");

/**
 * Resolves once the socket buffer has flushed or the response closed.
 * Meanwhile events wait in the subscriber's bounded queue.
 */
function drained(res: StreamResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

export function createEventRoutes(deps: EventStreamDependencies) {
  /**
   * Subscribe and hand back a one-shot cleanup
   */
  function open(): { subscriber: Subscriber; cleanup: () => void } {
    const subscriber = deps.monitor.subscribe();
    let cleaned = false;
    const cleanup = () => {
      if (cleaned) return;
      cleaned = true;
      deps.monitor.unsubscribe(subscriber);
    };
    return { subscriber, cleanup };
  }

  return {
    /**
     * GET /device-events
     * Resolves when the client goes away
     */
    async stream(req: StreamRequest, res: StreamResponse): Promise<void> {
      await deps.monitor.start();

      res.writeHead(200, SSE_HEADERS);
      const { subscriber, cleanup } = open();

      req.on("close", cleanup);
      res.on("close", cleanup);
      res.on("error", (err) => {
        log.debug(`Stream ${subscriber.id} write error:`, err);
        cleanup();
      });

      try {
        for (;;) {
          const msg = await subscriber.receive(deps.keepaliveMs);
          if (msg.kind === "closed" || res.destroyed || res.writableEnded) break;
          if (!res.write(msg.kind === "event" ? sseFrame(msg.data) : SSE_KEEPALIVE)) {
            await drained(res);
          }
        }
      } finally {
        cleanup();
        if (!res.writableEnded) res.end();
      }
    },

    /**
     * WebSocket /device-events/ws
     * Same JSON payloads, one per message; keepalive is a ping
     */
    async socket(ws: EventSocket): Promise<void> {
      await deps.monitor.start();

      const { subscriber, cleanup } = open();
      ws.on("close", cleanup);
      ws.on("error", cleanup);

      try {
        for (;;) {
          const msg = await subscriber.receive(deps.keepaliveMs);
          if (msg.kind === "closed" || ws.readyState !== ws.OPEN) break;
          if (msg.kind === "event") {
            ws.send(msg.data);
          } else {
            ws.ping();
          }
        }
      } catch (err) {
        log.debug(`Socket ${subscriber.id} send failed:`, err);
      } finally {
        cleanup();
      }
    },
  };
}
