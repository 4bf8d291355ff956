/**
 * Sampler Monitor HTTP Server
 * Device status, rescan, folder opening and live event streams
 */

import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { WebSocketServer } from "ws";
import type { DeviceMonitor } from "../monitor/device-monitor";
import type { ConfigStore } from "../store/config-store";
import { createDeviceRoutes, type OpenPathFn } from "./routes/devices";
import { createEventRoutes } from "./routes/events";
import { createHealthRoute } from "./routes/health";
import { setCorsHeaders } from "./helpers";
import { createLogger } from "../logger";

export interface MonitorServerOptions {
  port?: number;
  monitor: DeviceMonitor;
  configStore: ConfigStore;
  keepaliveMs?: number;
  openPath?: OpenPathFn;
}

export const EVENTS_SOCKET_PATH = "/device-events/ws";

const log = createLogger("Server");

/**
 * HTTP/WebSocket server in front of the device monitor
 */
export class MonitorServer {
  private server: ReturnType<typeof createServer> | null = null;
  private wss: WebSocketServer | null = null;
  private port: number;
  private deviceRoutes: ReturnType<typeof createDeviceRoutes>;
  private eventRoutes: ReturnType<typeof createEventRoutes>;
  private healthRoute: ReturnType<typeof createHealthRoute>;

  constructor(options: MonitorServerOptions) {
    this.port = options.port ?? 5000;

    // Routes get their dependencies injected
    this.deviceRoutes = createDeviceRoutes({
      monitor: options.monitor,
      configStore: options.configStore,
      openPath: options.openPath,
    });
    this.eventRoutes = createEventRoutes({
      monitor: options.monitor,
      keepaliveMs: options.keepaliveMs ?? 30000,
    });
    this.healthRoute = createHealthRoute({ monitor: options.monitor });
  }

  /**
   * Start listening
   */
  start(): Promise<void> {
    this.server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });

    this.wss = new WebSocketServer({ server: this.server, path: EVENTS_SOCKET_PATH });

    // Keep a bad socket from taking the server down
    this.wss.on("error", (err) => {
      log.error("WebSocket server error:", err);
    });

    this.wss.on("connection", (ws) => {
      log.debug("Event socket connected");
      this.eventRoutes.socket(ws).catch((err) => {
        log.error("Event socket failed:", err);
      });
    });

    const server = this.server;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, () => {
        server.off("error", reject);
        log.info(`Sampler Monitor running on http://localhost:${this.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop server
   */
  async stop(): Promise<void> {
    if (this.wss) {
      for (const ws of this.wss.clients) {
        ws.terminate();
      }
      this.wss.close();
      this.wss = null;
    }

    const server = this.server;
    this.server = null;
    if (!server) return;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Handle HTTP requests. Never rejects: failures become a 500.
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let path = req.url || "/";

    try {
      const url = new URL(path, `http://localhost:${this.port}`);
      path = url.pathname;

      setCorsHeaders(res);

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (req.method !== "GET") {
        res.writeHead(405);
        res.end("Method Not Allowed");
        return;
      }

      switch (path) {
        case "/device-status":
          await this.deviceRoutes.getStatus(res);
          return;
        case "/device-events":
          await this.eventRoutes.stream(req, res);
          return;
        case "/open-device-directory":
          await this.deviceRoutes.openDirectory(res, url.searchParams);
          return;
        case "/refresh-device-scan":
          await this.deviceRoutes.refresh(res);
          return;
        case "/api/health":
          this.healthRoute.get(res);
          return;
      }

      res.writeHead(404);
      res.end("Not Found");
    } catch (err) {
      log.error(`Request error on ${path}:`, err);
      if (!res.headersSent) {
        res.writeHead(500);
        res.end("Internal Server Error");
      } else if (!res.writableEnded) {
        res.end();
      }
    }
  }
}
