import http from "http";
import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import { Exchange } from "../services/ExchangeService";
import { bindRoutes, RouteOptions } from "../routes/index";
import { EventFeed } from "./feed";
import log from "../logger";

const HEARTBEAT_INTERVAL_MS = 30_000;
const PONG_TIMEOUT_MS = 10_000;

export function createHttpWsServer(
  exchange: Exchange,
  options: RouteOptions
): { app: express.Express; httpServer: http.Server; feed: EventFeed } {
  const app = express();

  // CORS: allow cross-origin requests from any origin
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, PATCH, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (_req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json());

  // Bind REST routes
  bindRoutes(app, exchange, options);

  const httpServer = http.createServer(app);
  const feed = new EventFeed(exchange.runner);
  const eventsWss = new WebSocketServer({ noServer: true });

  // Handle HTTP upgrade for WebSocket
  httpServer.on("upgrade", (request, socket, head) => {
    const { pathname } = new URL(request.url || "/", "http://localhost");

    // /ws/events
    if (pathname === "/ws/events") {
      eventsWss.handleUpgrade(request, socket, head, (ws) => {
        eventsWss.emit("connection", ws, request);
      });
      return;
    }

    socket.destroy();
  });

  eventsWss.on("connection", (ws: WebSocket) => {
    log.info({ clients: feed.size + 1 }, "Event feed connection");
    setupHeartbeat(ws);
    feed.add(ws);
    ws.on("close", () => feed.remove(ws));
    ws.on("error", (err) => {
      log.warn({ err: err.message }, "Event feed socket error");
      feed.remove(ws);
    });
  });

  httpServer.on("close", () => {
    feed.close();
    eventsWss.close();
  });

  return { app, httpServer, feed };
}

function setupHeartbeat(ws: WebSocket): void {
  let alive = true;
  let pongTimer: ReturnType<typeof setTimeout> | null = null;

  const interval = setInterval(() => {
    if (!alive) {
      clearInterval(interval);
      ws.terminate();
      return;
    }
    alive = false;
    ws.ping();
    pongTimer = setTimeout(() => {
      if (!alive) {
        clearInterval(interval);
        ws.terminate();
      }
    }, PONG_TIMEOUT_MS);
  }, HEARTBEAT_INTERVAL_MS);

  ws.on("pong", () => {
    alive = true;
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = null;
    }
  });

  ws.on("close", () => {
    clearInterval(interval);
    if (pongTimer) clearTimeout(pongTimer);
  });
}
