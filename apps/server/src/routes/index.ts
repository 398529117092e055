import { Express, Request, Response } from "express";
import {
  EscrowError,
  EscrowErrorCode,
  isEscrowError,
  normalizeAddress,
  parseAmount,
  toWire,
} from "@taproom/core";
import { Exchange } from "../services/ExchangeService";
import log from "../logger";
import { ClaimSignature, requestBody, requireAdmin, requireAuth } from "./auth";

export interface RouteOptions {
  claimSignature: ClaimSignature;
  adminSecret: string;
}

const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;
const UINT_RE = /^(0|[1-9][0-9]*)$/;

const STATUS_BY_CODE: Record<EscrowErrorCode, number> = {
  [EscrowErrorCode.NOT_FOUND]: 404,
  [EscrowErrorCode.UNAUTHORIZED]: 403,
  [EscrowErrorCode.INVALID_ARGUMENT]: 400,
  [EscrowErrorCode.INSUFFICIENT_FUNDS]: 402,
  [EscrowErrorCode.INVALID_STATE]: 409,
  [EscrowErrorCode.TIMING_VIOLATION]: 409,
  [EscrowErrorCode.AMOUNT_MISMATCH]: 409,
  [EscrowErrorCode.ALREADY_IN_STATE]: 409,
};

function sendError(req: Request, res: Response, err: unknown): void {
  if (isEscrowError(err)) {
    res.status(STATUS_BY_CODE[err.code]).json({ error: err.message, code: err.code });
    return;
  }
  log.error({ err, method: req.method, path: req.path }, "Unhandled route error");
  res.status(500).json({ error: "Internal server error" });
}

/** A non-negative integer from a path segment, query value or JSON number. */
function parseInteger(value: unknown, field: string): number {
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === "string" && UINT_RE.test(value) && Number.isSafeInteger(Number(value))) {
    return Number(value);
  }
  throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `${field} must be a non-negative integer`);
}

function parsePage(req: Request): { cursor: number; howMany: number } {
  const { cursor, howMany } = req.query;
  return {
    cursor: cursor === undefined ? 0 : parseInteger(cursor, "cursor"),
    howMany: howMany === undefined ? DEFAULT_PAGE_SIZE : Math.min(parseInteger(howMany, "howMany"), MAX_PAGE_SIZE),
  };
}

export function bindRoutes(app: Express, exchange: Exchange, options: RouteOptions) {
  const { market, lobbies, custody } = exchange;
  const { claimSignature, adminSecret } = options;

  // Health check
  app.get("/health/check", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      store: exchange.store,
    });
  });

  // ---- Orders ----

  app.get("/api/orders/:orderId", async (req, res) => {
    try {
      const order = await market.getOrder(parseInteger(req.params.orderId, "orderId"));
      res.json({ order: toWire(order) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.get("/api/accounts/:address/orders/owned", async (req, res) => {
    try {
      const address = normalizeAddress(req.params.address);
      const { cursor, howMany } = parsePage(req);
      const [page, total] = await Promise.all([
        market.fetchOwnedOrders(address, cursor, howMany),
        market.countOwnedOrders(address),
      ]);
      res.json({ ...page, total });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.get("/api/accounts/:address/orders/bought", async (req, res) => {
    try {
      const address = normalizeAddress(req.params.address);
      const { cursor, howMany } = parsePage(req);
      const [page, total] = await Promise.all([
        market.fetchBoughtOrders(address, cursor, howMany),
        market.countBoughtOrders(address),
      ]);
      res.json({ ...page, total });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.get("/api/accounts/:address/balance", async (req, res) => {
    try {
      const address = normalizeAddress(req.params.address);
      const balance = await custody.balanceOf(address);
      res.json({ address, balance: balance.toString() });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/orders", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const { assetId, price } = requestBody(req);
      const order = await market.createOrder(auth.address, String(assetId), parseAmount(price, "price"));
      log.info({ orderId: order.id, seller: auth.address }, "Order created");
      res.status(201).json({ order: toWire(order) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.patch("/api/orders/:orderId", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const { price } = requestBody(req);
      const order = await market.updateOrder(
        auth.address,
        parseInteger(req.params.orderId, "orderId"),
        parseAmount(price, "price")
      );
      res.json({ order: toWire(order) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/orders/:orderId/cancel", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const order = await market.cancelOrder(auth.address, parseInteger(req.params.orderId, "orderId"));
      log.info({ orderId: order.id }, "Order canceled");
      res.json({ order: toWire(order) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/orders/:orderId/buy", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const { amount } = requestBody(req);
      const purchase = await market.buyOrder(
        auth.address,
        parseInteger(req.params.orderId, "orderId"),
        parseAmount(amount)
      );
      log.info({ orderId: purchase.order.id, buyer: auth.address, price: purchase.split.price.toString() }, "Order bought");
      res.json(toWire(purchase));
    } catch (err) {
      sendError(req, res, err);
    }
  });

  // ---- Lobbies ----

  app.get("/api/lobbies/:lobbyId", async (req, res) => {
    try {
      const lobbyId = parseInteger(req.params.lobbyId, "lobbyId");
      const [lobby, phase] = await Promise.all([lobbies.getLobby(lobbyId), lobbies.getLobbyPhase(lobbyId)]);
      res.json({ lobby: toWire(lobby), phase });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.get("/api/lobbies/:lobbyId/brewery/:address", async (req, res) => {
    try {
      const lobbyId = parseInteger(req.params.lobbyId, "lobbyId");
      const address = normalizeAddress(req.params.address);
      const [status, totalMead] = await Promise.all([
        lobbies.getBreweryStatus(lobbyId, address),
        lobbies.totalMead(lobbyId, address),
      ]);
      res.json({ status: toWire(status), totalMead: totalMead.toString() });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/lobbies", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const { startTime, betAmount } = requestBody(req);
      const lobby = await lobbies.createLobby(
        auth.address,
        parseInteger(startTime, "startTime"),
        parseAmount(betAmount, "betAmount")
      );
      log.info({ lobbyId: lobby.id, creator: auth.address }, "Lobby created");
      res.status(201).json({ lobby: toWire(lobby) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.patch("/api/lobbies/:lobbyId", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const { startTime } = requestBody(req);
      const lobby = await lobbies.updateStartTime(
        auth.address,
        parseInteger(req.params.lobbyId, "lobbyId"),
        parseInteger(startTime, "startTime")
      );
      res.json({ lobby: toWire(lobby) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/lobbies/:lobbyId/cancel", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const lobby = await lobbies.cancelLobby(auth.address, parseInteger(req.params.lobbyId, "lobbyId"));
      log.info({ lobbyId: lobby.id }, "Lobby canceled");
      res.json({ lobby: toWire(lobby) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/lobbies/:lobbyId/join", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const lobby = await lobbies.joinLobby(auth.address, parseInteger(req.params.lobbyId, "lobbyId"));
      res.json({ lobby: toWire(lobby) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/lobbies/:lobbyId/unjoin", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const lobby = await lobbies.unjoinLobby(auth.address, parseInteger(req.params.lobbyId, "lobbyId"));
      res.json({ lobby: toWire(lobby) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/lobbies/:lobbyId/valve", async (req, res) => {
    try {
      const auth = await requireAuth(req, res, claimSignature);
      if (!auth) return;
      const { open } = requestBody(req);
      if (typeof open !== "boolean") {
        throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, "open must be a boolean");
      }
      const status = await lobbies.toggleValve(auth.address, parseInteger(req.params.lobbyId, "lobbyId"), open);
      res.json({ status: toWire(status) });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  // ---- Admin (custody funding) ----

  app.post("/api/admin/credit", async (req, res) => {
    if (!requireAdmin(req, res, adminSecret)) return;
    try {
      const { address, amount } = requestBody(req);
      const account = normalizeAddress(String(address));
      const balance = await custody.credit(account, parseAmount(amount));
      log.info({ address: account, amount: String(amount) }, "Admin: balance credited");
      res.json({ address: account, balance: balance.toString() });
    } catch (err) {
      sendError(req, res, err);
    }
  });

  app.post("/api/admin/assets", async (req, res) => {
    if (!requireAdmin(req, res, adminSecret)) return;
    try {
      const { assetId, owner } = requestBody(req);
      const account = normalizeAddress(String(owner), "owner");
      await custody.registerAsset(String(assetId), account);
      log.info({ assetId: String(assetId), owner: account }, "Admin: asset registered");
      res.status(201).json({ assetId: String(assetId), owner: account });
    } catch (err) {
      sendError(req, res, err);
    }
  });
}
