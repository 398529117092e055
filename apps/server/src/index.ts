import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { migrateToLatest, closeDb, createRedisClient } from "@taproom/core";
import config from "./config";
import log from "./logger";
import { ClaimSignature, memorySignatureGuard, redisSignatureGuard } from "./routes/auth";
import {
  Exchange,
  ExchangeSettings,
  createMemoryExchangeService,
  createPostgresExchangeService,
} from "./services/ExchangeService";
import { createHttpWsServer } from "./ws/server";

(async function main() {
  const settings: ExchangeSettings = {
    escrowAddress: config.escrowAddress,
    treasuryAddress: config.treasuryAddress,
    rewardPoolAddress: config.rewardPoolAddress,
    feeRate: config.feeRateBps,
    treasuryFeeRate: config.treasuryFeeRateBps,
    accrualPolicy: config.accrualPolicy,
    defaultMeadPerSecond: config.defaultMeadPerSecond,
    onListenerError: (err, event) => log.error({ err, eventType: event.type }, "Event listener failed"),
  };

  let exchange: Exchange;
  let claimSignature: ClaimSignature;
  let shutdownStore: () => Promise<void>;

  if (config.store === "postgres") {
    // 1. Initialize database
    await migrateToLatest({ log: (msg) => log.info(msg) });

    // 2. Initialize Redis
    const redis = createRedisClient();
    redis.on("connect", () => log.info("Redis connected"));
    redis.on("error", (err) => log.error({ err: err.message }, "Redis error"));

    exchange = createPostgresExchangeService(settings);
    claimSignature = redisSignatureGuard(redis);
    shutdownStore = async () => {
      await redis.quit();
      await closeDb();
    };
  } else {
    log.warn("Using the in-memory store: all orders, lobbies and balances are lost on restart");
    exchange = createMemoryExchangeService(settings);
    claimSignature = memorySignatureGuard();
    shutdownStore = async () => undefined;
  }

  log.info(
    {
      store: exchange.store,
      escrow: config.escrowAddress,
      feeRateBps: config.feeRateBps.toString(),
      treasuryFeeRateBps: config.treasuryFeeRateBps.toString(),
      accrualPolicy: exchange.lobbies.accrualPolicy.name,
    },
    "Exchange ready"
  );

  // 3. Start HTTP + WebSocket server
  const { httpServer } = createHttpWsServer(exchange, {
    claimSignature,
    adminSecret: config.adminSecret,
  });
  httpServer.listen(config.port, () => {
    log.info({ port: config.port }, "HTTP/WS server listening");
  });

  log.info("taproom server started");

  // Graceful shutdown
  const shutdown = async () => {
    log.info("Shutting down...");
    httpServer.close();
    await shutdownStore();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
})().catch((err: unknown) => {
  log.fatal({ err }, "Server failed to start");
  process.exit(1);
});
