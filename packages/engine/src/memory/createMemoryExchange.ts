import { ExchangeEvent, normalizeAddress } from "@taproom/core";
import { AccrualPolicy } from "../AccrualPolicy";
import { IClock, systemClock } from "../interfaces/IClock";
import { OrderEscrowMarket } from "../OrderEscrowMarket";
import { StaticSettings, StaticSettingsProvider } from "../StaticSettingsProvider";
import { WagerLobbyEngine } from "../WagerLobbyEngine";
import { InMemoryAssetRegistry } from "./InMemoryAssetRegistry";
import { InMemoryLobbyRepository } from "./InMemoryLobbyRepository";
import { InMemoryOrderRepository } from "./InMemoryOrderRepository";
import { InMemoryValueLedger } from "./InMemoryValueLedger";
import { MemoryTransactionRunner } from "./MemoryTransactionRunner";

export interface MemoryExchangeOptions {
  escrowAddress: string;
  settings: StaticSettings;
  clock?: IClock;
  accrualPolicy?: AccrualPolicy;
  defaultMeadPerSecond?: bigint;
  /**
   * Treat every account as held in trust by the escrow, so no allowances or
   * approvals are needed. Used by the server's in-memory store.
   */
  custodial?: boolean;
  onListenerError?: (err: unknown, event: ExchangeEvent) => void;
}

export interface MemoryExchange {
  escrowAddress: string;
  clock: IClock;
  ledger: InMemoryValueLedger;
  registry: InMemoryAssetRegistry;
  runner: MemoryTransactionRunner;
  market: OrderEscrowMarket;
  lobbies: WagerLobbyEngine;
}

/** Both engines wired to in-process stores sharing one runner. */
export function createMemoryExchange(opts: MemoryExchangeOptions): MemoryExchange {
  const escrowAddress = normalizeAddress(opts.escrowAddress, "escrowAddress");
  const clock = opts.clock ?? systemClock;
  const ledger = new InMemoryValueLedger();
  const registry = new InMemoryAssetRegistry();
  const orderRepository = new InMemoryOrderRepository();
  const lobbyRepository = new InMemoryLobbyRepository();

  const runner = new MemoryTransactionRunner({
    orders: orderRepository,
    lobbies: lobbyRepository,
    ledger: ledger.connect(escrowAddress, { custodial: opts.custodial }),
    registry: registry.connect(escrowAddress, { custodial: opts.custodial }),
    participants: [orderRepository, lobbyRepository, ledger, registry],
    onListenerError: opts.onListenerError,
  });

  const market = new OrderEscrowMarket({
    runner,
    settings: new StaticSettingsProvider(opts.settings),
    escrowAddress,
    clock,
  });
  const lobbies = new WagerLobbyEngine({
    runner,
    escrowAddress,
    clock,
    accrualPolicy: opts.accrualPolicy,
    defaultMeadPerSecond: opts.defaultMeadPerSecond,
  });

  return { escrowAddress, clock, ledger, registry, runner, market, lobbies };
}
