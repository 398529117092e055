import {
  EscrowError,
  EscrowErrorCode,
  ExchangeEvent,
  creditBalance,
  findAssetOwner,
  getBalance,
  inSerializableTransaction,
  insertAsset,
  normalizeAddress,
  normalizeAssetId,
} from "@taproom/core";
import {
  IClock,
  ITransactionRunner,
  OrderEscrowMarket,
  StaticSettings,
  StaticSettingsProvider,
  WagerLobbyEngine,
  createMemoryExchange,
  getAccrualPolicy,
} from "@taproom/engine";
import { StoreKind } from "../config";
import { PostgresTransactionRunner } from "../persistence/PostgresTransactionRunner";

/**
 * Funding side of custody: how value and assets enter the exchange's trust.
 */
export interface CustodyAdmin {
  /** Credit `amount` to `address` and return the new balance. */
  credit(address: string, amount: bigint): Promise<bigint>;
  registerAsset(assetId: string, owner: string): Promise<void>;
  balanceOf(address: string): Promise<bigint>;
}

export interface Exchange {
  store: StoreKind;
  runner: ITransactionRunner;
  market: OrderEscrowMarket;
  lobbies: WagerLobbyEngine;
  custody: CustodyAdmin;
}

export interface ExchangeSettings extends StaticSettings {
  escrowAddress: string;
  accrualPolicy: string;
  defaultMeadPerSecond: bigint;
  clock?: IClock;
  onListenerError?: (err: unknown, event: ExchangeEvent) => void;
}

function assertCredit(amount: bigint): void {
  if (amount <= 0n) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `amount must be positive, got ${amount}`);
  }
}

/**
 * Everything in process memory; state is lost on restart. Accounts are held
 * in trust, so no allowances or approvals are involved.
 */
export function createMemoryExchangeService(settings: ExchangeSettings): Exchange {
  const ex = createMemoryExchange({
    escrowAddress: settings.escrowAddress,
    settings,
    clock: settings.clock,
    accrualPolicy: getAccrualPolicy(settings.accrualPolicy),
    defaultMeadPerSecond: settings.defaultMeadPerSecond,
    custodial: true,
    onListenerError: settings.onListenerError,
  });

  const custody: CustodyAdmin = {
    credit: async (address, amount) => {
      assertCredit(amount);
      return ex.runner.run(async () => {
        ex.ledger.mint(address, amount);
        return ex.ledger.balanceOf(address);
      });
    },
    registerAsset: (assetId, owner) =>
      ex.runner.run(async () => {
        ex.registry.mint(owner, assetId);
      }),
    balanceOf: (address) => ex.runner.read(async () => ex.ledger.balanceOf(address)),
  };

  return { store: "memory", runner: ex.runner, market: ex.market, lobbies: ex.lobbies, custody };
}

export function createPostgresExchangeService(settings: ExchangeSettings): Exchange {
  const runner = new PostgresTransactionRunner({
    escrowAddress: settings.escrowAddress,
    onListenerError: settings.onListenerError,
  });
  const market = new OrderEscrowMarket({
    runner,
    settings: new StaticSettingsProvider(settings),
    escrowAddress: settings.escrowAddress,
    clock: settings.clock,
  });
  const lobbies = new WagerLobbyEngine({
    runner,
    escrowAddress: settings.escrowAddress,
    clock: settings.clock,
    accrualPolicy: getAccrualPolicy(settings.accrualPolicy),
    defaultMeadPerSecond: settings.defaultMeadPerSecond,
  });

  const custody: CustodyAdmin = {
    credit: async (address, amount) => {
      const account = normalizeAddress(address);
      assertCredit(amount);
      return inSerializableTransaction(async (trx) => {
        await creditBalance(account, amount, trx);
        return getBalance(account, trx);
      });
    },
    registerAsset: async (assetId, owner) => {
      const asset = normalizeAssetId(assetId);
      const account = normalizeAddress(owner, "owner");
      await inSerializableTransaction(async (trx) => {
        if (await findAssetOwner(asset, trx)) {
          throw new EscrowError(EscrowErrorCode.ALREADY_IN_STATE, `Asset ${asset} already exists`);
        }
        await insertAsset(asset, account, trx);
      });
    },
    balanceOf: async (address) => getBalance(normalizeAddress(address)),
  };

  return { store: "postgres", runner, market, lobbies, custody };
}
