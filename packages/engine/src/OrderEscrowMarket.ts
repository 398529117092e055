import {
  EscrowError,
  EscrowErrorCode,
  Order,
  OrderIndexKind,
  OrderStatus,
  Page,
  SaleSplit,
  assertPageRequest,
  ensure,
  normalizeAddress,
  normalizeAssetId,
  splitSale,
} from "@taproom/core";
import { IClock, systemClock } from "./interfaces/IClock";
import { IOrderRepository } from "./interfaces/IRepositories";
import { ISettingsProvider } from "./interfaces/ISettingsProvider";
import { ITransactionRunner } from "./interfaces/ITransactionRunner";
import { IValueLedger } from "./interfaces/IValueLedger";

export interface OrderEscrowMarketOptions {
  runner: ITransactionRunner;
  settings: ISettingsProvider;
  /** Account that holds listed assets and in-flight payments */
  escrowAddress: string;
  clock?: IClock;
}

export interface OrderPurchase {
  order: Order;
  split: SaleSplit;
}

/**
 * Escrowed listings of unique assets against a fungible price.
 *
 * Every write commits the order's new state before any asset or value leaves
 * custody, so a collaborator that calls back into the market observes the
 * order as already canceled or sold.
 */
export class OrderEscrowMarket {
  private readonly runner: ITransactionRunner;
  private readonly settings: ISettingsProvider;
  private readonly clock: IClock;
  readonly escrowAddress: string;

  constructor(opts: OrderEscrowMarketOptions) {
    this.runner = opts.runner;
    this.settings = opts.settings;
    this.clock = opts.clock ?? systemClock;
    this.escrowAddress = normalizeAddress(opts.escrowAddress, "escrowAddress");
  }

  /**
   * List `assetId` for `price`. The asset moves into escrow custody.
   */
  async createOrder(caller: string, assetId: string, price: bigint): Promise<Order> {
    const seller = normalizeAddress(caller, "caller");
    const asset = normalizeAssetId(assetId);
    assertPrice(price);

    return this.runner.run(async ({ orders, registry, events }) => {
      const owner = await registry.ownerOf(asset);
      ensure(
        normalizeAddress(owner) === seller,
        EscrowErrorCode.UNAUTHORIZED,
        `Asset ${asset} is not owned by ${seller}`
      );

      const order: Order = {
        id: await orders.nextOrderId(),
        status: OrderStatus.ACTIVE,
        assetId: asset,
        seller,
        buyer: null,
        price,
      };
      await orders.insert(order);
      await orders.appendIndex("owned", seller, order.id);

      await registry.transferCustody(seller, this.escrowAddress, asset);

      events.emit({
        type: "OrderCreated",
        at: this.clock.now(),
        orderId: order.id,
        assetId: asset,
        seller,
        price,
      });
      return order;
    });
  }

  async updateOrder(caller: string, orderId: number, price: bigint): Promise<Order> {
    const seller = normalizeAddress(caller, "caller");
    assertPrice(price);

    return this.runner.run(async ({ orders, events }) => {
      const order = await requireOrder(orders, orderId);
      requireActive(order);
      requireSeller(order, seller);

      const updated: Order = { ...order, price };
      await orders.update(updated);

      events.emit({
        type: "OrderUpdated",
        at: this.clock.now(),
        orderId,
        seller,
        price,
      });
      return updated;
    });
  }

  /**
   * Withdraw a listing. The asset goes back to the seller.
   */
  async cancelOrder(caller: string, orderId: number): Promise<Order> {
    const seller = normalizeAddress(caller, "caller");

    return this.runner.run(async ({ orders, registry, events }) => {
      const order = await requireOrder(orders, orderId);
      requireActive(order);
      requireSeller(order, seller);

      const canceled: Order = { ...order, status: OrderStatus.CANCELED };
      await orders.update(canceled);

      await registry.transferCustody(this.escrowAddress, seller, order.assetId);

      events.emit({
        type: "OrderCanceled",
        at: this.clock.now(),
        orderId,
        assetId: order.assetId,
        seller,
      });
      return canceled;
    });
  }

  /**
   * Buy an active order. `amount` must equal the current price exactly, so a
   * buyer never pays a price changed after they looked at it.
   */
  async buyOrder(caller: string, orderId: number, amount: bigint): Promise<OrderPurchase> {
    const buyer = normalizeAddress(caller, "caller");

    return this.runner.run(async ({ orders, ledger, registry, events }) => {
      const order = await requireOrder(orders, orderId);
      requireActive(order);
      ensure(
        amount === order.price,
        EscrowErrorCode.AMOUNT_MISMATCH,
        `Order ${orderId} costs ${order.price}, got ${amount}`
      );

      const [feeRate, treasuryFeeRate, treasury, rewardPool] = await Promise.all([
        this.settings.feeRate(),
        this.settings.treasuryFeeRate(),
        this.settings.treasuryAddress(),
        this.settings.rewardPoolAddress(),
      ]);
      const split = splitSale(order.price, feeRate, treasuryFeeRate);

      const sold: Order = { ...order, buyer, status: OrderStatus.SOLD };
      await orders.update(sold);
      await orders.appendIndex("bought", buyer, orderId);

      if (amount > 0n) {
        await ledger.transferFrom(buyer, this.escrowAddress, amount);
      }
      await payOut(ledger, normalizeAddress(treasury, "treasuryAddress"), split.treasuryAmount);
      await payOut(ledger, normalizeAddress(rewardPool, "rewardPoolAddress"), split.rewardPoolAmount);
      await payOut(ledger, order.seller, split.sellerAmount);
      await registry.transferCustody(this.escrowAddress, buyer, order.assetId);

      events.emit({
        type: "OrderBought",
        at: this.clock.now(),
        orderId,
        assetId: order.assetId,
        seller: order.seller,
        buyer,
        price: order.price,
        sellerAmount: split.sellerAmount,
        treasuryAmount: split.treasuryAmount,
        rewardPoolAmount: split.rewardPoolAmount,
      });
      return { order: sold, split };
    });
  }

  // --- Reads ---

  async getOrder(orderId: number): Promise<Order> {
    return this.runner.read(({ orders }) => requireOrder(orders, orderId));
  }

  async countOwnedOrders(address: string): Promise<number> {
    return this.countIndex("owned", address);
  }

  async countBoughtOrders(address: string): Promise<number> {
    return this.countIndex("bought", address);
  }

  /** Ids of orders listed by `address`, in listing order. */
  async fetchOwnedOrders(address: string, cursor: number, howMany: number): Promise<Page<number>> {
    return this.pageIndex("owned", address, cursor, howMany);
  }

  /** Ids of orders bought by `address`, in purchase order. */
  async fetchBoughtOrders(address: string, cursor: number, howMany: number): Promise<Page<number>> {
    return this.pageIndex("bought", address, cursor, howMany);
  }

  private async countIndex(kind: OrderIndexKind, address: string): Promise<number> {
    const account = normalizeAddress(address);
    return this.runner.read(({ orders }) => orders.countIndex(kind, account));
  }

  private async pageIndex(
    kind: OrderIndexKind,
    address: string,
    cursor: number,
    howMany: number
  ): Promise<Page<number>> {
    const account = normalizeAddress(address);
    assertPageRequest(cursor, howMany);
    return this.runner.read(({ orders }) => orders.pageIndex(kind, account, cursor, howMany));
  }
}

function assertPrice(price: bigint): void {
  if (price < 0n) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `price must not be negative, got ${price}`);
  }
}

async function requireOrder(orders: IOrderRepository, orderId: number): Promise<Order> {
  const order = Number.isSafeInteger(orderId) ? await orders.findById(orderId) : undefined;
  if (!order) {
    throw new EscrowError(EscrowErrorCode.NOT_FOUND, `Order ${orderId} does not exist`);
  }
  return order;
}

function requireActive(order: Order): void {
  ensure(
    order.status === OrderStatus.ACTIVE,
    EscrowErrorCode.INVALID_STATE,
    `Order ${order.id} is ${order.status}, not active`
  );
}

function requireSeller(order: Order, caller: string): void {
  ensure(
    order.seller === caller,
    EscrowErrorCode.UNAUTHORIZED,
    `Only the seller of order ${order.id} can do this`
  );
}

// Zero-value payouts are skipped.
async function payOut(ledger: IValueLedger, to: string, amount: bigint): Promise<void> {
  if (amount > 0n) {
    await ledger.transfer(to, amount);
  }
}
