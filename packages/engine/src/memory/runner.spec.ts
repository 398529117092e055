import { strict as assert } from "assert";
import { EscrowErrorCode, ExchangeEvent, isEscrowError } from "@taproom/core";
import { InMemoryAssetRegistry } from "./InMemoryAssetRegistry";
import { InMemoryLobbyRepository } from "./InMemoryLobbyRepository";
import { InMemoryOrderRepository } from "./InMemoryOrderRepository";
import { InMemoryValueLedger } from "./InMemoryValueLedger";
import { MemoryTransactionRunner } from "./MemoryTransactionRunner";

const ESCROW = "0x1000000000000000000000000000000000000001";
const ALICE = "0x2000000000000000000000000000000000000002";

function updated(orderId: number): ExchangeEvent {
  return { type: "OrderUpdated", at: 1, orderId, seller: ALICE, price: 1n };
}

function setup(onListenerError?: (err: unknown, event: ExchangeEvent) => void) {
  const ledger = new InMemoryValueLedger();
  const registry = new InMemoryAssetRegistry();
  const orders = new InMemoryOrderRepository();
  const lobbies = new InMemoryLobbyRepository();
  const runner = new MemoryTransactionRunner({
    orders,
    lobbies,
    ledger: ledger.connect(ESCROW, { custodial: true }),
    registry: registry.connect(ESCROW, { custodial: true }),
    participants: [orders, lobbies, ledger, registry],
    onListenerError,
  });
  ledger.mint(ESCROW, 100n);
  return { ledger, orders, runner };
}

describe("MemoryTransactionRunner", () => {
  it("should restore every participant when the work throws", async () => {
    const { ledger, orders, runner } = setup();

    await assert.rejects(
      runner.run(async (unit) => {
        await unit.orders.nextOrderId();
        await unit.ledger.transfer(ALICE, 40n);
        unit.events.emit(updated(0));
        throw new Error("boom");
      }),
      /boom/
    );

    assert.equal(ledger.balanceOf(ALICE), 0n);
    assert.equal(ledger.balanceOf(ESCROW), 100n);
    assert.equal(await orders.nextOrderId(), 0);
  });

  it("should run operations one at a time in submission order", async () => {
    const { runner } = setup();
    const trace: string[] = [];

    await Promise.all([
      runner.run(async () => {
        trace.push("a:start");
        await new Promise((resolve) => setTimeout(resolve, 5));
        trace.push("a:end");
      }),
      runner.run(async () => {
        trace.push("b:start");
        trace.push("b:end");
      }),
    ]);

    assert.deepEqual(trace, ["a:start", "a:end", "b:start", "b:end"]);
  });

  it("should keep going after a failed operation", async () => {
    const { runner } = setup();
    await assert.rejects(runner.run(async () => Promise.reject(new Error("first"))), /first/);
    assert.equal(await runner.run(async () => 7), 7);
  });

  it("should publish events only after commit", async () => {
    const { runner } = setup();
    const seen: ExchangeEvent[] = [];
    runner.subscribe((e) => seen.push(e));

    await runner.run(async ({ events }) => {
      events.emit(updated(1));
      assert.deepEqual(seen, []);
    });
    await assert.rejects(
      runner.run(async ({ events }) => {
        events.emit(updated(2));
        throw new Error("rolled back");
      })
    );

    assert.deepEqual(seen, [updated(1)]);
  });

  it("should run a nested call immediately inside its own savepoint", async () => {
    const { ledger, runner } = setup();
    const seen: ExchangeEvent[] = [];
    runner.subscribe((e) => seen.push(e));

    await runner.run(async (outer) => {
      await outer.ledger.transfer(ALICE, 10n);
      outer.events.emit(updated(1));

      await assert.rejects(
        runner.run(async (inner) => {
          await inner.ledger.transfer(ALICE, 20n);
          inner.events.emit(updated(2));
          throw new Error("inner failed");
        }),
        /inner failed/
      );

      await runner.run(async (inner) => {
        inner.events.emit(updated(3));
      });
    });

    assert.equal(ledger.balanceOf(ALICE), 10n);
    assert.deepEqual(seen, [updated(1), updated(3)]);
  });

  it("should queue a call fired after its caller committed", async () => {
    const { runner } = setup();
    const published: number[] = [];
    runner.subscribe((e) => {
      if (e.type === "OrderUpdated") published.push(e.orderId);
    });
    const late: Promise<void>[] = [];

    await runner.run(async (unit) => {
      unit.events.emit(updated(1));
      late.push(
        new Promise<void>((resolve, reject) => {
          setImmediate(() => {
            runner
              .run(async (inner) => {
                inner.events.emit(updated(2));
              })
              .then(resolve, reject);
          });
        })
      );
    });
    assert.deepEqual(published, [1]);

    await Promise.all(late);
    assert.deepEqual(published, [1, 2]);
  });

  it("should hand listener errors to the error callback", async () => {
    const failures: unknown[] = [];
    const { runner } = setup((err) => failures.push(err));
    const seen: ExchangeEvent[] = [];
    runner.subscribe(() => {
      throw new Error("listener broke");
    });
    runner.subscribe((e) => seen.push(e));

    await runner.run(async ({ events }) => events.emit(updated(1)));

    assert.equal(failures.length, 1);
    assert.deepEqual(seen, [updated(1)]);
  });

  it("should stop delivering after unsubscribe", async () => {
    const { runner } = setup();
    const seen: ExchangeEvent[] = [];
    const unsubscribe = runner.subscribe((e) => seen.push(e));
    unsubscribe();
    await runner.run(async ({ events }) => events.emit(updated(1)));
    assert.deepEqual(seen, []);
  });

  it("should surface ledger shortfalls as insufficient funds", async () => {
    const { runner } = setup();
    await assert.rejects(
      runner.run(({ ledger }) => ledger.transfer(ALICE, 1000n)),
      (err: unknown) => isEscrowError(err, EscrowErrorCode.INSUFFICIENT_FUNDS)
    );
  });
});
