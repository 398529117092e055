import { strict as assert } from "assert";
import {
  BreweryStatus,
  EscrowErrorCode,
  ExchangeEvent,
  LobbyPhase,
  isEscrowError,
} from "@taproom/core";
import { AccrualPolicy, checkpointOnlyAccrual, getAccrualPolicy, linearAccrual } from "./AccrualPolicy";
import { ManualClock } from "./memory/ManualClock";
import { MemoryExchange, createMemoryExchange } from "./memory/createMemoryExchange";

const ESCROW = "0x1000000000000000000000000000000000000001";
const CREATOR = "0x7000000000000000000000000000000000000007";
const JOINER = "0x8000000000000000000000000000000000000008";
const STRANGER = "0x9000000000000000000000000000000000000009";

const NOW = 1_700_000_000;
const START = NOW + 3600;

interface Fixture {
  ex: MemoryExchange;
  clock: ManualClock;
}

function setup(accrualPolicy?: AccrualPolicy, defaultMeadPerSecond?: bigint): Fixture {
  const clock = new ManualClock(NOW);
  const ex = createMemoryExchange({
    escrowAddress: ESCROW,
    settings: {
      feeRate: 0n,
      treasuryFeeRate: 0n,
      treasuryAddress: ESCROW,
      rewardPoolAddress: ESCROW,
    },
    clock,
    accrualPolicy,
    defaultMeadPerSecond,
  });
  for (const account of [CREATOR, JOINER, STRANGER]) {
    ex.ledger.mint(account, 1000n);
    ex.ledger.approve(account, ESCROW, 1000n);
  }
  return { ex, clock };
}

async function rejectsWith(promise: Promise<unknown>, code: EscrowErrorCode): Promise<void> {
  await assert.rejects(promise, (err: unknown) => isEscrowError(err, code));
}

describe("WagerLobbyEngine", () => {
  describe("createLobby", () => {
    it("should escrow the creator's bet under id 1", async () => {
      const { ex } = setup();
      const events: ExchangeEvent[] = [];
      ex.runner.subscribe((e) => events.push(e));

      const lobby = await ex.lobbies.createLobby(CREATOR, START, 100n);

      assert.deepEqual(lobby, {
        id: 1,
        creator: CREATOR,
        joiner: null,
        isCanceled: false,
        startTime: START,
        betAmount: 100n,
        creatorMeadInLand: 0n,
        joinerMeadInLand: 0n,
      });
      assert.equal(ex.ledger.balanceOf(CREATOR), 900n);
      assert.equal(ex.ledger.balanceOf(ESCROW), 100n);
      assert.deepEqual(events, [
        { type: "LobbyCreated", at: NOW, lobbyId: 1, creator: CREATOR, startTime: START, betAmount: 100n },
      ]);
    });

    it("should reject a start time that is not in the future", async () => {
      const { ex } = setup();
      await rejectsWith(ex.lobbies.createLobby(CREATOR, NOW, 100n), EscrowErrorCode.TIMING_VIOLATION);
      const lobby = await ex.lobbies.createLobby(CREATOR, START, 100n);
      assert.equal(lobby.id, 1);
    });

    it("should reject a start time whose end time would not be a safe integer", async () => {
      const { ex } = setup();
      const tooLate = Number.MAX_SAFE_INTEGER - 299;
      await rejectsWith(ex.lobbies.createLobby(CREATOR, tooLate, 100n), EscrowErrorCode.INVALID_ARGUMENT);
      const latest = await ex.lobbies.createLobby(CREATOR, Number.MAX_SAFE_INTEGER - 300, 100n);
      assert.equal(latest.id, 1);
      await rejectsWith(ex.lobbies.updateStartTime(CREATOR, 1, tooLate), EscrowErrorCode.INVALID_ARGUMENT);
    });

    it("should not create the lobby when the bet cannot be paid", async () => {
      const { ex } = setup();
      await rejectsWith(ex.lobbies.createLobby(CREATOR, START, 5000n), EscrowErrorCode.INSUFFICIENT_FUNDS);
      await rejectsWith(ex.lobbies.getLobby(1), EscrowErrorCode.NOT_FOUND);
      assert.equal(ex.ledger.balanceOf(CREATOR), 1000n);
    });
  });

  describe("updateStartTime", () => {
    it("should move the start time for the creator", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      const updated = await ex.lobbies.updateStartTime(CREATOR, 1, START + 600);
      assert.equal(updated.startTime, START + 600);
    });

    it("should reject anyone but the creator", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await rejectsWith(ex.lobbies.updateStartTime(JOINER, 1, START + 600), EscrowErrorCode.UNAUTHORIZED);
    });

    it("should reject a new start time in the past", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await rejectsWith(ex.lobbies.updateStartTime(CREATOR, 1, NOW - 1), EscrowErrorCode.TIMING_VIOLATION);
      assert.equal((await ex.lobbies.getLobby(1)).startTime, START);
    });

    it("should reject once the lobby has started", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      clock.set(START);
      await rejectsWith(ex.lobbies.updateStartTime(CREATOR, 1, START + 600), EscrowErrorCode.TIMING_VIOLATION);
    });
  });

  describe("joinLobby and unjoinLobby", () => {
    it("should escrow the joiner's matching bet", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      const joined = await ex.lobbies.joinLobby(JOINER, 1);

      assert.equal(joined.joiner, JOINER);
      assert.equal(ex.ledger.balanceOf(JOINER), 900n);
      assert.equal(ex.ledger.balanceOf(ESCROW), 200n);
    });

    it("should reject a second joiner", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      await rejectsWith(ex.lobbies.joinLobby(STRANGER, 1), EscrowErrorCode.ALREADY_IN_STATE);
      assert.equal(ex.ledger.balanceOf(STRANGER), 1000n);
    });

    it("should not let the creator join its own lobby", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await rejectsWith(ex.lobbies.joinLobby(CREATOR, 1), EscrowErrorCode.UNAUTHORIZED);
    });

    it("should refund and reopen when unjoining 100 seconds before start", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      clock.set(NOW + 3500);

      const reopened = await ex.lobbies.unjoinLobby(JOINER, 1);

      assert.equal(reopened.joiner, null);
      assert.equal(ex.ledger.balanceOf(JOINER), 1000n);
      assert.equal(ex.ledger.balanceOf(ESCROW), 100n);

      const rejoined = await ex.lobbies.joinLobby(STRANGER, 1);
      assert.equal(rejoined.joiner, STRANGER);
    });

    it("should refuse to unjoin 50 seconds before start and keep the joiner", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      clock.set(NOW + 3550);

      await rejectsWith(ex.lobbies.unjoinLobby(JOINER, 1), EscrowErrorCode.TIMING_VIOLATION);

      assert.equal((await ex.lobbies.getLobby(1)).joiner, JOINER);
      assert.equal(ex.ledger.balanceOf(JOINER), 900n);
    });

    it("should refuse to unjoin exactly 60 seconds before start", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      clock.set(START - 60);
      await rejectsWith(ex.lobbies.unjoinLobby(JOINER, 1), EscrowErrorCode.TIMING_VIOLATION);
    });

    it("should reject an unjoin from someone other than the joiner", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      await rejectsWith(ex.lobbies.unjoinLobby(STRANGER, 1), EscrowErrorCode.UNAUTHORIZED);
    });
  });

  describe("cancelLobby", () => {
    it("should refund both stakes exactly once", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      const events: ExchangeEvent[] = [];
      ex.runner.subscribe((e) => events.push(e));

      const canceled = await ex.lobbies.cancelLobby(CREATOR, 1);

      assert.equal(canceled.isCanceled, true);
      assert.equal(ex.ledger.balanceOf(CREATOR), 1000n);
      assert.equal(ex.ledger.balanceOf(JOINER), 1000n);
      assert.equal(ex.ledger.balanceOf(ESCROW), 0n);
      assert.deepEqual(events, [
        { type: "LobbyCanceled", at: NOW, lobbyId: 1, creator: CREATOR, joiner: JOINER, betAmount: 100n },
      ]);
    });

    it("should leave a canceled lobby unusable", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.cancelLobby(CREATOR, 1);

      await rejectsWith(ex.lobbies.cancelLobby(CREATOR, 1), EscrowErrorCode.INVALID_STATE);
      await rejectsWith(ex.lobbies.joinLobby(JOINER, 1), EscrowErrorCode.INVALID_STATE);
      await rejectsWith(ex.lobbies.updateStartTime(CREATOR, 1, START + 1), EscrowErrorCode.INVALID_STATE);
      assert.equal(ex.ledger.balanceOf(CREATOR), 1000n);
      assert.equal(await ex.lobbies.getLobbyPhase(1), LobbyPhase.CANCELED);
    });

    it("should reject anyone but the creator", async () => {
      const { ex } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      await rejectsWith(ex.lobbies.cancelLobby(JOINER, 1), EscrowErrorCode.UNAUTHORIZED);
    });

    it("should reject after start", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      clock.set(START + 1);
      await rejectsWith(ex.lobbies.cancelLobby(CREATOR, 1), EscrowErrorCode.TIMING_VIOLATION);
    });

    it("should report a missing lobby", async () => {
      const { ex } = setup();
      await rejectsWith(ex.lobbies.cancelLobby(CREATOR, 7), EscrowErrorCode.NOT_FOUND);
    });
  });

  describe("toggleValve", () => {
    async function startedLobby(): Promise<Fixture> {
      const fixture = setup();
      await fixture.ex.lobbies.createLobby(CREATOR, START, 100n);
      await fixture.ex.lobbies.joinLobby(JOINER, 1);
      return fixture;
    }

    it("should reject before the lobby starts", async () => {
      const { ex } = await startedLobby();
      await rejectsWith(ex.lobbies.toggleValve(CREATOR, 1, true), EscrowErrorCode.TIMING_VIOLATION);
    });

    it("should alternate and move the checkpoint each time", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START + 10);
      const opened = await ex.lobbies.toggleValve(CREATOR, 1, true);
      assert.equal(opened.isValveOpened, true);
      assert.equal(opened.lastUpdatedAt, START + 10);

      clock.set(START + 30);
      const closed = await ex.lobbies.toggleValve(CREATOR, 1, false);
      assert.equal(closed.isValveOpened, false);
      assert.equal(closed.lastUpdatedAt, START + 30);

      assert.deepEqual(await ex.lobbies.getBreweryStatus(1, CREATOR), closed);
    });

    it("should reject a redundant toggle", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START + 10);
      await ex.lobbies.toggleValve(JOINER, 1, true);
      clock.set(START + 20);
      await rejectsWith(ex.lobbies.toggleValve(JOINER, 1, true), EscrowErrorCode.ALREADY_IN_STATE);
      assert.equal((await ex.lobbies.getBreweryStatus(1, JOINER)).lastUpdatedAt, START + 10);
    });

    it("should reject closing a valve that was never opened", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START);
      await rejectsWith(ex.lobbies.toggleValve(CREATOR, 1, false), EscrowErrorCode.ALREADY_IN_STATE);
    });

    it("should keep each participant's valve separate", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START + 5);
      await ex.lobbies.toggleValve(CREATOR, 1, true);
      assert.equal((await ex.lobbies.getBreweryStatus(1, JOINER)).isValveOpened, false);
    });

    it("should reject a stranger", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START + 5);
      await rejectsWith(ex.lobbies.toggleValve(STRANGER, 1, true), EscrowErrorCode.UNAUTHORIZED);
    });

    it("should reject once the five minute window has passed", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START + 300);
      await rejectsWith(ex.lobbies.toggleValve(CREATOR, 1, true), EscrowErrorCode.TIMING_VIOLATION);
    });

    it("should reject a lobby nobody joined", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      clock.set(START + 5);
      await rejectsWith(ex.lobbies.toggleValve(CREATOR, 1, true), EscrowErrorCode.INVALID_STATE);
    });

    it("should emit ValveToggled", async () => {
      const { ex, clock } = await startedLobby();
      clock.set(START + 5);
      const events: ExchangeEvent[] = [];
      ex.runner.subscribe((e) => events.push(e));
      await ex.lobbies.toggleValve(JOINER, 1, true);
      assert.deepEqual(events, [
        { type: "ValveToggled", at: START + 5, lobbyId: 1, participant: JOINER, isValveOpened: true },
      ]);
    });
  });

  describe("getLobbyPhase", () => {
    it("should follow the lobby through its life", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      assert.equal(await ex.lobbies.getLobbyPhase(1), LobbyPhase.OPEN);

      await ex.lobbies.joinLobby(JOINER, 1);
      assert.equal(await ex.lobbies.getLobbyPhase(1), LobbyPhase.JOINED);

      clock.set(START);
      assert.equal(await ex.lobbies.getLobbyPhase(1), LobbyPhase.IN_PROGRESS);

      clock.set(START + 300);
      assert.equal(await ex.lobbies.getLobbyPhase(1), LobbyPhase.ENDED);
    });

    it("should end a lobby nobody joined at its start time", async () => {
      const { ex, clock } = setup();
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      clock.set(START);
      assert.equal(await ex.lobbies.getLobbyPhase(1), LobbyPhase.ENDED);
    });
  });

  describe("accrual", () => {
    it("should default to checkpoint-only accrual", async () => {
      const { ex, clock } = setup(undefined, 5n);
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);
      clock.set(START);
      await ex.lobbies.toggleValve(CREATOR, 1, true);
      clock.set(START + 100);

      assert.equal(ex.lobbies.accrualPolicy.name, "checkpoint");
      assert.equal(await ex.lobbies.totalMead(1, CREATOR), 0n);
    });

    it("should accrue open-valve seconds under the linear policy", async () => {
      const { ex, clock } = setup(linearAccrual, 2n);
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      await ex.lobbies.joinLobby(JOINER, 1);

      clock.set(START + 10);
      await ex.lobbies.toggleValve(CREATOR, 1, true);
      clock.set(START + 40);
      const closed = await ex.lobbies.toggleValve(CREATOR, 1, false);
      assert.equal(closed.mead, 60n);

      clock.set(START + 100);
      await ex.lobbies.toggleValve(CREATOR, 1, true);
      clock.set(START + 1000);
      // Production stops at the end of the window.
      assert.equal(await ex.lobbies.totalMead(1, CREATOR), 60n + 400n);
    });

    it("should create a brewery lazily with the default rate", async () => {
      const { ex } = setup(undefined, 3n);
      await ex.lobbies.createLobby(CREATOR, START, 100n);
      const expected: BreweryStatus = {
        lobbyId: 1,
        address: STRANGER,
        mead: 0n,
        points: 0n,
        isValveOpened: false,
        lastUpdatedAt: NOW,
        meadPerSecond: 3n,
      };
      assert.deepEqual(await ex.lobbies.getBreweryStatus(1, STRANGER), expected);
    });
  });
});

describe("AccrualPolicy", () => {
  const status: BreweryStatus = {
    lobbyId: 1,
    address: CREATOR,
    mead: 10n,
    points: 0n,
    isValveOpened: true,
    lastUpdatedAt: 100,
    meadPerSecond: 3n,
  };

  it("should only move the checkpoint under checkpoint-only accrual", () => {
    assert.deepEqual(checkpointOnlyAccrual.checkpoint(status, 150, { start: 0, end: 1000 }), {
      ...status,
      lastUpdatedAt: 150,
    });
  });

  it("should clamp linear accrual to the window", () => {
    const next = linearAccrual.checkpoint(status, 500, { start: 120, end: 200 });
    assert.equal(next.mead, 10n + 80n * 3n);
    assert.equal(next.lastUpdatedAt, 500);
  });

  it("should produce nothing with the valve closed", () => {
    const next = linearAccrual.checkpoint({ ...status, isValveOpened: false }, 500, { start: 0, end: 1000 });
    assert.equal(next.mead, 10n);
  });

  it("should look policies up by name", () => {
    assert.equal(getAccrualPolicy("linear"), linearAccrual);
    assert.equal(getAccrualPolicy("checkpoint"), checkpointOnlyAccrual);
    assert.throws(() => getAccrualPolicy("compound"), /Unknown accrual policy "compound"/);
  });
});
