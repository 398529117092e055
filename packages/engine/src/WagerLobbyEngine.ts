import {
  BreweryStatus,
  EscrowError,
  EscrowErrorCode,
  LOBBY_IN_PROGRESS_SECONDS,
  LOBBY_UNJOIN_CUTOFF_SECONDS,
  Lobby,
  LobbyPhase,
  ensure,
  getLobbyPhase,
  lobbyEndTime,
  normalizeAddress,
} from "@taproom/core";
import { AccrualPolicy, AccrualWindow, checkpointOnlyAccrual } from "./AccrualPolicy";
import { IClock, systemClock } from "./interfaces/IClock";
import { ILobbyRepository } from "./interfaces/IRepositories";
import { ITransactionRunner } from "./interfaces/ITransactionRunner";
import { IValueLedger } from "./interfaces/IValueLedger";

export interface WagerLobbyEngineOptions {
  runner: ITransactionRunner;
  /** Account that holds the stakes */
  escrowAddress: string;
  clock?: IClock;
  accrualPolicy?: AccrualPolicy;
  /** Production rate given to a brewery when it is first touched */
  defaultMeadPerSecond?: bigint;
}

/**
 * Paired-stake lobbies: a creator escrows a bet, a joiner matches it, and
 * both may toggle their valve during the five minutes after `startTime`.
 */
export class WagerLobbyEngine {
  private readonly runner: ITransactionRunner;
  private readonly clock: IClock;
  private readonly accrual: AccrualPolicy;
  private readonly defaultMeadPerSecond: bigint;
  readonly escrowAddress: string;

  constructor(opts: WagerLobbyEngineOptions) {
    this.runner = opts.runner;
    this.clock = opts.clock ?? systemClock;
    this.accrual = opts.accrualPolicy ?? checkpointOnlyAccrual;
    this.defaultMeadPerSecond = opts.defaultMeadPerSecond ?? 0n;
    this.escrowAddress = normalizeAddress(opts.escrowAddress, "escrowAddress");
    if (this.defaultMeadPerSecond < 0n) {
      throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, "defaultMeadPerSecond must not be negative");
    }
  }

  get accrualPolicy(): AccrualPolicy {
    return this.accrual;
  }

  async createLobby(caller: string, startTime: number, betAmount: bigint): Promise<Lobby> {
    const creator = normalizeAddress(caller, "caller");
    assertTime(startTime, "startTime");
    if (betAmount < 0n) {
      throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `betAmount must not be negative, got ${betAmount}`);
    }

    return this.runner.run(async ({ lobbies, ledger, events }) => {
      const now = this.clock.now();
      ensure(
        startTime > now,
        EscrowErrorCode.TIMING_VIOLATION,
        `startTime ${startTime} is not in the future`
      );

      const lobby: Lobby = {
        id: await lobbies.nextLobbyId(),
        creator,
        joiner: null,
        isCanceled: false,
        startTime,
        betAmount,
        creatorMeadInLand: 0n,
        joinerMeadInLand: 0n,
      };
      await lobbies.insert(lobby);

      await pullStake(ledger, creator, this.escrowAddress, betAmount);

      events.emit({
        type: "LobbyCreated",
        at: now,
        lobbyId: lobby.id,
        creator,
        startTime,
        betAmount,
      });
      return lobby;
    });
  }

  async updateStartTime(caller: string, lobbyId: number, newStartTime: number): Promise<Lobby> {
    const creator = normalizeAddress(caller, "caller");
    assertTime(newStartTime, "newStartTime");

    return this.runner.run(async ({ lobbies, events }) => {
      const now = this.clock.now();
      const lobby = await requireLobby(lobbies, lobbyId);
      requireOpen(lobby, now);
      requireCreator(lobby, creator);
      ensure(
        newStartTime > now,
        EscrowErrorCode.TIMING_VIOLATION,
        `newStartTime ${newStartTime} is not in the future`
      );

      const updated: Lobby = { ...lobby, startTime: newStartTime };
      await lobbies.update(updated);

      events.emit({
        type: "LobbyUpdated",
        at: now,
        lobbyId,
        creator,
        startTime: newStartTime,
      });
      return updated;
    });
  }

  /**
   * Cancel before start. Both stakes go back to whoever put them in.
   */
  async cancelLobby(caller: string, lobbyId: number): Promise<Lobby> {
    const creator = normalizeAddress(caller, "caller");

    return this.runner.run(async ({ lobbies, ledger, events }) => {
      const now = this.clock.now();
      const lobby = await requireLobby(lobbies, lobbyId);
      requireOpen(lobby, now);
      requireCreator(lobby, creator);

      const canceled: Lobby = { ...lobby, isCanceled: true };
      await lobbies.update(canceled);

      await refund(ledger, lobby.creator, lobby.betAmount);
      if (lobby.joiner) {
        await refund(ledger, lobby.joiner, lobby.betAmount);
      }

      events.emit({
        type: "LobbyCanceled",
        at: now,
        lobbyId,
        creator,
        joiner: lobby.joiner,
        betAmount: lobby.betAmount,
      });
      return canceled;
    });
  }

  async joinLobby(caller: string, lobbyId: number): Promise<Lobby> {
    const joiner = normalizeAddress(caller, "caller");

    return this.runner.run(async ({ lobbies, ledger, events }) => {
      const now = this.clock.now();
      const lobby = await requireLobby(lobbies, lobbyId);
      requireOpen(lobby, now);
      ensure(
        lobby.creator !== joiner,
        EscrowErrorCode.UNAUTHORIZED,
        `The creator of lobby ${lobbyId} cannot join it`
      );
      ensure(
        lobby.joiner === null,
        EscrowErrorCode.ALREADY_IN_STATE,
        `Lobby ${lobbyId} already has a joiner`
      );

      const joined: Lobby = { ...lobby, joiner };
      await lobbies.update(joined);

      await pullStake(ledger, joiner, this.escrowAddress, lobby.betAmount);

      events.emit({ type: "LobbyJoined", at: now, lobbyId, joiner });
      return joined;
    });
  }

  /**
   * Back out of a joined lobby while more than a minute remains before start.
   */
  async unjoinLobby(caller: string, lobbyId: number): Promise<Lobby> {
    const joiner = normalizeAddress(caller, "caller");

    return this.runner.run(async ({ lobbies, ledger, events }) => {
      const now = this.clock.now();
      const lobby = await requireLobby(lobbies, lobbyId);
      requireOpen(lobby, now);
      ensure(
        lobby.startTime - now > LOBBY_UNJOIN_CUTOFF_SECONDS,
        EscrowErrorCode.TIMING_VIOLATION,
        `Lobby ${lobbyId} starts in ${lobby.startTime - now}s; unjoining closes ${LOBBY_UNJOIN_CUTOFF_SECONDS}s before start`
      );
      ensure(
        lobby.joiner === joiner,
        EscrowErrorCode.UNAUTHORIZED,
        `Only the joiner of lobby ${lobbyId} can unjoin`
      );

      const reopened: Lobby = { ...lobby, joiner: null };
      await lobbies.update(reopened);

      await refund(ledger, joiner, lobby.betAmount);

      events.emit({ type: "LobbyUnjoined", at: now, lobbyId, joiner });
      return reopened;
    });
  }

  /**
   * Open or close the caller's valve. Accrual is checkpointed under the
   * previous valve state before the new one takes effect.
   */
  async toggleValve(caller: string, lobbyId: number, desiredState: boolean): Promise<BreweryStatus> {
    const participant = normalizeAddress(caller, "caller");

    return this.runner.run(async ({ lobbies, events }) => {
      const now = this.clock.now();
      const lobby = await requireLobby(lobbies, lobbyId);
      ensure(!lobby.isCanceled, EscrowErrorCode.INVALID_STATE, `Lobby ${lobbyId} is canceled`);
      ensure(lobby.joiner !== null, EscrowErrorCode.INVALID_STATE, `Lobby ${lobbyId} has no joiner`);
      ensure(
        getLobbyPhase(lobby, now) === LobbyPhase.IN_PROGRESS,
        EscrowErrorCode.TIMING_VIOLATION,
        `Lobby ${lobbyId} is not in progress`
      );
      ensure(
        participant === lobby.creator || participant === lobby.joiner,
        EscrowErrorCode.UNAUTHORIZED,
        `${participant} is not playing in lobby ${lobbyId}`
      );

      const current = await this.loadBrewery(lobbies, lobbyId, participant, now);
      ensure(
        current.isValveOpened !== desiredState,
        EscrowErrorCode.ALREADY_IN_STATE,
        `Valve is already ${desiredState ? "open" : "closed"}`
      );

      const status: BreweryStatus = {
        ...this.accrual.checkpoint(current, now, accrualWindow(lobby)),
        isValveOpened: desiredState,
      };
      await lobbies.saveBreweryStatus(status);

      events.emit({
        type: "ValveToggled",
        at: now,
        lobbyId,
        participant,
        isValveOpened: desiredState,
      });
      return status;
    });
  }

  // --- Reads ---

  async getLobby(lobbyId: number): Promise<Lobby> {
    return this.runner.read(({ lobbies }) => requireLobby(lobbies, lobbyId));
  }

  async getLobbyPhase(lobbyId: number): Promise<LobbyPhase> {
    const lobby = await this.getLobby(lobbyId);
    return getLobbyPhase(lobby, this.clock.now());
  }

  /** Stored brewery state, or the state a first access would create. */
  async getBreweryStatus(lobbyId: number, address: string): Promise<BreweryStatus> {
    const participant = normalizeAddress(address);
    return this.runner.read(async ({ lobbies }) => {
      await requireLobby(lobbies, lobbyId);
      return this.loadBrewery(lobbies, lobbyId, participant, this.clock.now());
    });
  }

  /**
   * Mead the participant would hold if their brewery were checkpointed now,
   * as computed by the configured accrual policy.
   */
  async totalMead(lobbyId: number, address: string): Promise<bigint> {
    const participant = normalizeAddress(address);
    return this.runner.read(async ({ lobbies }) => {
      const lobby = await requireLobby(lobbies, lobbyId);
      const now = this.clock.now();
      const status = await this.loadBrewery(lobbies, lobbyId, participant, now);
      return this.accrual.checkpoint(status, now, accrualWindow(lobby)).mead;
    });
  }

  private async loadBrewery(
    lobbies: ILobbyRepository,
    lobbyId: number,
    address: string,
    now: number
  ): Promise<BreweryStatus> {
    const existing = await lobbies.findBreweryStatus(lobbyId, address);
    return (
      existing ?? {
        lobbyId,
        address,
        mead: 0n,
        points: 0n,
        isValveOpened: false,
        lastUpdatedAt: now,
        meadPerSecond: this.defaultMeadPerSecond,
      }
    );
  }
}

function accrualWindow(lobby: Lobby): AccrualWindow {
  return { start: lobby.startTime, end: lobbyEndTime(lobby) };
}

// The lobby's end time must stay a safe integer too.
const MAX_START_TIME = Number.MAX_SAFE_INTEGER - LOBBY_IN_PROGRESS_SECONDS;

function assertTime(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0 || value > MAX_START_TIME) {
    throw new EscrowError(EscrowErrorCode.INVALID_ARGUMENT, `${field} must be unix seconds, got ${value}`);
  }
}

async function requireLobby(lobbies: ILobbyRepository, lobbyId: number): Promise<Lobby> {
  const lobby = Number.isSafeInteger(lobbyId) ? await lobbies.findById(lobbyId) : undefined;
  if (!lobby) {
    throw new EscrowError(EscrowErrorCode.NOT_FOUND, `Lobby ${lobbyId} does not exist`);
  }
  return lobby;
}

// Not canceled and not started.
function requireOpen(lobby: Lobby, now: number): void {
  ensure(!lobby.isCanceled, EscrowErrorCode.INVALID_STATE, `Lobby ${lobby.id} is canceled`);
  ensure(
    lobby.startTime > now,
    EscrowErrorCode.TIMING_VIOLATION,
    `Lobby ${lobby.id} has already started`
  );
}

function requireCreator(lobby: Lobby, caller: string): void {
  ensure(
    lobby.creator === caller,
    EscrowErrorCode.UNAUTHORIZED,
    `Only the creator of lobby ${lobby.id} can do this`
  );
}

async function pullStake(ledger: IValueLedger, from: string, escrow: string, amount: bigint): Promise<void> {
  if (amount > 0n) {
    await ledger.transferFrom(from, escrow, amount);
  }
}

async function refund(ledger: IValueLedger, to: string, amount: bigint): Promise<void> {
  if (amount > 0n) {
    await ledger.transfer(to, amount);
  }
}
