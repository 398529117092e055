/** Seconds after `startTime` during which valves can be toggled. */
export const LOBBY_IN_PROGRESS_SECONDS = 5 * 60;

/** A joiner can only back out while more than this many seconds remain before start. */
export const LOBBY_UNJOIN_CUTOFF_SECONDS = 60;

export interface Lobby {
  id: number;
  creator: string;
  joiner: string | null;
  isCanceled: boolean;
  /** Unix seconds */
  startTime: number;
  betAmount: bigint;
  creatorMeadInLand: bigint;
  joinerMeadInLand: bigint;
}

export enum LobbyPhase {
  OPEN = "open",
  JOINED = "joined",
  IN_PROGRESS = "in_progress",
  ENDED = "ended",
  CANCELED = "canceled",
}

/**
 * Per-lobby, per-participant production state. Created lazily on first
 * access and kept after the lobby ends.
 */
export interface BreweryStatus {
  lobbyId: number;
  address: string;
  mead: bigint;
  points: bigint;
  isValveOpened: boolean;
  /** Unix seconds of the last accrual checkpoint */
  lastUpdatedAt: number;
  meadPerSecond: bigint;
}

export function lobbyEndTime(lobby: Lobby): number {
  return lobby.startTime + LOBBY_IN_PROGRESS_SECONDS;
}

export function getLobbyPhase(lobby: Lobby, now: number): LobbyPhase {
  if (lobby.isCanceled) return LobbyPhase.CANCELED;
  if (now < lobby.startTime) {
    return lobby.joiner ? LobbyPhase.JOINED : LobbyPhase.OPEN;
  }
  // A lobby nobody joined never runs.
  if (!lobby.joiner) return LobbyPhase.ENDED;
  return now < lobbyEndTime(lobby) ? LobbyPhase.IN_PROGRESS : LobbyPhase.ENDED;
}
