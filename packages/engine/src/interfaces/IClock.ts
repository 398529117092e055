export interface IClock {
  /** Current time in unix seconds */
  now(): number;
}

export const systemClock: IClock = {
  now: () => Math.floor(Date.now() / 1000),
};
