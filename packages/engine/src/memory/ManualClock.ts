import { IClock } from "../interfaces/IClock";

/** A clock that only moves when told to. */
export class ManualClock implements IClock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
