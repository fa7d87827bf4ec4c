// packages/transactions/src/slot.ts

/** Milliseconds since the unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function epochMillis(epoch: string): number {
  const ms = Date.parse(epoch);
  if (Number.isNaN(ms)) throw new Error(`invalid network epoch "${epoch}"`);
  return ms;
}

/** Whole seconds elapsed since `epoch` at `now`. */
export function getTime(epoch: string, now: number = Date.now()): number {
  const seconds = Math.floor((now - epochMillis(epoch)) / 1000);
  if (seconds < 0) throw new RangeError(`time ${new Date(now).toISOString()} is before the network epoch ${epoch}`);
  return seconds;
}

/** Inverse of getTime: unix milliseconds for a network timestamp. */
export function getRealTime(epoch: string, timestamp: number): number {
  return epochMillis(epoch) + timestamp * 1000;
}
