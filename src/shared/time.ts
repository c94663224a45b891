import { setTimeout as delay } from 'node:timers/promises';

/** Current time as float seconds since the epoch. */
export function currentTimestamp(): number {
  return Date.now() / 1000;
}

export async function sleep(ms: number): Promise<void> {
  await delay(ms);
}
