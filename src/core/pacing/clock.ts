// src/core/pacing/clock.ts
import { ErrorCode, VaultError } from '../errors.js';

export interface PacingClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function cancelledError(): VaultError {
  return new VaultError(ErrorCode.CANCELLED, 'Operation cancelled', true, 'Re-run with --resume to continue');
}

export const systemClock: PacingClock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(cancelledError());
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(cancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/**
 * Clock whose sleeps advance time instantly; used to drive pacing logic
 * without real waits.
 */
export class ManualClock implements PacingClock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw cancelledError();
    }
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
