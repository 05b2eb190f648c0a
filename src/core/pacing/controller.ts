// src/core/pacing/controller.ts
import {
  BACKOFF_BASE_SECONDS,
  BACKOFF_CAP_SECONDS,
  PACING_SAFETY_MARGIN_MS,
  PACING_WINDOW_MS,
  TIER_CEILINGS,
} from '../config/constants.js';
import { silentLogger, type Logger } from '../logger.js';
import { systemClock, type PacingClock } from './clock.js';

export type Tier = keyof typeof TIER_CEILINGS;

export interface PacingOptions {
  ceilings?: Partial<Record<Tier, number>>;
  clock?: PacingClock;
  logger?: Logger;
  signal?: AbortSignal;
}

/** 30s, 60s, 120s, 240s, then 300s for every further rejection. */
export function backoffSeconds(consecutiveRejections: number): number {
  const exponent = Math.max(consecutiveRejections - 1, 0);
  return Math.min(BACKOFF_BASE_SECONDS * 2 ** exponent, BACKOFF_CAP_SECONDS);
}

/**
 * Keeps each endpoint tier under its per-minute ceiling and holds every
 * tier during a backoff. Driven by a single sequential caller; state is
 * rebuilt on every process start.
 */
export class PacingController {
  private windows: Record<Tier, number[]> = { search: [], thread: [], users: [] };
  private ceilings: Record<Tier, number>;
  private backoffUntil: number | null = null;
  private rejections = 0;
  private clock: PacingClock;
  private logger: Logger;
  private signal?: AbortSignal;

  constructor(options: PacingOptions = {}) {
    this.ceilings = { ...TIER_CEILINGS, ...options.ceilings };
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.signal = options.signal;
  }

  async awaitSlot(tier: Tier, signal: AbortSignal | undefined = this.signal): Promise<void> {
    if (this.backoffUntil !== null) {
      const wait = this.backoffUntil - this.clock.now();
      if (wait > 0) {
        this.logger.debug(`[Pacing] Backing off ${Math.ceil(wait / 1000)}s`);
        await this.clock.sleep(wait, signal);
      }
      this.backoffUntil = null;
    }

    const window = this.prune(tier);
    if (window.length >= this.ceilings[tier]) {
      const wait = window[0] + PACING_WINDOW_MS + PACING_SAFETY_MARGIN_MS - this.clock.now();
      if (wait > 0) {
        this.logger.debug(`[Pacing] ${tier} tier at ${window.length}/${this.ceilings[tier]}, waiting ${Math.ceil(wait / 1000)}s`);
        await this.clock.sleep(wait, signal);
      }
      this.prune(tier);
    }

    this.windows[tier].push(this.clock.now());
  }

  /** Returns the backoff applied, in seconds. */
  onRejected(retryAfterSeconds?: number): number {
    this.rejections += 1;
    const seconds = retryAfterSeconds ?? backoffSeconds(this.rejections);
    this.backoffUntil = this.clock.now() + seconds * 1000;
    this.logger.warn(`Rate limited (${this.rejections} in a row), pausing all calls for ${seconds}s`);
    return seconds;
  }

  onSuccess(): void {
    this.rejections = 0;
  }

  get consecutiveRejections(): number {
    return this.rejections;
  }

  get backoffDeadline(): number | null {
    return this.backoffUntil;
  }

  callsInWindow(tier: Tier): number {
    return this.prune(tier).length;
  }

  private prune(tier: Tier): number[] {
    const cutoff = this.clock.now() - PACING_WINDOW_MS;
    this.windows[tier] = this.windows[tier].filter((at) => at > cutoff);
    return this.windows[tier];
  }
}
