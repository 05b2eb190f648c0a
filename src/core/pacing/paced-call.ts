// src/core/pacing/paced-call.ts
import { MAX_RATE_LIMIT_RETRIES } from '../config/constants.js';
import { ErrorCode, VaultError } from '../errors.js';
import { isSlackError, type SlackResponse } from '../slack/types.js';
import type { PacingController, Tier } from './controller.js';

export interface PacedCallOptions {
  maxRateLimitRetries?: number;
  /** Label used in the error raised when retries run out. */
  label?: string;
  signal?: AbortSignal;
}

/**
 * Issues one remote call through the pacing controller. `ratelimited`
 * responses are retried after the controller's backoff, up to a bound;
 * every other response (success or error) is handed back to the caller.
 */
export async function pacedCall<T>(
  pacing: PacingController,
  tier: Tier,
  call: () => Promise<SlackResponse<T>>,
  options: PacedCallOptions = {}
): Promise<SlackResponse<T>> {
  const maxRetries = options.maxRateLimitRetries ?? MAX_RATE_LIMIT_RETRIES;
  let rejected = 0;

  for (;;) {
    await pacing.awaitSlot(tier, options.signal);
    const response = await call();

    if (isSlackError(response) && response.error === 'ratelimited') {
      rejected += 1;
      pacing.onRejected(response.retryAfter);
      if (rejected > maxRetries) {
        throw new VaultError(
          ErrorCode.RATE_LIMITED,
          `${options.label ?? tier} still rate limited after ${maxRetries} retries`,
          true,
          'Wait a few minutes, then re-run with --resume',
          { tier }
        );
      }
      continue;
    }

    pacing.onSuccess();
    return response;
  }
}
