// src/core/pacing/__tests__/paced-call.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { ErrorCode } from '../../errors.js';
import type { RepliesResult, SlackResponse } from '../../slack/types.js';
import { ManualClock } from '../clock.js';
import { PacingController } from '../controller.js';
import { pacedCall } from '../paced-call.js';

const OK: SlackResponse<RepliesResult> = { ok: true, messages: [] };
const LIMITED: SlackResponse<RepliesResult> = { ok: false, error: 'ratelimited' };

function sequence(...responses: SlackResponse<RepliesResult>[]) {
  return jest.fn(async () => responses.shift() ?? OK);
}

describe('pacedCall', () => {
  it('should retry rate-limited calls after backing off', async () => {
    const clock = new ManualClock();
    const pacing = new PacingController({ clock });
    const call = sequence(LIMITED, LIMITED, OK);

    const response = await pacedCall(pacing, 'thread', call);

    expect(response).toEqual(OK);
    expect(call).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([30_000, 60_000]);
    expect(pacing.consecutiveRejections).toBe(0);
  });

  it('should hand other errors back untouched', async () => {
    const pacing = new PacingController({ clock: new ManualClock() });
    const call = sequence({ ok: false, error: 'thread_not_found' });

    const response = await pacedCall(pacing, 'thread', call);

    expect(response).toEqual({ ok: false, error: 'thread_not_found' });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('should give up with a retryable error once the bound is passed', async () => {
    const pacing = new PacingController({ clock: new ManualClock() });
    const call = sequence(LIMITED, LIMITED, LIMITED, LIMITED);

    await expect(
      pacedCall(pacing, 'search', call, { maxRateLimitRetries: 2, label: 'search page 3' })
    ).rejects.toMatchObject({
      code: ErrorCode.RATE_LIMITED,
      message: 'search page 3 still rate limited after 2 retries',
      retryable: true,
    });
    expect(call).toHaveBeenCalledTimes(3);
  });
});
