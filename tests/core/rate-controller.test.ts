import { describe, it, expect, vi } from 'vitest';
import {
  EvasionConfigSchema,
  RateController,
  SearchCancelledError,
  seededRandom,
  type RequestIdentity,
} from '@roleradar/core';
import { constantRandom, noSleep, recordingSleep } from '../helpers/fakes';

describe('RateController', () => {
  it('sleeps for the computed delay before handing out the identity', async () => {
    const { sleep, waits } = recordingSleep();
    const controller = new RateController(EvasionConfigSchema.parse({}), {
      random: constantRandom(0.5),
      sleep,
    });

    const ticket = await controller.beforeRequest();

    expect(waits).toEqual([4025]);
    expect(ticket.delay.totalMs).toBe(4025);
    expect(ticket.identity).toBe(controller.currentIdentity);
  });

  it('pins the identity for a whole epoch and rotates after the lifetime', async () => {
    const controller = new RateController(EvasionConfigSchema.parse({ sessionLifetime: 3 }), {
      random: seededRandom(5),
      sleep: noSleep,
    });
    const onRotate = vi.fn();
    controller.onRotate(onRotate);

    const identities: RequestIdentity[] = [];
    const rotations: boolean[] = [];
    for (let i = 0; i < 3; i++) {
      identities.push((await controller.beforeRequest()).identity);
      rotations.push(await controller.afterRequest());
    }

    expect(new Set(identities).size).toBe(1);
    expect(rotations).toEqual([false, false, true]);
    expect(controller.sessionState.epochIndex).toBe(1);
    expect(controller.sessionState.requestsIssued).toBe(0);
    expect(controller.currentIdentity.epochId).toBe(controller.sessionState.epochId);
    expect(controller.currentIdentity.epochId).not.toBe(identities[0].epochId);
    expect(onRotate).toHaveBeenCalledTimes(1);
    expect(onRotate).toHaveBeenCalledWith(controller.sessionState, controller.currentIdentity);
  });

  it('counts failed requests towards the lifetime too', async () => {
    const controller = new RateController(EvasionConfigSchema.parse({ sessionLifetime: 2 }), {
      random: seededRandom(8),
      sleep: noSleep,
    });
    await controller.beforeRequest();
    expect(await controller.afterRequest()).toBe(false);
    await controller.beforeRequest();
    expect(await controller.afterRequest()).toBe(true);
  });

  it('rotates an epoch that outlived its maximum age', async () => {
    let clock = 1_000;
    const controller = new RateController(EvasionConfigSchema.parse({}), {
      random: seededRandom(6),
      sleep: noSleep,
      now: () => clock,
    });

    await controller.beforeRequest();
    expect(await controller.afterRequest()).toBe(false);

    clock += 30 * 60 * 1000 + 1;
    await controller.beforeRequest();
    expect(await controller.afterRequest()).toBe(true);
    expect(controller.sessionState.createdAt).toBe(clock);
  });

  it('applies the rate-limit penalty to the next delay only', async () => {
    const { sleep, waits } = recordingSleep();
    const controller = new RateController(EvasionConfigSchema.parse({}), {
      random: constantRandom(0.5),
      sleep,
    });

    await controller.beforeRequest();
    controller.penalize();
    await controller.beforeRequest();
    await controller.beforeRequest();

    expect(waits).toEqual([4025, 8050, 4025]);
  });

  it('refuses to start once cancelled', async () => {
    const { sleep, waits } = recordingSleep();
    const abort = new AbortController();
    const controller = new RateController(EvasionConfigSchema.parse({}), {
      random: seededRandom(1),
      sleep,
      signal: abort.signal,
    });
    abort.abort();

    await expect(controller.beforeRequest()).rejects.toBeInstanceOf(SearchCancelledError);
    expect(waits).toEqual([]);
  });

  it('stops notifying after unsubscribe', async () => {
    const controller = new RateController(EvasionConfigSchema.parse({ sessionLifetime: 1 }), {
      random: seededRandom(4),
      sleep: noSleep,
    });
    const listener = vi.fn();
    const unsubscribe = controller.onRotate(listener);

    await controller.beforeRequest();
    await controller.afterRequest();
    unsubscribe();
    await controller.beforeRequest();
    await controller.afterRequest();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(controller.sessionState.epochIndex).toBe(2);
  });
});
