import { describe, it, expect } from 'vitest';
import { SerialDispatcher } from '../daemon/dispatcher.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SerialDispatcher', () => {
  it('should handle jobs in arrival order', async () => {
    const handled: number[] = [];
    const dispatcher = new SerialDispatcher<number>(
      async (job) => {
        handled.push(job);
      },
      () => undefined
    );

    dispatcher.post(1);
    dispatcher.post(2);
    dispatcher.post(3);
    await dispatcher.whenIdle();

    expect(handled).toEqual([1, 2, 3]);
  });

  it('should never run two jobs at once', async () => {
    let running = 0;
    let maxRunning = 0;
    const dispatcher = new SerialDispatcher<number>(
      async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
      },
      () => undefined
    );

    for (let i = 0; i < 5; i++) dispatcher.post(i);
    await dispatcher.whenIdle();

    expect(maxRunning).toBe(1);
  });

  it('should report a failing job and continue with the next', async () => {
    const handled: string[] = [];
    const failures: Array<[string, string]> = [];
    const dispatcher = new SerialDispatcher<string>(
      async (job) => {
        if (job === 'bad') throw new Error('boom');
        handled.push(job);
      },
      (error, job) => failures.push([job, error.message])
    );

    dispatcher.post('bad');
    dispatcher.post('good');
    await dispatcher.whenIdle();

    expect(failures).toEqual([['bad', 'boom']]);
    expect(handled).toEqual(['good']);
  });

  it('should accept jobs posted by a running job', async () => {
    const handled: string[] = [];
    const dispatcher: SerialDispatcher<string> = new SerialDispatcher<string>(
      async (job) => {
        handled.push(job);
        if (job === 'first') dispatcher.post('follow-up');
      },
      () => undefined
    );

    dispatcher.post('first');
    await dispatcher.whenIdle();

    expect(handled).toEqual(['first', 'follow-up']);
  });

  it('should drop queued jobs on close but finish the running one', async () => {
    const gate = deferred();
    const handled: number[] = [];
    const dispatcher = new SerialDispatcher<number>(
      async (job) => {
        if (job === 1) await gate.promise;
        handled.push(job);
      },
      () => undefined
    );

    dispatcher.post(1);
    dispatcher.post(2);
    dispatcher.post(3);
    expect(dispatcher.pending).toBe(2);

    const closing = dispatcher.close();
    gate.resolve();

    expect(await closing).toBe(2);
    expect(handled).toEqual([1]);
    expect(dispatcher.post(4)).toBe(false);
    expect(dispatcher.isBusy).toBe(false);
  });
});
