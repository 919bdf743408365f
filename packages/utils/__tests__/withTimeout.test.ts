import { describe, expect, it } from 'vitest';

import { TimeoutError, withAbortableTimeout, withTimeout } from '../withTimeout';

describe('withTimeout', () => {
  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50)).resolves.toBe('done');
  });

  it('passes through a rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('upstream')), 50)).rejects.toThrow('upstream');
  });

  it('rejects with a TimeoutError when the promise is too slow', async () => {
    const never = new Promise<string>(() => undefined);
    const failure = withTimeout(never, 10);

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('Operation timed out after 10ms');
  });

  it('uses a custom message', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, { message: 'Report timed out' })).rejects.toThrow('Report timed out');
  });
});

describe('withAbortableTimeout', () => {
  it('aborts the operation signal on timeout', async () => {
    let seen: AbortSignal | undefined;
    const failure = withAbortableTimeout(signal => {
      seen = signal;
      return new Promise<string>(() => undefined);
    }, 10);

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('leaves the signal alone when the operation finishes', async () => {
    let seen: AbortSignal | undefined;
    await withAbortableTimeout(async signal => {
      seen = signal;
      return 1;
    }, 50);
    expect(seen?.aborted).toBe(false);
  });
});
