import { describe, it, expect } from 'vitest';
import { withTimeout } from './timeout';
import { CancelledError, TimeoutError } from '../errors';

function never(signal: AbortSignal, seen: AbortSignal[]): Promise<string> {
  seen.push(signal);
  return new Promise<string>(() => undefined);
}

describe('withTimeout', () => {
  it('should return the operation result', async () => {
    await expect(withTimeout(async () => 'done', 1000, 'Quick')).resolves.toBe('done');
  });

  it('should reject with a retryable TimeoutError and abort the operation', async () => {
    const seen: AbortSignal[] = [];
    const error = await withTimeout((signal) => never(signal, seen), 10, 'Agent slow-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'Agent slow-1 timed out after 10ms', retryable: true });
    expect(seen[0].aborted).toBe(true);
  });

  it('should reject with CancelledError when the parent aborts', async () => {
    const seen: AbortSignal[] = [];
    const parent = new AbortController();
    const pending = withTimeout((signal) => never(signal, seen), 1000, 'Agent a', parent.signal);
    parent.abort();

    await expect(pending).rejects.toThrow(new CancelledError('Agent a cancelled'));
    expect(seen[0].aborted).toBe(true);
  });

  it('should not start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;
    await expect(
      withTimeout(
        async () => {
          started = true;
          return 1;
        },
        1000,
        'Agent a',
        parent.signal,
      ),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(started).toBe(false);
  });
});
