import { CancelledError, TimeoutError } from '../errors';

/**
 * Runs `operation` with its own abort signal, rejecting with a TimeoutError
 * after `timeoutMs` or a CancelledError when `parentSignal` aborts. Either
 * way the operation's signal is aborted.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  description: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new CancelledError(`${description} cancelled`);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guards: Promise<never>[] = [
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`${description} timed out after ${timeoutMs}ms`, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }),
  ];

  if (parentSignal) {
    guards.push(
      new Promise<never>((_, reject) => {
        onParentAbort = () => {
          const error = new CancelledError(`${description} cancelled`);
          controller.abort(error);
          reject(error);
        };
        parentSignal.addEventListener('abort', onParentAbort, { once: true });
      }),
    );
  }

  try {
    return await Promise.race([operation(controller.signal), ...guards]);
  } finally {
    if (timer) clearTimeout(timer);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  }
}
