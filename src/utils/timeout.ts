export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Rejects with TimeoutError when `promise` has not settled within `ms`.
 * A rejection that arrives after the timeout goes to `onLateRejection`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message: string,
  onLateRejection: (error: unknown) => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new TimeoutError(message));
    }, ms);
  });
  void promise.catch((error: unknown) => {
    if (timedOut) onLateRejection(error);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
