export function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff (1s, 2s, 4s, ... up to `capMs`) with ±jitter. */
export function backoffMs(attempt: number, capMs = 60_000): number {
  const base = Math.min(capMs, 1000 * 2 ** (attempt - 1));
  return Math.floor(base * (0.75 + Math.random() * 0.75));
}

/** 429 and any 5xx (including a cold model's 503) are worth another attempt. */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}
