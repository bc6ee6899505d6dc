export interface OperationOptions {
  /** Current time in seconds since the epoch. */
  now?: () => number;
  defaultDurationSeconds?: number;
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}
