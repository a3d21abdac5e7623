/** Waits on behalf of the runner so that tests can skip real time. */
export interface Sleeper {
  /**
   * Wait `ms` milliseconds. Resolves `true` when the full delay elapsed and
   * `false` when `signal` aborted the wait first.
   */
  sleep(ms: number, signal: AbortSignal): Promise<boolean>;
}
