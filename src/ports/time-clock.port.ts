/**
 * Time and process information.
 *
 * The janitor compares directory modification times against the launch
 * time of the current process; keeping both behind a port lets tests pin them.
 */
export interface TimeClockPort {
  /** Milliseconds since the Unix epoch. */
  nowMs(): number;

  /** When the current process started, in epoch milliseconds. */
  launchedAtMs(): number;

  getPid(): number;
}
