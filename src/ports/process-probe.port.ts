/**
 * Liveness check for other processes on this machine.
 *
 * Used before purging another run's temporary directory: a live owner
 * means the directory may still be in use.
 */
export interface ProcessProbePort {
  isAlive(pid: number): boolean;
}
