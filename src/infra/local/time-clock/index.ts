import type { TimeClockPort } from '../../../ports/time-clock.port.js';

export class NodeTimeClock implements TimeClockPort {
  private readonly launched = Math.floor(Date.now() - process.uptime() * 1000);

  nowMs(): number {
    return Date.now();
  }

  launchedAtMs(): number {
    return this.launched;
  }

  getPid(): number {
    return process.pid;
  }
}
