import type { ProcessProbePort } from '../../../ports/process-probe.port.js';
import { nodeErrorCode } from '../fs/index.js';

/**
 * Signal 0 probe: delivers nothing, only checks that the pid can be addressed.
 */
export class NodeProcessProbe implements ProcessProbePort {
  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (e) {
      // EPERM: the process exists but belongs to someone else.
      return nodeErrorCode(e) === 'EPERM';
    }
  }
}
