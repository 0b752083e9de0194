import type { FileSystemPort } from '../../../ports/fs.port.js';
import type { FileProtectionPort } from '../../../ports/file-protection.port.js';
import { assertNever } from '../../../runtime/assert-never.js';
import { PosixModeProtection } from './posix-mode.js';
import { NoopProtection } from './noop.js';

export { PosixModeProtection, modeFor } from './posix-mode.js';
export { NoopProtection } from './noop.js';

export type ProtectionMechanism = 'auto' | 'posix' | 'none';

/**
 * `auto`: permission bits mean little on Windows, so it gets the no-op adapter.
 */
export function selectFileProtection(
  mechanism: ProtectionMechanism,
  fs: FileSystemPort,
  platform: NodeJS.Platform = process.platform
): FileProtectionPort {
  switch (mechanism) {
    case 'posix':
      return new PosixModeProtection(fs);
    case 'none':
      return new NoopProtection();
    case 'auto':
      return platform === 'win32' ? new NoopProtection() : new PosixModeProtection(fs);
    default:
      return assertNever(mechanism);
  }
}
