import * as os from 'os';
import * as path from 'path';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { BaseDirectoryUnavailable, StandardDirectoriesPort } from '../../../ports/standard-directories.port.js';

export interface LocalStandardDirectoriesOptions {
  readonly appName: string;
  /** Replaces the per-OS table: `<dataDir>/Documents`, `<dataDir>/Library`, ... */
  readonly dataDir?: string;
  /** Replaces `os.tmpdir()`. */
  readonly tmpDir?: string;
  readonly env?: Record<string, string | undefined>;
  readonly platform?: NodeJS.Platform;
  readonly homedir?: () => string;
  readonly tmpdir?: () => string;
}

type Unavailable = Result<never, BaseDirectoryUnavailable>;

const unavailable = (reason: string): Unavailable => err({ reason });

/**
 * Per-OS standard locations.
 *
 * darwin:  ~/Documents/<app>, ~/Library/Application Support/<app>, ~/Library/Caches/<app>,
 *          ~/Library/Group Containers/<group>
 * win32:   %USERPROFILE%\Documents\<app>, %APPDATA%\<app>, %LOCALAPPDATA%\<app>\Cache,
 *          %LOCALAPPDATA%\Shared\<group>
 * others:  ~/.local/share/<app>/documents, ~/.local/share/<app>/library, ~/.cache/<app>,
 *          ~/.local/share/shared/<group> (XDG data and cache homes)
 */
export class LocalStandardDirectories implements StandardDirectoriesPort {
  private readonly env: Record<string, string | undefined>;
  private readonly platform: NodeJS.Platform;
  private readonly homedir: () => string;
  private readonly tmpdir: () => string;

  constructor(private readonly options: LocalStandardDirectoriesOptions) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.homedir = options.homedir ?? os.homedir;
    this.tmpdir = options.tmpdir ?? os.tmpdir;
  }

  documents(): Result<string, BaseDirectoryUnavailable> {
    const { appName, dataDir } = this.options;
    if (dataDir) return ok(this.join(dataDir, 'Documents'));

    switch (this.platform) {
      case 'darwin':
        return this.home().map((home) => this.join(home, 'Documents', appName));
      case 'win32':
        return this.windowsProfile().map((profile) => this.join(profile, 'Documents', appName));
      default:
        return this.xdgDataHome().map((data) => this.join(data, appName, 'documents'));
    }
  }

  library(): Result<string, BaseDirectoryUnavailable> {
    const { appName, dataDir } = this.options;
    if (dataDir) return ok(this.join(dataDir, 'Library'));

    switch (this.platform) {
      case 'darwin':
        return this.home().map((home) => this.join(home, 'Library', 'Application Support', appName));
      case 'win32':
        return this.envDir('APPDATA').map((appData) => this.join(appData, appName));
      default:
        return this.xdgDataHome().map((data) => this.join(data, appName, 'library'));
    }
  }

  caches(): Result<string, BaseDirectoryUnavailable> {
    const { appName, dataDir } = this.options;
    if (dataDir) return ok(this.join(dataDir, 'Caches'));

    switch (this.platform) {
      case 'darwin':
        return this.home().map((home) => this.join(home, 'Library', 'Caches', appName));
      case 'win32':
        return this.envDir('LOCALAPPDATA').map((local) => this.join(local, appName, 'Cache'));
      default:
        return this.xdgDir('XDG_CACHE_HOME', '.cache').map((cache) => this.join(cache, appName));
    }
  }

  sharedGroup(groupId: string): Result<string, BaseDirectoryUnavailable> {
    if (groupId.length === 0) return unavailable('no application group identifier configured');

    const { dataDir } = this.options;
    if (dataDir) return ok(this.join(dataDir, 'Shared', groupId));

    switch (this.platform) {
      case 'darwin':
        return this.home().map((home) => this.join(home, 'Library', 'Group Containers', groupId));
      case 'win32':
        return this.envDir('LOCALAPPDATA').map((local) => this.join(local, 'Shared', groupId));
      default:
        return this.xdgDataHome().map((data) => this.join(data, 'shared', groupId));
    }
  }

  temporaryBase(): Result<string, BaseDirectoryUnavailable> {
    const configured = this.options.tmpDir;
    if (configured) return ok(this.pathApi().resolve(configured));

    const base = this.tmpdir();
    return base ? ok(base) : unavailable('the OS reported no temporary directory');
  }

  // ---------------------------------------------------------------------------

  private pathApi(): path.PlatformPath {
    return this.platform === 'win32' ? path.win32 : path.posix;
  }

  private join(...parts: string[]): string {
    return this.pathApi().join(...parts);
  }

  private home(): Result<string, BaseDirectoryUnavailable> {
    let home: string;
    try {
      home = this.homedir();
    } catch (e) {
      return unavailable(`home directory lookup failed: ${e instanceof Error ? e.message : String(e)}`);
    }
    return home ? ok(home) : unavailable('the OS reported no home directory');
  }

  private windowsProfile(): Result<string, BaseDirectoryUnavailable> {
    const profile = this.env['USERPROFILE'];
    return profile ? ok(profile) : this.home();
  }

  private envDir(name: string): Result<string, BaseDirectoryUnavailable> {
    const value = this.env[name];
    return value ? ok(value) : unavailable(`%${name}% is not set`);
  }

  private xdgDataHome(): Result<string, BaseDirectoryUnavailable> {
    return this.xdgDir('XDG_DATA_HOME', path.posix.join('.local', 'share'));
  }

  /**
   * XDG base directory rules: relative values are invalid and must be ignored.
   */
  private xdgDir(variable: string, fallback: string): Result<string, BaseDirectoryUnavailable> {
    const value = this.env[variable];
    if (value && this.pathApi().isAbsolute(value)) return ok(value);
    return this.home().map((home) => this.join(home, fallback));
  }
}
