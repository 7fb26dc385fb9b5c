import open from 'open';
import { execFile } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { assertSafeLaunchUri, DEFAULT_ALLOWED_HOSTS } from './redirectValidator.js';
import { LaunchError } from '../errors/authErrors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('BrowserLauncher');

export type LaunchMethod = 'native' | 'fallback';

/**
 * Anything that can send the user to a URL. The orchestrator depends on this, not on BrowserLauncher.
 */
export interface UrlOpener {
  open(uri: string): Promise<LaunchMethod>;
}

export interface FallbackCommand {
  command: string;
  args: string[];
  /** Windows only: pass args to cmd.exe untouched */
  windowsVerbatimArguments?: boolean;
}

export type NativeOpener = (uri: string) => Promise<void>;
export type CommandRunner = (fallback: FallbackCommand) => Promise<void>;

export interface BrowserLauncherOptions {
  platform?: NodeJS.Platform;
  allowedHosts?: readonly string[];
  nativeOpen?: NativeOpener;
  runCommand?: CommandRunner;
  /** Kill a fallback command that has not exited after this long */
  commandTimeoutMs?: number;
}

/**
 * Resolve once the child has spawned, reject on spawn failure (e.g. ENOENT)
 */
function waitForSpawn(child: ChildProcess): Promise<void> {
  if (typeof child.pid === 'number') {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', reject);
  });
}

async function openWithSystemHandler(uri: string): Promise<void> {
  const child = await open(uri, { wait: false });
  await waitForSpawn(child);
}

function execCommand(fallback: FallbackCommand, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    execFile(
      fallback.command,
      fallback.args,
      { timeout: timeoutMs, windowsHide: true, windowsVerbatimArguments: fallback.windowsVerbatimArguments },
      (error) => (error ? reject(error) : resolve())
    );
  });
}

/**
 * Platform command used when the native opener fails.
 * cmd.exe treats '&' and '^' as operators and expands '%NAME%', so all three are caret-escaped.
 */
export function fallbackCommandFor(platform: NodeJS.Platform, uri: string): FallbackCommand {
  switch (platform) {
    case 'win32':
      return {
        command: 'cmd',
        args: ['/c', 'start', '""', uri.replace(/[\^&%]/g, '^$&')],
        windowsVerbatimArguments: true
      };
    case 'darwin':
      return { command: 'open', args: [uri] };
    default:
      return { command: 'xdg-open', args: [uri] };
  }
}

/**
 * Opens a URI in the user's default browser
 *
 * The URI is checked before any attempt is made; an unsafe one never reaches
 * a process-spawning opener. Attempts run in order and each failure is only
 * logged so the next can be tried.
 */
export class BrowserLauncher implements UrlOpener {
  private readonly platform: NodeJS.Platform;
  private readonly allowedHosts: readonly string[];
  private readonly nativeOpen: NativeOpener;
  private readonly runCommand: CommandRunner;

  constructor(options: BrowserLauncherOptions = {}) {
    const commandTimeoutMs = options.commandTimeoutMs ?? 10000;
    this.platform = options.platform ?? process.platform;
    this.allowedHosts = options.allowedHosts ?? DEFAULT_ALLOWED_HOSTS;
    this.nativeOpen = options.nativeOpen ?? openWithSystemHandler;
    this.runCommand = options.runCommand ?? ((fallback) => execCommand(fallback, commandTimeoutMs));
  }

  async open(uri: string): Promise<LaunchMethod> {
    const safeUri = assertSafeLaunchUri(uri, this.allowedHosts);
    const attempts: Array<{ method: string; error: string }> = [];

    try {
      await this.nativeOpen(safeUri);
      logger.info('Opened browser for authorization');
      return 'native';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Native browser launch failed: ${message}, trying fallback...`);
      attempts.push({ method: 'native', error: message });
    }

    const fallback = fallbackCommandFor(this.platform, safeUri);
    try {
      await this.runCommand(fallback);
      logger.info(`Opened browser using ${fallback.command} fallback`);
      return 'fallback';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`${fallback.command} fallback failed: ${message}`);
      attempts.push({ method: fallback.command, error: message });
    }

    logger.error('Could not open a browser; visit the authorization URL manually');
    throw new LaunchError(safeUri, attempts);
  }
}
