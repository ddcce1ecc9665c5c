import { spawn, type SpawnOptions } from 'child_process';
import path from 'node:path';

export interface OpenerCommand {
  command: string;
  args: string[];
}

interface LaunchedProcess {
  on(event: 'error', listener: (error: Error) => void): unknown;
  unref(): void;
}

export type DetachedSpawner = (
  command: string,
  args: string[],
  options: SpawnOptions,
) => LaunchedProcess;

/**
 * The command that hands a file to the OS default application.
 */
export function getOpenerCommand(
  filePath: string,
  platform: NodeJS.Platform = process.platform,
): OpenerCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: [filePath] };
  }
  if (platform === 'win32') {
    // Arguments go to cmd verbatim: the empty title comes first and the
    // path is quoted so spaces survive
    return { command: 'cmd', args: ['/c', 'start', '""', `"${filePath}"`] };
  }
  return { command: 'xdg-open', args: [filePath] };
}

export class PlaybackLauncher {
  constructor(
    private readonly spawnDetached: DetachedSpawner = spawn,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  /**
   * Fire-and-forget: whether the player actually opened is never reported
   * back, a launcher failure only ends up in the log.
   */
  play(filePath: string): void {
    const absolutePath = path.resolve(filePath);
    const { command, args } = getOpenerCommand(absolutePath, this.platform);

    console.log('▶️ Opening with default player:', absolutePath);

    try {
      const opener = this.spawnDetached(command, args, {
        detached: true,
        stdio: 'ignore',
        windowsHide: true,
        windowsVerbatimArguments: this.platform === 'win32',
      });
      opener.on('error', (error) => {
        console.error('❌ Failed to launch default player:', error);
      });
      opener.unref();
    } catch (error) {
      console.error('❌ Failed to launch default player:', error);
    }
  }
}
