import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from '../../shared/logger';

interface SoundCommand {
  command: string;
  args: string[];
}

const COMMANDS: Partial<Record<NodeJS.Platform, SoundCommand>> = {
  darwin: { command: 'afplay', args: ['/System/Library/Sounds/Glass.aiff'] },
  linux: { command: 'paplay', args: ['/usr/share/sounds/freedesktop/stereo/complete.oga'] },
};

const BELL = '\u0007';

export interface PlayerProcess {
  on(event: 'error', listener: (err: Error) => void): unknown;
  unref(): void;
}

export type Launch = (command: string, args: string[], options: SpawnOptions) => PlayerProcess;

/** Fire-and-forget completion sound. Never throws, never waits for the player. */
export class SoundPlayer {
  constructor(
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly bell: (chunk: string) => void = chunk => { process.stdout.write(chunk); },
    private readonly launch: Launch = spawn,
  ) {}

  play(): void {
    const cmd = COMMANDS[this.platform];
    if (!cmd) {
      this.bell(BELL);
      return;
    }

    try {
      const child = this.launch(cmd.command, cmd.args, { detached: true, stdio: 'ignore' });
      child.on('error', err => {
        this.logger.warn(`Sound playback via ${cmd.command} failed`, err);
      });
      child.unref();
    } catch (err) {
      this.logger.warn(`Could not start ${cmd.command}`, err);
    }
  }
}
