import type { CompletionEvent } from '../../shared/types';
import type { Logger } from '../../shared/logger';

/** Modal message shown at a phase transition. Resolves once dismissed. */
export interface MessagePrompt {
  showMessage(message: string): Promise<void>;
}

export interface Sound {
  play(): void;
}

export class CompletionNotifier {
  constructor(
    private readonly sound: Sound,
    private readonly prompt: MessagePrompt,
    private readonly logger: Logger,
    private soundEnabled: boolean,
  ) {}

  setSoundEnabled(enabled: boolean): void {
    this.soundEnabled = enabled;
  }

  /** Does not wait for the prompt: the engine has already moved on. */
  notify(event: CompletionEvent): void {
    if (this.soundEnabled) this.sound.play();

    this.logger.info(`Phase ${event.endedPhase} finished`);
    this.prompt.showMessage(event.message).catch(err => {
      this.logger.error('Completion message failed', err);
    });
  }
}
