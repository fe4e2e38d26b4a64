import { emitKeypressEvents } from 'node:readline';
import type { EngineSnapshot, Platform, Settings, StatsSnapshot } from '../shared/types';
import type { MessagePrompt } from '../core/notify/CompletionNotifier';
import { renderScreen } from './format';

const CLEAR = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

export interface TerminalDisplayCallbacks {
  onStartWork: () => void;
  onStartBreak: () => void;
  onReset: () => void;
  onToggleSound: () => void;
  onToggleAutoAdvance: () => void;
  onQuit: () => void;
}

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export interface TextOutput {
  write(chunk: string): unknown;
}

export interface Keypress {
  name?: string;
  ctrl?: boolean;
}

interface PendingMessage {
  text: string;
  resolve: () => void;
}

export class TerminalDisplay implements MessagePrompt {
  private _engine: EngineSnapshot | null = null;
  private _stats: StatsSnapshot = { completedPomodoros: 0, totalFocusMinutes: 0 };
  private _toggles: Pick<Settings, 'soundEnabled' | 'autoAdvance'> = { soundEnabled: true, autoAdvance: false };
  private _messages: PendingMessage[] = [];
  private _attached = false;

  constructor(
    private _input: KeyInput,
    private _output: TextOutput,
    private _platform: Platform,
    private _callbacks: TerminalDisplayCallbacks,
  ) {}

  get messageShown(): string | null { return this._messages[0]?.text ?? null; }

  attach(): void {
    if (this._attached) return;
    this._attached = true;
    emitKeypressEvents(this._input);
    if (this._input.isTTY) this._input.setRawMode?.(true);
    this._input.on('keypress', this._onKeypress);
    this._input.resume();
    this._output.write(HIDE_CURSOR);
  }

  detach(): void {
    if (!this._attached) return;
    this._attached = false;
    this._input.off('keypress', this._onKeypress);
    if (this._input.isTTY) this._input.setRawMode?.(false);
    this._input.pause();
    this._output.write(SHOW_CURSOR);
  }

  update(engine: EngineSnapshot, stats: StatsSnapshot): void {
    this._engine = engine;
    this._stats = stats;
    this.render();
  }

  setToggles(settings: Pick<Settings, 'soundEnabled' | 'autoAdvance'>): void {
    this._toggles = { soundEnabled: settings.soundEnabled, autoAdvance: settings.autoAdvance };
    this.render();
  }

  render(): void {
    if (!this._engine) return;
    const lines = renderScreen({
      engine: this._engine,
      stats: this._stats,
      platform: this._platform,
      toggles: this._toggles,
      message: this.messageShown,
    });
    this._output.write(CLEAR + lines.join('\n') + '\n');
  }

  /** Modal: until dismissed, only Enter or Space is accepted (and Ctrl-C). */
  showMessage(message: string): Promise<void> {
    return new Promise(resolve => {
      this._messages.push({ text: message, resolve });
      this.render();
    });
  }

  handleKey(key: Keypress): void {
    if (key.ctrl && key.name === 'c') {
      this._callbacks.onQuit();
      return;
    }

    const modal = this._messages[0];
    if (modal) {
      if (key.name === 'return' || key.name === 'enter' || key.name === 'space') {
        this._messages.shift();
        modal.resolve();
        this.render();
      }
      return;
    }

    switch (key.name) {
      case 's': this._callbacks.onStartWork(); break;
      case 'b': this._callbacks.onStartBreak(); break;
      case 'r': this._callbacks.onReset(); break;
      case 'm': this._callbacks.onToggleSound(); break;
      case 'a': this._callbacks.onToggleAutoAdvance(); break;
      case 'q': this._callbacks.onQuit(); break;
    }
  }

  private _onKeypress = (_str: string | undefined, key: Keypress | undefined): void => {
    if (key) this.handleKey(key);
  };
}
