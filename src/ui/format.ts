import type { EngineSnapshot, Platform, Settings, StatsSnapshot, TimerPhase } from '../shared/types';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';

export const COLORS = {
  title: '#FF6B6B',
  clock: '#4ECDC4',
  start: '#45B7D1',
  break: '#4CAF50',
  reset: '#FF6B6B',
} as const;

export interface ControlSpec {
  key: string;
  label: string;
  color: string;
}

export const CONTROLS: readonly ControlSpec[] = [
  { key: 's', label: 'START', color: COLORS.start },
  { key: 'b', label: 'BREAK', color: COLORS.break },
  { key: 'r', label: 'RESET', color: COLORS.reset },
];

/** `mm:ss`; minutes are not capped at two digits. */
export function formatClock(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  const m = Math.floor(s / 60);
  return `${String(m).padStart(2, '0')}:${String(s % 60).padStart(2, '0')}`;
}

export function formatPercent(progress: number): string {
  const clamped = Math.min(1, Math.max(0, progress));
  return `${Math.floor(clamped * 100)}%`;
}

export function progressBar(progress: number, width = 30): string {
  const clamped = Math.min(1, Math.max(0, progress));
  const filled = Math.round(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

export function phaseLabel(phase: TimerPhase): string {
  switch (phase) {
    case 'idle': return 'Ready';
    case 'work': return 'Focus';
    case 'break': return 'Short Break';
    case 'longBreak': return 'Long Break';
  }
}

export function formatStats(stats: StatsSnapshot): string[] {
  if (stats.completedPomodoros === 0) {
    return ['Come on, start your Pomodoro!', 'Today focus: 0 tomato', 'Total focus: 0 min'];
  }
  return [
    `today focus: ${stats.completedPomodoros} tomatoes`,
    `total focus: ${stats.totalFocusMinutes} mins`,
  ];
}

function hexToRgb(hex: string): [number, number, number] {
  const n = parseInt(hex.slice(1), 16);
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

export function fg(hex: string, text: string): string {
  const [r, g, b] = hexToRgb(hex);
  return `\x1b[38;2;${r};${g};${b}m${text}${RESET}`;
}

export function bg(hex: string, text: string): string {
  const [r, g, b] = hexToRgb(hex);
  return `\x1b[48;2;${r};${g};${b}m\x1b[97m${text}${RESET}`;
}

/** macOS: outlined labels in the control colour; elsewhere: filled labels. */
export function renderControl(control: ControlSpec, platform: Platform): string {
  const text = ` ${control.label} (${control.key}) `;
  return platform === 'macos'
    ? fg(control.color, `[${text}]`)
    : bg(control.color, text);
}

export interface ScreenView {
  engine: EngineSnapshot;
  stats: StatsSnapshot;
  platform: Platform;
  toggles: Pick<Settings, 'soundEnabled' | 'autoAdvance'>;
  message: string | null;
}

export function formatToggles(toggles: ScreenView['toggles']): string {
  const onOff = (value: boolean) => (value ? 'on' : 'off');
  return `m sound: ${onOff(toggles.soundEnabled)}  a auto-advance: ${onOff(toggles.autoAdvance)}`;
}

export function renderScreen(view: ScreenView): string[] {
  const { engine, stats, platform, toggles, message } = view;
  const lines = [
    fg(COLORS.title, `${BOLD}Focus Timer${RESET}`),
    '',
    `  ${phaseLabel(engine.phase)}`,
    `  ${fg(COLORS.clock, `${BOLD}${formatClock(engine.remainingSeconds)}`)}`,
    `  ${progressBar(engine.progress)} ${formatPercent(engine.progress)}`,
    '',
    '  ' + CONTROLS.map(c => renderControl(c, platform)).join('  '),
    '',
    ...formatStats(stats).map(line => `  ${line}`),
  ];

  if (message !== null) {
    lines.push('', `  ${BOLD}${message}${RESET}`, '  Press Enter to continue');
  } else {
    lines.push('', `  ${formatToggles(toggles)}  q quit`);
  }
  return lines;
}
