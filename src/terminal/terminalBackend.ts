import readline from 'readline';
import type { DisplayRow, Frame, RowTone } from '../render/projection';
import type { KeyPress } from './keys';
import { StartupError } from '../types/errors';
import { withSource } from '../logger';

const log = withSource('terminal');

const ESC = '\x1b[';
const ANSI = {
  altScreenOn: `${ESC}?1049h`,
  altScreenOff: `${ESC}?1049l`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
  home: `${ESC}H`,
  clearScreen: `${ESC}2J`,
  clearLine: `${ESC}2K`,
  reset: `${ESC}0m`,
} as const;

const TONE_STYLE: Record<RowTone, string> = {
  live: `${ESC}1;31m`,
  final: `${ESC}32m`,
  scheduled: `${ESC}37m`,
  postponed: `${ESC}90m`,
};

const HEADER_STYLE = `${ESC}1;33m`;
const DIM_STYLE = `${ESC}90m`;
const ERROR_STYLE = `${ESC}31m`;

// header, rule, status line, rule, footer
export const CHROME_LINES = 5;

export interface StyledLine {
  text: string;
  style?: string;
}

function center(text: string, width: number): string {
  if (text === '') return '';
  if (text.length >= width) return text.slice(0, width);
  const left = Math.floor((width - text.length) / 2);
  return ' '.repeat(left) + text;
}

export function formatRowLine(row: DisplayRow, widths: { matchup: number; status: number }): string {
  const parts = [row.matchup.padEnd(widths.matchup), row.status.padEnd(widths.status)];
  if (row.records) parts.push(row.records);
  return parts.join('   ').trimEnd();
}

/**
 * Lay a frame out on a width x height grid. Pure, so the layout can be
 * checked without a terminal.
 */
export function layoutFrame(frame: Frame, width: number, height: number): StyledLine[] {
  const bodyHeight = Math.max(0, height - CHROME_LINES);
  const widths = {
    matchup: Math.max(0, ...frame.rows.map((r) => r.matchup.length)),
    status: Math.max(0, ...frame.rows.map((r) => r.status.length)),
  };
  const rule = '─'.repeat(Math.max(0, width));

  const lines: StyledLine[] = [
    { text: center(frame.header, width), style: HEADER_STYLE },
    { text: rule, style: DIM_STYLE },
  ];

  for (let i = 0; i < bodyHeight; i++) {
    const row = frame.rows[i];
    lines.push(row
      ? { text: center(formatRowLine(row, widths), width), style: TONE_STYLE[row.tone] }
      : { text: '' });
  }

  lines.push({ text: center(frame.statusLine, width), style: ERROR_STYLE });
  lines.push({ text: rule, style: DIM_STYLE });
  lines.push({ text: center(frame.footer, width), style: DIM_STYLE });
  return lines.slice(0, Math.max(0, height));
}

/**
 * Raw-mode keyboard input plus full-screen ANSI drawing on the alternate
 * screen buffer.
 */
export class TerminalBackend {
  private active = false;
  private keyListener?: (str: string | undefined, key: KeyPress | undefined) => void;
  private resizeListener?: () => void;

  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout
  ) {}

  /**
   * @throws StartupError when stdin/stdout are not an interactive terminal
   */
  init(): void {
    if (!this.input.isTTY || !this.output.isTTY) {
      throw new StartupError('scoreline needs an interactive terminal (stdin and stdout must be a TTY)');
    }
    try {
      readline.emitKeypressEvents(this.input);
      this.input.setRawMode(true);
      this.input.resume();
    } catch (err) {
      throw new StartupError(`could not initialize terminal: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.output.write(ANSI.altScreenOn + ANSI.hideCursor + ANSI.clearScreen);
    this.active = true;
    log.info({ columns: this.output.columns, rows: this.output.rows }, 'terminal initialized');
  }

  get width(): number {
    return this.output.columns ?? 80;
  }

  get height(): number {
    return this.output.rows ?? 24;
  }

  get viewportHeight(): number {
    return Math.max(1, this.height - CHROME_LINES);
  }

  onKey(handler: (key: KeyPress) => void): void {
    this.keyListener = (_str, key) => {
      if (key) handler(key);
    };
    this.input.on('keypress', this.keyListener);
  }

  onResize(handler: () => void): void {
    this.resizeListener = handler;
    this.output.on('resize', handler);
  }

  draw(frame: Frame): void {
    if (!this.active) return;
    const lines = layoutFrame(frame, this.width, this.height);
    let out = ANSI.home;
    lines.forEach((line, i) => {
      out += ANSI.clearLine + (line.style ? line.style + line.text + ANSI.reset : line.text);
      if (i < lines.length - 1) out += '\r\n';
    });
    this.output.write(out);
  }

  close(): void {
    if (!this.active) return;
    this.active = false;
    if (this.keyListener) this.input.off('keypress', this.keyListener);
    if (this.resizeListener) this.output.off('resize', this.resizeListener);
    this.input.setRawMode(false);
    this.input.pause();
    this.output.write(ANSI.reset + ANSI.showCursor + ANSI.altScreenOff);
  }
}
