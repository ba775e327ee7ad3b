/**
 * Terminal Console
 *
 * Raw single-key input for the refresh loop, canonical line input for
 * prompts, and whole-screen redraws sized to the terminal.
 *
 * Two nested scopes:
 *   withConsole()       raw mode and key capture for the whole session
 *   withCanonicalMode() line editing for one prompt, raw mode restored after
 */

import { createInterface } from 'node:readline';
import type { RenderableBlock } from '../display/block.js';

export const DEFAULT_HEIGHT = 20;
export const DEFAULT_WIDTH = 80;

/** Slice used while waiting for a key */
const POLL_SLICE_MS = 100;

const CTRL_C = '\u0003';
const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

export type ConsoleInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export type ConsoleOutput = NodeJS.WritableStream & {
  isTTY?: boolean;
  rows?: number;
  columns?: number;
};

/** The operator pressed Ctrl-C while keys were captured. */
export class Interrupted extends Error {
  constructor() {
    super('Interrupted');
    this.name = 'Interrupted';
  }
}

/** What the polling loop needs from the screen */
export interface Terminal {
  refresh(blocks: readonly RenderableBlock[]): void;
  /** Next key within waitMs, or undefined; without waitMs, waits for one. */
  checkButton(waitMs?: number): Promise<string | undefined>;
  /** Prompt each field in turn; an empty answer stops early. */
  askForInput(...fields: string[]): Promise<string[]>;
  print(...lines: string[]): void;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class TerminalConsole implements Terminal {
  private keys: string[] = [];
  private capturing = false;
  private active = false;
  private height = DEFAULT_HEIGHT;
  private width = DEFAULT_WIDTH;

  private readonly onData = (chunk: string | Buffer): void => {
    if (!this.capturing) return;
    this.keys.push(...String(chunk));
  };

  private readonly onResize = (): void => {
    this.saveSize();
  };

  constructor(
    private readonly input: ConsoleInput = process.stdin,
    private readonly output: ConsoleOutput = process.stdout,
  ) {}

  get size(): { height: number; width: number } {
    return { height: this.height, width: this.width };
  }

  /** Cache the terminal dimensions, or the defaults when there are none. */
  saveSize(): void {
    this.height = this.output.rows || DEFAULT_HEIGHT;
    this.width = this.output.columns || DEFAULT_WIDTH;
  }

  activate(): void {
    if (this.active) return;
    this.active = true;
    this.saveSize();
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.output.on('resize', this.onResize);
    this.setRaw(true);
    this.input.resume();
    if (this.output.isTTY) this.output.write(HIDE_CURSOR);
  }

  deactivate(): void {
    if (!this.active) return;
    this.active = false;
    this.setRaw(false);
    this.input.removeListener('data', this.onData);
    this.output.removeListener('resize', this.onResize);
    this.input.pause();
    if (this.output.isTTY) this.output.write(`${SHOW_CURSOR}\n`);
  }

  private setRaw(raw: boolean): void {
    this.capturing = raw;
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(raw);
    }
  }

  /** Run fn with line editing on; raw key capture resumes on every exit path. */
  async withCanonicalMode<T>(fn: () => Promise<T>): Promise<T> {
    this.setRaw(false);
    try {
      return await fn();
    } finally {
      this.keys = [];
      if (this.active) {
        this.setRaw(true);
        this.input.resume();
      }
    }
  }

  async askForInput(...fields: string[]): Promise<string[]> {
    return this.withCanonicalMode(async () => {
      this.output.write('\n');
      const rl = createInterface({ input: this.input, terminal: false });
      const lines = rl[Symbol.asyncIterator]();
      const answers: string[] = [];
      try {
        for (const field of fields) {
          this.output.write(`${field}: `);
          const next = await lines.next();
          if (next.done) break;
          const answer = next.value.trim();
          if (!answer) break;
          answers.push(answer);
        }
      } finally {
        rl.close();
      }
      return answers;
    });
  }

  async checkButton(waitMs?: number): Promise<string | undefined> {
    const deadline = waitMs === undefined ? Infinity : Date.now() + waitMs;
    for (;;) {
      const key = this.keys.shift();
      if (key !== undefined) {
        if (key === CTRL_C) throw new Interrupted();
        return key;
      }
      const left = deadline - Date.now();
      if (left <= 0) return undefined;
      await sleep(Math.min(POLL_SLICE_MS, left));
    }
  }

  /**
   * Redraw the screen: each block gets the lines it needs while more than
   * a header and one row remain, followed by a blank separator line.
   */
  refresh(blocks: readonly RenderableBlock[]): void {
    const bold = this.output.isTTY === true;
    const lines: string[] = [];
    let left = this.height;

    for (const block of blocks) {
      if (left <= 2) break;
      const printed = block.printLines(Math.min(block.height(), left), this.width, bold);
      lines.push(...printed);
      left -= printed.length;
      if (left >= 2) {
        lines.push('');
        left -= 1;
      }
    }

    this.output.write(CLEAR_SCREEN + lines.join('\n'));
  }

  print(...lines: string[]): void {
    for (const line of lines) this.output.write(`${line}\n`);
  }
}

/** Run fn with the console active; the terminal is restored however fn ends. */
export async function withConsole<T>(
  fn: (terminal: TerminalConsole) => Promise<T>,
  input?: ConsoleInput,
  output?: ConsoleOutput,
): Promise<T> {
  const terminal = new TerminalConsole(input, output);
  terminal.activate();
  try {
    return await fn(terminal);
  } finally {
    terminal.deactivate();
  }
}
