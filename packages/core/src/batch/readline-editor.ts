/**
 * @module batch/readline-editor
 * `LineEditor` over Node's `readline`, with a persistent history file.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import { LineEditor, LineEvent } from './interactive-source';
import { InterruptNotifier } from './source';
import { EndOfInputError } from '../core/errors';

const HISTORY_MAX = 1000;

/**
 * Default history location: `$XDG_CONFIG_HOME/sqlbatch/history`.
 */
export function DefaultHistoryPath(): string {
  const configDir = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), '.config');
  return path.join(configDir, 'sqlbatch', 'history');
}

/**
 * Loads history entries, oldest first. A missing file is an empty history.
 */
export function LoadHistoryFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  return fs
    .readFileSync(filePath, 'utf-8')
    .split('\n')
    .filter((line) => line.length > 0);
}

/**
 * Writes the newest `HISTORY_MAX` entries, oldest first.
 */
export function WriteHistoryFile(filePath: string, entries: string[]): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, entries.slice(-HISTORY_MAX).join('\n') + '\n', 'utf-8');
}

/**
 * History keeps one entry per line, so multi-line batches are recalled as a
 * single line.
 */
export function FlattenHistoryEntry(batch: string): string {
  return batch
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(' ');
}

export interface ReadlineEditorOptions {
  Input?: Readable;
  Output?: Writable;

  /** History file. Defaults to `DefaultHistoryPath()` */
  HistoryFile?: string;

  /** Treat the streams as a terminal. Defaults to `Output.isTTY` */
  Terminal?: boolean;
}

interface PendingRead {
  resolve(event: LineEvent): void;
  reject(err: Error): void;
}

/**
 * Terminal line editor.
 *
 * Lines are queued as readline emits them, so a pasted block is consumed
 * one line per `ReadLine()` call. Ctrl-C is reported as an interrupt event
 * while a line is being read, and to the `Interrupts` subscribers otherwise
 * (i.e. while a batch is executing).
 *
 * The up arrow recalls whole batches, not the individual lines they were
 * typed as: readline's own per-line history is replaced after every line.
 */
export class ReadlineEditor implements LineEditor {
  private readonly rl: readline.Interface;
  private readonly output: Writable;
  private readonly historyFile: string;
  private readonly history: string[];
  /** Batches newest first, as the up arrow walks them */
  private readonly recall: string[];
  private liveHistory: string[];
  private readonly lines: string[] = [];
  private readonly interruptListeners = new Set<() => void>();
  private pending: PendingRead | null = null;
  private closed = false;

  readonly Interrupts: InterruptNotifier = {
    Subscribe: (listener) => {
      this.interruptListeners.add(listener);
      return () => {
        this.interruptListeners.delete(listener);
      };
    },
  };

  constructor(options: ReadlineEditorOptions = {}) {
    this.historyFile = options.HistoryFile ?? DefaultHistoryPath();
    this.history = LoadHistoryFile(this.historyFile);
    this.output = options.Output ?? process.stdout;

    this.recall = [...this.history].reverse();
    this.liveHistory = [...this.recall];

    this.rl = readline.createInterface({
      input: options.Input ?? process.stdin,
      output: this.output,
      terminal: options.Terminal,
      history: this.liveHistory,
      historySize: HISTORY_MAX,
    });

    // Fired after readline records a raw line; put the batch list back
    this.rl.on('history', (history: string[]) => {
      this.liveHistory = history;
      history.splice(0, history.length, ...this.recall);
    });

    this.rl.on('line', (text) => {
      const pending = this.pending;
      if (pending) {
        this.pending = null;
        pending.resolve({ Kind: 'line', Text: text });
      } else {
        this.lines.push(text);
      }
    });

    this.rl.on('SIGINT', () => {
      const pending = this.pending;
      if (pending) {
        this.pending = null;
        // Clear the half-typed line: end of line, then delete to start
        this.rl.write(null, { ctrl: true, name: 'e' });
        this.rl.write(null, { ctrl: true, name: 'u' });
        this.output.write('^C\n');
        pending.resolve({ Kind: 'interrupt' });
        return;
      }
      for (const listener of [...this.interruptListeners]) {
        listener();
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      const pending = this.pending;
      if (pending) {
        this.pending = null;
        pending.reject(new EndOfInputError());
      }
    });
  }

  SetPrompt(prompt: string): void {
    this.rl.setPrompt(prompt);
  }

  ReadLine(): Promise<LineEvent> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve({ Kind: 'line', Text: queued });
    }
    if (this.closed) {
      return Promise.reject(new EndOfInputError());
    }
    return new Promise<LineEvent>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.rl.prompt();
    });
  }

  SaveHistory(entry: string): void {
    const flat = FlattenHistoryEntry(entry);
    if (flat.length === 0) {
      return;
    }
    this.history.push(flat);
    WriteHistoryFile(this.historyFile, this.history);

    const seen = this.recall.indexOf(flat);
    if (seen >= 0) {
      this.recall.splice(seen, 1);
    }
    this.recall.unshift(flat);
    this.recall.splice(HISTORY_MAX);
    this.liveHistory.splice(0, this.liveHistory.length, ...this.recall);
  }

  async Close(): Promise<void> {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
