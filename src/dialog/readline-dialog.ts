/**
 * DialogIO on node:readline
 */

import readline from 'node:readline';
import { colors } from '../cli/output.js';
import type { Completer, DialogIO } from './dialog-io.js';
import { rankCandidates } from './fuzzy.js';

export interface ReadlineDialogOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const CANCEL_ANSWERS = new Set(['', 'q', 'quit']);

/**
 * One readline interface for the whole dialog; lines typed ahead are queued
 */
export class ReadlineDialog implements DialogIO {
  private rl: readline.Interface;
  private output: NodeJS.WritableStream;
  private buffered: string[] = [];
  private waiting: Array<(line: string | null) => void> = [];
  private closed = false;
  private completer: Completer | null = null;

  constructor(options: ReadlineDialogOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      completer: (line: string): [string[], string] => [this.completer ? this.completer(line) : [], line],
    });

    this.rl.on('line', line => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on('SIGINT', () => this.rl.close());
    this.rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) resolve(null);
    });
  }

  write(message: string): void {
    this.output.write(`${message}\n`);
  }

  async select(prompt: string, help: string, options: string[]): Promise<number | null> {
    let visible = options.map((label, index) => ({ label, index }));

    for (;;) {
      this.write(`\n${colors.bold}${prompt}${colors.reset}`);
      if (help) this.write(`${colors.dim}${help}${colors.reset}`);
      visible.forEach((option, i) => {
        this.write(`  ${colors.cyan}${i + 1}${colors.reset}) ${option.label}`);
      });

      const answer = await this.ask(`Select 1-${visible.length}, type to filter, q to quit: `);
      if (answer === null || CANCEL_ANSWERS.has(answer.trim().toLowerCase())) return null;

      const trimmed = answer.trim();
      if (/^\d+$/.test(trimmed)) {
        const option = visible[Number(trimmed) - 1];
        if (option) return option.index;
        this.write(`${colors.yellow}No option ${trimmed}${colors.reset}`);
        continue;
      }

      const ranked = rankCandidates(options, trimmed);
      if (ranked.length === 0) {
        this.write(`${colors.yellow}Nothing matches '${trimmed}'${colors.reset}`);
        visible = options.map((label, index) => ({ label, index }));
        continue;
      }
      visible = ranked.map(r => ({ label: r.label, index: r.index }));
    }
  }

  async text(prompt: string, help: string, initial: string, completer?: Completer): Promise<string | null> {
    if (help) this.write(`${colors.dim}${help}${colors.reset}`);
    const defaultHint = initial ? ` ${colors.dim}(${initial})${colors.reset}` : '';

    this.completer = completer ?? null;
    try {
      const answer = await this.ask(`${prompt}${defaultHint}: `);
      if (answer === null) return null;
      const value = answer.trim() || initial;
      return value || null;
    } finally {
      this.completer = null;
    }
  }

  async confirm(prompt: string, defaultYes: boolean): Promise<boolean> {
    const hint = defaultYes ? '[Y/n]' : '[y/N]';
    const answer = await this.ask(`${prompt} ${hint} `);

    if (!answer?.trim()) return answer === null ? false : defaultYes;
    return answer.trim().toLowerCase().startsWith('y');
  }

  close(): void {
    this.rl.close();
  }

  private ask(question: string): Promise<string | null> {
    // a closed interface throws on prompt(); lines read before closing still count
    if (this.closed) {
      this.output.write(question);
      return Promise.resolve(this.buffered.shift() ?? null);
    }

    this.rl.setPrompt(question);
    this.rl.prompt();

    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    return new Promise(resolve => this.waiting.push(resolve));
  }
}
