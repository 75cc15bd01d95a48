import * as readline from 'readline/promises';
import { Writable } from 'stream';
import { CancelledError } from '../../core/errors.js';

export interface LineReader {
  question(query: string): Promise<string>;
  /**
   * Like `question`, without echoing what is typed
   */
  secret(query: string): Promise<string>;
  close(): void;
}

export type Printer = (line?: string) => void;

export interface Choice<T> {
  label: string;
  value: T;
  aliases?: string[];
}

/**
 * Output that forwards to a target stream until muted
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.muted) {
      callback();
      return;
    }
    this.target.write(chunk, (error) => callback(error));
  }
}

/**
 * Line reader over stdin. Once input ends, pending and later questions
 * reject with CancelledError.
 */
export class TerminalLineReader implements LineReader {
  private rl: readline.Interface;
  private output: MutableOutput;
  private closed = new AbortController();

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private target: NodeJS.WritableStream = process.stdout,
    private terminal: boolean = Boolean(process.stdin.isTTY)
  ) {
    this.output = new MutableOutput(target);
    this.rl = readline.createInterface({ input, output: this.output, terminal });
    this.rl.on('close', () => this.closed.abort());
    // in raw mode Ctrl+C reaches readline, not the process
    this.rl.on('SIGINT', () => process.emit('SIGINT', 'SIGINT'));
  }

  async question(query: string): Promise<string> {
    if (this.closed.signal.aborted) {
      throw new CancelledError('input closed');
    }
    try {
      return await this.rl.question(query, { signal: this.closed.signal });
    } catch (error) {
      if (this.closed.signal.aborted) {
        throw new CancelledError('input closed');
      }
      throw error;
    }
  }

  /**
   * On a terminal the prompt is shown and the typed characters are not.
   * Piped input has no echo to hide and is read as a normal line.
   */
  async secret(query: string): Promise<string> {
    if (!this.terminal) {
      return this.question(query);
    }
    this.target.write(query);
    this.output.muted = true;
    try {
      return await this.question('');
    } finally {
      this.output.muted = false;
      this.target.write('\n');
    }
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Prompt helpers shared by the interactive flows
 */
export class Prompts {
  constructor(
    private reader: LineReader,
    private print: Printer
  ) {}

  async required(label: string): Promise<string> {
    for (;;) {
      const value = (await this.reader.question(`${label}: `)).trim();
      if (value) return value;
      this.print('Value required.');
    }
  }

  async secret(label: string): Promise<string> {
    for (;;) {
      const value = (await this.reader.secret(`${label}: `)).trim();
      if (value) return value;
      this.print('Value required.');
    }
  }

  async optional(label: string): Promise<string> {
    return (await this.reader.question(`${label}: `)).trim();
  }

  async confirm(label: string): Promise<boolean> {
    for (;;) {
      const value = (await this.reader.question(`${label} [y/N]: `)).trim().toLowerCase();
      if (value === 'y' || value === 'yes') return true;
      if (value === 'n' || value === 'no' || value === '') return false;
      this.print("Please respond with 'y' or 'n'.");
    }
  }

  /**
   * Numbered menu. Blank picks `defaultIndex`; a number, a label or an alias picks that entry.
   */
  async choose<T>(heading: string, choices: Choice<T>[], defaultIndex = 0): Promise<T> {
    for (;;) {
      this.print(heading);
      choices.forEach((choice, i) => {
        this.print(`  ${i + 1}) ${choice.label}${i === defaultIndex && choices.length > 1 ? ' (default)' : ''}`);
      });
      const input = (await this.reader.question(`Enter choice (1-${choices.length}): `)).trim();

      if (input === '') return choices[defaultIndex].value;

      const index = Number(input);
      if (Number.isInteger(index) && index >= 1 && index <= choices.length) {
        return choices[index - 1].value;
      }

      const lowered = input.toLowerCase();
      const match = choices.find(
        (choice) =>
          choice.label.toLowerCase() === lowered || choice.aliases?.some((alias) => alias.toLowerCase() === lowered)
      );
      if (match) return match.value;

      this.print('Invalid selection, please try again.');
    }
  }
}
