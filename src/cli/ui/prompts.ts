import { createInterface, type Interface } from 'node:readline';

import { input } from '@inquirer/prompts';

import type { PromptSession } from '../../core/config/collector.js';
import { getActiveCancelSignal } from '../cancel.js';

/** The user interrupted a prompt (Ctrl+C). Distinct from unreadable input. */
export class PromptCancelledError extends Error {
  constructor() {
    super('prompt cancelled');
    this.name = 'PromptCancelledError';
  }
}

/**
 * Line-oriented prompts over any readable stream: one answer per line.
 * Once the stream ends every further question gets `null`. An abort of the
 * cancel signal (the active CLI one by default) rejects the pending question
 * with `PromptCancelledError`.
 */
export class LinePromptSession implements PromptSession {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiting: PendingAnswer[] = [];
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream = process.stderr,
    private readonly signal: AbortSignal | null = getActiveCancelSignal()
  ) {
    this.rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.rl.on('line', (line) => {
      const next = this.waiting.shift();
      if (next) next.resolve(line);
      else this.buffered.push(line);
    });
    this.rl.on('close', () => {
      this.closed = true;
      for (const pending of this.waiting.splice(0)) pending.resolve(null);
    });
    this.signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  ask(question: string): Promise<string | null> {
    if (this.signal?.aborted) return Promise.reject(new PromptCancelledError());
    this.output.write(`${question}: `);
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve, reject) => this.waiting.push({ resolve, reject }));
  }

  say(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.signal?.removeEventListener('abort', this.onAbort);
    if (!this.closed) this.rl.close();
  }

  private readonly onAbort = (): void => {
    for (const pending of this.waiting.splice(0)) pending.reject(new PromptCancelledError());
  };
}

interface PendingAnswer {
  resolve(line: string | null): void;
  reject(err: PromptCancelledError): void;
}

/**
 * Prompts for an interactive terminal, rendered by @inquirer/prompts.
 * Ctrl+C raises `PromptCancelledError`; other failures read as "no answer".
 */
export class TerminalPromptSession implements PromptSession {
  async ask(question: string): Promise<string | null> {
    const signal = getActiveCancelSignal();
    try {
      return await input({ message: question }, signal ? { signal } : undefined);
    } catch (err) {
      if (isPromptInterruption(err)) throw new PromptCancelledError();
      return null;
    }
  }

  say(line: string): void {
    process.stderr.write(`${line}\n`);
  }

  close(): void {}
}

function isPromptInterruption(err: unknown): boolean {
  return err instanceof Error && (err.name === 'ExitPromptError' || err.name === 'AbortPromptError');
}

/**
 * Pick the prompt transport for this process: rich prompts on a terminal,
 * plain lines when stdin is piped.
 */
export function openPromptSession(): PromptSession & { close(): void } {
  return process.stdin.isTTY ? new TerminalPromptSession() : new LinePromptSession(process.stdin);
}
