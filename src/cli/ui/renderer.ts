import { theme, INDENT } from './theme.js';
import { formatMs } from './format.js';
import { welcomeBanner } from './branding.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * - InteractiveRenderer: colours and spinners on stderr
 * - QuietRenderer: one JSON event per line (--quiet)
 */
export interface Renderer {
  // ── Branding ──
  welcome(version: string, templateName: string): void;

  // ── Steps ──
  spinner(message: string): SpinnerHandle;
  stepDone(message: string, durationMs?: number): void;
  commitSuccess(commitHash: string): void;

  // ── Problems ──
  error(title: string, details: string, tip?: string): void;
  /** Non-fatal problem; `hint` is how to finish by hand. */
  warn(message: string, hint?: string): void;

  // ── Completion ──
  nextSteps(lines: string[]): void;

  // ── Generic ──
  text(message: string): void;
  blank(): void;
  info(message: string): void;
  success(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  welcome(version: string, templateName: string): void {
    this.writeln(welcomeBanner(version, templateName));
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  stepDone(message: string, durationMs?: number): void {
    const timing = durationMs != null ? ` ${theme.dim(`(${formatMs(durationMs)})`)}` : '';
    this.writeln(`${INDENT}${theme.check} ${message}${timing}`);
  }

  commitSuccess(commitHash: string): void {
    this.writeln(`${INDENT}${theme.check} Initial commit ${theme.dim(`[${commitHash.slice(0, 7)}]`)}`);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string, hint?: string): void {
    this.writeln(`${INDENT}${theme.warn}  ${message}`);
    if (hint) this.writeln(`${INDENT}   ${theme.dim(hint)}`);
  }

  nextSteps(lines: string[]): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.bold('Next steps:')}`);
    for (const line of lines) this.writeln(`${INDENT}${INDENT}${line}`);
    this.writeln();
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.note}  ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.success(message)}`);
  }
}

// ── Quiet Renderer (Machine-Friendly JSON Lines) ────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  welcome(): void { /* no-op in quiet mode */ }

  spinner(message: string): SpinnerHandle {
    this.emit('step', { message });
    return {
      update: () => {},
      succeed: (t) => this.emit('step_done', { message: t ?? message }),
      fail: (t) => this.emit('step_failed', { message: t ?? message }),
      warn: (t) => this.emit('step_warning', { message: t ?? message }),
      info: (t) => this.emit('step_info', { message: t ?? message }),
      stop: () => {},
    };
  }

  stepDone(message: string, durationMs?: number): void {
    this.emit('step_done', { message, durationMs });
  }

  commitSuccess(commitHash: string): void {
    this.emit('commit', { hash: commitHash });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string, hint?: string): void {
    this.emit('warning', { message, hint });
  }

  nextSteps(lines: string[]): void {
    this.emit('next_steps', { steps: lines });
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void { /* no-op */ }

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.SEEDLING_QUIET === '1'
      ? new QuietRenderer()
      : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
