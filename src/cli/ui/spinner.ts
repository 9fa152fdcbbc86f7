import ora from 'ora';

// ── Step Spinner ────────────────────────────────────────────────────────────
// One spinner per initialization step. Falls back to plain lines when stderr
// is not a terminal (pipes, CI) or in quiet mode.

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  info(text?: string): void;
  stop(): void;
}

export function startSpinner(text: string, stream: NodeJS.WriteStream = process.stderr): SpinnerHandle {
  if (!stream.isTTY || process.env.SEEDLING_QUIET === '1') {
    return staticSpinner(text, stream);
  }

  // `ora` turns itself off when CI is set; a real TTY should still animate.
  const spinner = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();
  return {
    update(t: string) {
      spinner.text = t;
    },
    succeed(t?: string) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t?: string) {
      spinner.fail(t ?? spinner.text);
    },
    warn(t?: string) {
      spinner.warn(t ?? spinner.text);
    },
    info(t?: string) {
      spinner.info(t ?? spinner.text);
    },
    stop() {
      spinner.stop();
    },
  };
}

function staticSpinner(text: string, stream: NodeJS.WritableStream): SpinnerHandle {
  let current = text;
  const line = (symbol: string, t?: string) => stream.write(`  ${symbol} ${t ?? current}\n`);
  return {
    update(t: string) {
      current = t;
    },
    succeed: (t) => line('✔', t),
    fail: (t) => line('✖', t),
    warn: (t) => line('⚠', t),
    info: (t) => line('ℹ', t),
    stop() {},
  };
}
