/**
 * Result of a best-effort step. These steps never throw out to the caller;
 * they report what happened so the command can warn and carry on.
 */
export type StepOutcome =
  | { status: 'ok' }
  | { status: 'failed'; reason: string }
  | { status: 'timeout'; reason: string; timeoutMs: number };

export function ok(): StepOutcome {
  return { status: 'ok' };
}

export function failed(reason: string): StepOutcome {
  return { status: 'failed', reason };
}

export function isProblem(outcome: StepOutcome): outcome is Extract<StepOutcome, { status: 'failed' | 'timeout' }> {
  return outcome.status === 'failed' || outcome.status === 'timeout';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
