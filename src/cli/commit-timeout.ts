import { DEFAULT_COMMIT_TIMEOUT_MS } from '../git/bootstrap.js';

const MIN_COMMIT_TIMEOUT_MS = 1_000;

export function resolveCommitTimeoutMs(): number {
  const raw = process.env.SEEDLING_COMMIT_TIMEOUT_MS;
  if (!raw || !raw.trim()) return DEFAULT_COMMIT_TIMEOUT_MS;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return DEFAULT_COMMIT_TIMEOUT_MS;

  const ms = Math.floor(parsed);
  if (ms < MIN_COMMIT_TIMEOUT_MS) return MIN_COMMIT_TIMEOUT_MS;
  return ms;
}
