/**
 * Outcome of building one unit (a cluster or one related entry).
 *
 * Builders return these instead of logging or throwing; the bundle
 * assembler decides what gets logged and what gets kept.
 */

export type SkipSeverity = 'warn' | 'error';

export interface Built<T> {
  status: 'built';
  value: T;
}

export interface Skipped {
  status: 'skipped';
  reason: string;
  severity: SkipSeverity;
}

export type BuildResult<T> = Built<T> | Skipped;

export function built<T>(value: T): BuildResult<T> {
  return { status: 'built', value };
}

export function skipped<T>(reason: string, severity: SkipSeverity = 'warn'): BuildResult<T> {
  return { status: 'skipped', reason, severity };
}
