/**
 * Raised for malformed or out-of-domain requirements (η ∉ (0, 100],
 * Ku ∉ [0.1, 0.8], non-positive sizing inputs).  Callers receive it
 * immediately; the engine never recovers from it.
 *
 * Every other "could not fully satisfy" condition is reported inside the
 * result as a warning, a recommendation or a NoMatch payload.
 */
export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid design input: ${list.join('; ')}`);
    this.name = 'InvalidInputError';
    this.issues = list;
  }
}

/** Throw InvalidInputError unless every named value is a finite number > 0. */
export function requirePositive(values: Record<string, number>): void {
  const bad = Object.entries(values)
    .filter(([, v]) => !Number.isFinite(v) || v <= 0)
    .map(([name, v]) => `${name} must be > 0 (got ${v})`);
  if (bad.length > 0) throw new InvalidInputError(bad);
}
