/**
 * timeshift/functional
 *
 * Left-to-right composition, so relative-time expressions read in the
 * order they are spoken.
 */

// =============================================================================
// Composition
// =============================================================================

/**
 * Pipe a value through a series of functions left-to-right.
 *
 * @example
 * ```typescript
 * pipe(10, minutes, ago); // ten minutes ago
 * pipe(3, days, ago, (d) => from(years(3), d)); // three years after three days ago
 * ```
 */
export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: (a: A) => B): B;
export function pipe<A, B, C>(a: A, ab: (a: A) => B, bc: (b: B) => C): C;
export function pipe<A, B, C, D>(a: A, ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): D;
export function pipe<A, B, C, D, E>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): E;
export function pipe<A, B, C, D, E, F>(
  a: A,
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E,
  ef: (e: E) => F
): F;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function pipe(a: unknown, ...fns: Array<(x: any) => any>): unknown {
  return fns.reduce((acc, fn) => fn(acc), a);
}

/**
 * Compose functions left-to-right into a reusable step.
 *
 * @example
 * ```typescript
 * const hoursAgo = flow(hours, ago);
 * hoursAgo(15);
 * ```
 */
export function flow<A, B>(ab: (a: A) => B): (a: A) => B;
export function flow<A, B, C>(ab: (a: A) => B, bc: (b: B) => C): (a: A) => C;
export function flow<A, B, C, D>(ab: (a: A) => B, bc: (b: B) => C, cd: (c: C) => D): (a: A) => D;
export function flow<A, B, C, D, E>(
  ab: (a: A) => B,
  bc: (b: B) => C,
  cd: (c: C) => D,
  de: (d: D) => E
): (a: A) => E;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function flow(...fns: Array<(x: any) => any>): (a: unknown) => unknown {
  return (a: unknown) => fns.reduce((acc, fn) => fn(acc), a);
}
