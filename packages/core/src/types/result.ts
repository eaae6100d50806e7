import type { PatternError } from './errors'

/**
 * Outcome of a fallible pipeline stage.
 *
 * Stages never throw; the first error stops the pipeline and is handed back unchanged.
 *
 * @public
 */
export type Result<T> = Success<T> | Failure

/**
 * @public
 */
export interface Success<T> {
  readonly ok: true
  readonly value: T
}

/**
 * @public
 */
export interface Failure {
  readonly ok: false
  readonly error: PatternError
}
