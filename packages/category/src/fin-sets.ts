/**
 * The Category of Finite Ordinals
 *
 *   Objects    FinSet(n) = { 0, 1, ..., n - 1 }
 *   Morphisms  FinFunction f : FinSet(m) → FinSet(n), stored as the list of
 *              images [f(0), ..., f(m - 1)] together with n
 *
 * A concrete category for building and testing diagrams, e.g. the pullback
 * cospan FinSet(4) → FinSet(4) ← FinSet(4).
 */

import { ShapeMismatchError } from '@free-diagrams/graph'
import { finFunctionSchema, finSetSchema } from '@free-diagrams/shared'
import type { Category } from './core'
import { category } from './core'
import { rejected } from './diagnostics'
import { seqEquals } from './equality'
import { DiagramInputError } from './errors'

export interface FinSet {
  readonly size: number
}

export interface FinFunction {
  readonly values: readonly number[]
  readonly codom: number
}

export function finSet(size: number): FinSet {
  const result = finSetSchema.safeParse({ size })
  if (!result.success) throw DiagramInputError.fromZod('finite set', result.error)
  return result.data
}

/**
 * Finite function from its list of images. The codomain defaults to the
 * smallest one containing every image.
 */
export function finFunction(values: readonly number[], codom?: number): FinFunction {
  const result = finFunctionSchema.safeParse({
    values: [...values],
    codom: codom ?? values.reduce((m, v) => Math.max(m, v), -1) + 1,
  })
  if (!result.success) throw DiagramInputError.fromZod('finite function', result.error)
  return result.data
}

export function identityFinFunction(size: number): FinFunction {
  return finFunction(Array.from({ length: size }, (_, i) => i), size)
}

/** Apply `f` first, then `g`. */
export function composeFinFunctions(f: FinFunction, g: FinFunction): FinFunction {
  if (f.codom !== g.values.length) {
    throw rejected(new ShapeMismatchError(
      `Cannot compose: codomain of size ${f.codom} is not the domain of size ${g.values.length}`,
      'composite',
      'codom',
      [1],
    ))
  }
  return { values: f.values.map((x) => g.values[x]), codom: g.codom }
}

export const finSetCategory: Category<FinSet, FinFunction> = category<FinSet, FinFunction>({
  dom: (f) => ({ size: f.values.length }),
  codom: (f) => ({ size: f.codom }),
  obEquals: (a, b) => a.size === b.size,
  homEquals: (f, g) => f.codom === g.codom && seqEquals(f.values, g.values, Object.is),
})
