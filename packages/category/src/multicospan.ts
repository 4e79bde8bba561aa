/**
 * Multicospans and Cospans
 *
 * The dual of a multispan: a family of morphisms into a common base.
 *
 *       X₀   X₁     Xₙ
 *       ↓    ↓      ↓
 *       l₀   l₁ ... lₙ
 *          \  |   /
 *            base
 *
 * Its limit is a pullback.
 */

import { ShapeMismatchError, formatValue } from '@free-diagrams/graph'
import type { Category } from './core'
import { frozenCopy, mismatches } from './core'
import { rejected, trace } from './diagnostics'

export class Multicospan<Ob, Hom, Legs extends readonly Hom[] = readonly Hom[]> implements Iterable<Hom> {
  readonly kind = 'multicospan'

  readonly legs: Legs

  /** Trusted constructor: only non-emptiness is checked. */
  constructor(
    readonly base: Ob,
    legs: Legs,
  ) {
    this.legs = frozenCopy(legs)
    if (this.legs.length === 0) {
      throw rejected(new ShapeMismatchError('Multicospan must have at least one leg', 'multicospan', 'empty', []))
    }
  }

  get length(): number {
    return this.legs.length
  }

  [Symbol.iterator](): Iterator<Hom> {
    return this.legs[Symbol.iterator]()
  }
}

export type Cospan<Ob, Hom> = Multicospan<Ob, Hom, readonly [Hom, Hom]>

export function isCospan<Ob, Hom>(c: Multicospan<Ob, Hom>): c is Cospan<Ob, Hom> {
  return c.legs.length === 2
}

/** Multicospan whose base is the common codomain of `legs`. */
export function multicospan<Ob, Hom>(C: Category<Ob, Hom>, legs: readonly Hom[]): Multicospan<Ob, Hom> {
  if (legs.length === 0) {
    throw rejected(new ShapeMismatchError('Multicospan must have at least one leg', 'multicospan', 'empty', []))
  }
  const bad = mismatches(legs.map((f) => C.codom(f)), C.obEquals)
  if (bad.length > 0) {
    throw rejected(new ShapeMismatchError(
      `Codomains of legs of multicospan do not match: legs [${bad.join(', ')}] differ from leg 0`,
      'multicospan',
      'codom',
      bad,
    ))
  }
  trace('shape.built', { shape: 'multicospan', legs: legs.length })
  return new Multicospan<Ob, Hom>(C.codom(legs[0]), [...legs])
}

export function cospan<Ob, Hom>(C: Category<Ob, Hom>, left: Hom, right: Hom): Cospan<Ob, Hom> {
  if (!C.obEquals(C.codom(left), C.codom(right))) {
    throw rejected(new ShapeMismatchError(
      `Codomains of legs of cospan do not match: ${formatValue(left)} vs ${formatValue(right)}`,
      'cospan',
      'codom',
      [1],
    ))
  }
  trace('shape.built', { shape: 'cospan', legs: 2 })
  return new Multicospan<Ob, Hom, readonly [Hom, Hom]>(C.codom(left), [left, right])
}
