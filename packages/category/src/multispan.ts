/**
 * Multispans and Spans
 *
 * A multispan is a family of morphisms out of a common apex:
 *
 *            apex
 *          /  |   \
 *       l₀   l₁ ... lₙ
 *       ↓    ↓      ↓
 *       X₀   X₁     Xₙ
 *
 * Its colimit is a pushout. A span is the two-legged case; it is the same
 * class with its legs typed as a pair.
 */

import { ShapeMismatchError, formatValue } from '@free-diagrams/graph'
import type { Category } from './core'
import { frozenCopy, mismatches } from './core'
import { rejected, trace } from './diagnostics'

export class Multispan<Ob, Hom, Legs extends readonly Hom[] = readonly Hom[]> implements Iterable<Hom> {
  readonly kind = 'multispan'

  readonly legs: Legs

  /**
   * Trusted constructor: `apex` is taken as given. Use {@link multispan} or
   * {@link span} to derive and check it.
   */
  constructor(
    readonly apex: Ob,
    legs: Legs,
  ) {
    this.legs = frozenCopy(legs)
    if (this.legs.length === 0) {
      throw rejected(new ShapeMismatchError('Multispan must have at least one leg', 'multispan', 'empty', []))
    }
  }

  get length(): number {
    return this.legs.length
  }

  [Symbol.iterator](): Iterator<Hom> {
    return this.legs[Symbol.iterator]()
  }
}

export type Span<Ob, Hom> = Multispan<Ob, Hom, readonly [Hom, Hom]>

export function isSpan<Ob, Hom>(s: Multispan<Ob, Hom>): s is Span<Ob, Hom> {
  return s.legs.length === 2
}

/** Multispan whose apex is the common domain of `legs`. */
export function multispan<Ob, Hom>(C: Category<Ob, Hom>, legs: readonly Hom[]): Multispan<Ob, Hom> {
  if (legs.length === 0) {
    throw rejected(new ShapeMismatchError('Multispan must have at least one leg', 'multispan', 'empty', []))
  }
  const bad = mismatches(legs.map((f) => C.dom(f)), C.obEquals)
  if (bad.length > 0) {
    throw rejected(new ShapeMismatchError(
      `Domains of legs of multispan do not match: legs [${bad.join(', ')}] differ from leg 0`,
      'multispan',
      'dom',
      bad,
    ))
  }
  trace('shape.built', { shape: 'multispan', legs: legs.length })
  return new Multispan<Ob, Hom>(C.dom(legs[0]), [...legs])
}

export function span<Ob, Hom>(C: Category<Ob, Hom>, left: Hom, right: Hom): Span<Ob, Hom> {
  if (!C.obEquals(C.dom(left), C.dom(right))) {
    throw rejected(new ShapeMismatchError(
      `Domains of legs of span do not match: ${formatValue(left)} vs ${formatValue(right)}`,
      'span',
      'dom',
      [1],
    ))
  }
  trace('shape.built', { shape: 'span', legs: 2 })
  return new Multispan<Ob, Hom, readonly [Hom, Hom]>(C.dom(left), [left, right])
}
