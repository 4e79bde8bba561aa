/**
 * Parallel Morphisms
 *
 * Morphisms sharing both domain and codomain:
 *
 *            h₀
 *          ----->
 *      dom   ⋮    codom
 *          ----->
 *            hₙ
 *
 * A (co)limit of this shape is a (co)equalizer. The two-morphism case is a
 * parallel pair.
 */

import { IndexOutOfRangeError, ShapeMismatchError, formatValue } from '@free-diagrams/graph'
import type { Category } from './core'
import { frozenCopy, mismatches } from './core'
import { rejected, trace } from './diagnostics'

export class ParallelMorphisms<Ob, Hom, Homs extends readonly Hom[] = readonly Hom[]> implements Iterable<Hom> {
  readonly kind = 'parallel'

  readonly homs: Homs

  /** Trusted constructor: only non-emptiness is checked. */
  constructor(
    readonly dom: Ob,
    readonly codom: Ob,
    homs: Homs,
  ) {
    this.homs = frozenCopy(homs)
    if (this.homs.length === 0) {
      throw rejected(new ShapeMismatchError(
        'Parallel morphisms must have at least one morphism',
        'parallel-morphisms',
        'empty',
        [],
      ))
    }
  }

  /** The full morphism sequence; same as `homs`. */
  get hom(): Homs {
    return this.homs
  }

  get length(): number {
    return this.homs.length
  }

  get firstIndex(): number {
    return 0
  }

  get lastIndex(): number {
    return this.homs.length - 1
  }

  /** Bounds-checked positional access. */
  at(i: number): Hom {
    if (!Number.isInteger(i) || i < 0 || i >= this.homs.length) {
      throw new IndexOutOfRangeError('hom', i, this.homs.length)
    }
    return this.homs[i]
  }

  [Symbol.iterator](): Iterator<Hom> {
    return this.homs[Symbol.iterator]()
  }
}

export type ParallelPair<Ob, Hom> = ParallelMorphisms<Ob, Hom, readonly [Hom, Hom]>

export function isParallelPair<Ob, Hom>(p: ParallelMorphisms<Ob, Hom>): p is ParallelPair<Ob, Hom> {
  return p.homs.length === 2
}

/**
 * Parallel morphisms whose dom/codom are the common domain and codomain of
 * `homs`. A domain disagreement is reported before a codomain one.
 */
export function parallelMorphisms<Ob, Hom>(
  C: Category<Ob, Hom>,
  homs: readonly Hom[],
): ParallelMorphisms<Ob, Hom> {
  if (homs.length === 0) {
    throw rejected(new ShapeMismatchError(
      'Parallel morphisms must have at least one morphism',
      'parallel-morphisms',
      'empty',
      [],
    ))
  }
  const badDom = mismatches(homs.map((f) => C.dom(f)), C.obEquals)
  if (badDom.length > 0) {
    throw rejected(new ShapeMismatchError(
      `Domains of parallel morphisms do not match: morphisms [${badDom.join(', ')}] differ from morphism 0`,
      'parallel-morphisms',
      'dom',
      badDom,
    ))
  }
  const badCodom = mismatches(homs.map((f) => C.codom(f)), C.obEquals)
  if (badCodom.length > 0) {
    throw rejected(new ShapeMismatchError(
      `Codomains of parallel morphisms do not match: morphisms [${badCodom.join(', ')}] differ from morphism 0`,
      'parallel-morphisms',
      'codom',
      badCodom,
    ))
  }
  trace('shape.built', { shape: 'parallel-morphisms', homs: homs.length })
  return new ParallelMorphisms<Ob, Hom>(C.dom(homs[0]), C.codom(homs[0]), [...homs])
}

export function parallelPair<Ob, Hom>(C: Category<Ob, Hom>, first: Hom, last: Hom): ParallelPair<Ob, Hom> {
  if (!C.obEquals(C.dom(first), C.dom(last))) {
    throw rejected(new ShapeMismatchError(
      `Domains of parallel pair do not match: ${formatValue(first)} vs ${formatValue(last)}`,
      'parallel-pair',
      'dom',
      [1],
    ))
  }
  if (!C.obEquals(C.codom(first), C.codom(last))) {
    throw rejected(new ShapeMismatchError(
      `Codomains of parallel pair do not match: ${formatValue(first)} vs ${formatValue(last)}`,
      'parallel-pair',
      'codom',
      [1],
    ))
  }
  trace('shape.built', { shape: 'parallel-pair', homs: 2 })
  return new ParallelMorphisms<Ob, Hom, readonly [Hom, Hom]>(C.dom(first), C.codom(first), [first, last])
}
