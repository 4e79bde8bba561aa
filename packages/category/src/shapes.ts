/**
 * Diagrams of fixed shape, as one tagged union.
 */

import type { Multispan, Span } from './multispan'
import type { Multicospan, Cospan } from './multicospan'
import type { ParallelMorphisms } from './parallel-morphisms'

export type FixedFreeDiagram<Ob, Hom> =
  | Multispan<Ob, Hom>
  | Multicospan<Ob, Hom>
  | ParallelMorphisms<Ob, Hom>

/** First leg of a span or cospan. */
export function left<Ob, Hom>(shape: Span<Ob, Hom> | Cospan<Ob, Hom>): Hom {
  return shape.legs[0]
}

/** Second leg of a span or cospan. */
export function right<Ob, Hom>(shape: Span<Ob, Hom> | Cospan<Ob, Hom>): Hom {
  return shape.legs[1]
}

/** The morphisms of a fixed shape, in order. */
export function shapeMorphisms<Ob, Hom>(shape: FixedFreeDiagram<Ob, Hom>): readonly Hom[] {
  return shape.kind === 'parallel' ? shape.homs : shape.legs
}
