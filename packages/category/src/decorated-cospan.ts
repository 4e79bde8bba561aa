/**
 * Decorated Cospans
 *
 * An open network is a cospan whose base carries extra data (the decoration)
 * produced by a decorating functor. This wrapper holds the three pieces
 * together; it adds no invariant beyond the wrapped cospan's.
 */

import type { Cospan } from './multicospan'
import type { AbstractFunctor } from './functor'

export class DecoratedCospan<Ob, Hom, Decorator extends AbstractFunctor, Decoration> {
  constructor(
    readonly cospan: Cospan<Ob, Hom>,
    readonly decorator: Decorator,
    readonly decoration: Decoration,
  ) {}

  /** The underlying cospan, without its decoration. */
  undecorate(): Cospan<Ob, Hom> {
    return this.cospan
  }

  get base(): Ob {
    return this.cospan.base
  }

  get left(): Hom {
    return this.cospan.legs[0]
  }

  get right(): Hom {
    return this.cospan.legs[1]
  }
}

export function decoratedCospan<Ob, Hom, Decorator extends AbstractFunctor, Decoration>(
  cospan: Cospan<Ob, Hom>,
  decorator: Decorator,
  decoration: Decoration,
): DecoratedCospan<Ob, Hom, Decorator, Decoration> {
  return new DecoratedCospan(cospan, decorator, decoration)
}
