/**
 * Structural Equality of Diagrams
 *
 * Fixed shapes are equal when they have the same kind, the same apex / base /
 * (dom, codom), and the same morphisms in the same order. Free diagrams are
 * equal when they agree id by id: same counts, same objects, same morphisms,
 * same src and tgt.
 *
 * Object and morphism equality always come from the category capability.
 */

import type { Category } from './core'
import type { FreeDiagram } from './free-diagram'
import type { FixedFreeDiagram } from './shapes'

/** Elementwise, order-sensitive sequence equality. */
export function seqEquals<T>(a: readonly T[], b: readonly T[], equals: (x: T, y: T) => boolean): boolean {
  if (a.length !== b.length) return false
  return a.every((x, i) => equals(x, b[i]))
}

export function shapeEquals<Ob, Hom>(
  C: Category<Ob, Hom>,
  a: FixedFreeDiagram<Ob, Hom>,
  b: FixedFreeDiagram<Ob, Hom>,
): boolean {
  switch (a.kind) {
    case 'multispan':
      return b.kind === 'multispan' &&
        C.obEquals(a.apex, b.apex) &&
        seqEquals(a.legs, b.legs, C.homEquals)
    case 'multicospan':
      return b.kind === 'multicospan' &&
        C.obEquals(a.base, b.base) &&
        seqEquals(a.legs, b.legs, C.homEquals)
    case 'parallel':
      return b.kind === 'parallel' &&
        C.obEquals(a.dom, b.dom) &&
        C.obEquals(a.codom, b.codom) &&
        seqEquals(a.homs, b.homs, C.homEquals)
  }
}

/**
 * Id-by-id equality. Unbound attributes compare equal only to unbound
 * attributes.
 */
export function diagramEquals<Ob, Hom>(
  C: Category<Ob, Hom>,
  a: FreeDiagram<Ob, Hom>,
  b: FreeDiagram<Ob, Hom>,
): boolean {
  if (a.nv !== b.nv || a.ne !== b.ne) return false

  const sameVertices = a.vertices().every((v) => {
    const [boundA, boundB] = [a.isObBound(v), b.isObBound(v)]
    if (boundA !== boundB) return false
    return !boundA || C.obEquals(a.ob(v), b.ob(v))
  })
  if (!sameVertices) return false

  return a.edges().every((e) => {
    if (a.src(e) !== b.src(e) || a.tgt(e) !== b.tgt(e)) return false
    const [boundA, boundB] = [a.isHomBound(e), b.isHomBound(e)]
    if (boundA !== boundB) return false
    return !boundA || C.homEquals(a.hom(e), b.hom(e))
  })
}
