/**
 * Fixed Shapes → Free Diagrams
 *
 * Each fixed shape embeds into a general free diagram. Vertex and edge order
 * is part of the contract: (co)limit algorithms address legs by position.
 *
 *   multispan     vertex 0 = apex, vertices 1..n = leg codomains,
 *                 edge i : 0 → i+1
 *   multicospan   vertices 0..n-1 = leg domains, vertex n = base,
 *                 edge i : i → n
 *   parallel      vertex 0 = dom, vertex 1 = codom, edge i : 0 → 1
 *
 * Converters never mutate their input and always build a fresh diagram.
 */

import type { Category } from './core'
import { FreeDiagram } from './free-diagram'
import type { Multispan } from './multispan'
import type { Multicospan } from './multicospan'
import type { ParallelMorphisms } from './parallel-morphisms'
import type { FixedFreeDiagram } from './shapes'
import { trace } from './diagnostics'

export function multispanToDiagram<Ob, Hom>(C: Category<Ob, Hom>, span: Multispan<Ob, Hom>): FreeDiagram<Ob, Hom> {
  const d = new FreeDiagram(C)
  const apex = d.addVertex(span.apex)
  const feet = d.addVertices(span.legs.map((f) => C.codom(f)))
  d.addEdges(feet.map(() => apex), feet, span.legs)
  trace('diagram.built', { shape: 'multispan', nv: d.nv, ne: d.ne })
  return d
}

export function multicospanToDiagram<Ob, Hom>(
  C: Category<Ob, Hom>,
  cospan: Multicospan<Ob, Hom>,
): FreeDiagram<Ob, Hom> {
  const d = new FreeDiagram(C)
  const feet = d.addVertices(cospan.legs.map((f) => C.dom(f)))
  const base = d.addVertex(cospan.base)
  d.addEdges(feet, feet.map(() => base), cospan.legs)
  trace('diagram.built', { shape: 'multicospan', nv: d.nv, ne: d.ne })
  return d
}

export function parallelToDiagram<Ob, Hom>(
  C: Category<Ob, Hom>,
  para: ParallelMorphisms<Ob, Hom>,
): FreeDiagram<Ob, Hom> {
  const d = new FreeDiagram(C)
  const [dom, codom] = d.addVertices([para.dom, para.codom])
  d.addEdges(para.homs.map(() => dom), para.homs.map(() => codom), para.homs)
  trace('diagram.built', { shape: 'parallel', nv: d.nv, ne: d.ne })
  return d
}

/** Embed any fixed shape into a free diagram. */
export function toFreeDiagram<Ob, Hom>(C: Category<Ob, Hom>, shape: FixedFreeDiagram<Ob, Hom>): FreeDiagram<Ob, Hom> {
  switch (shape.kind) {
    case 'multispan':
      return multispanToDiagram(C, shape)
    case 'multicospan':
      return multicospanToDiagram(C, shape)
    case 'parallel':
      return parallelToDiagram(C, shape)
  }
}
