/**
 * Free Diagrams of General Shape
 *
 * A free diagram is an attributed directed multigraph over a category C:
 *
 *   V, E            vertices and edges (dense ids from 0)
 *   src, tgt        : E → V
 *   ob              : V → Ob(C)
 *   hom             : E → Hom(C)
 *
 * Invariant, for every edge e:
 *   dom(hom(e))   = ob(src(e))
 *   codom(hom(e)) = ob(tgt(e))
 *
 * Diagrams are append-only. They are built once, then read by limit and
 * colimit algorithms.
 */

import { AttributedGraph, IndexOutOfRangeError, ShapeMismatchError, formatValue } from '@free-diagrams/graph'
import type { ShapeAspect } from '@free-diagrams/graph'
import type { Category } from './core'
import { rejected, trace } from './diagnostics'

/** `[sourceIndex, targetIndex, morphism]` */
export type EdgeTriple<Hom> = readonly [source: number, target: number, hom: Hom]

interface EndpointViolation {
  readonly position: number
  readonly aspect: ShapeAspect
  readonly message: string
}

export class FreeDiagram<Ob, Hom> {
  private readonly graph = new AttributedGraph<Ob, Hom>({ vertex: 'ob', edge: 'hom' })

  constructor(readonly category: Category<Ob, Hom>) {}

  // ─── Structure ────────────────────────────────────────────────────────────

  get nv(): number {
    return this.graph.nv
  }

  get ne(): number {
    return this.graph.ne
  }

  vertices(): number[] {
    return this.graph.vertices()
  }

  edges(): number[] {
    return this.graph.edges()
  }

  hasVertex(v: number): boolean {
    return this.graph.hasVertex(v)
  }

  hasEdge(e: number): boolean {
    return this.graph.hasEdge(e)
  }

  src(e: number): number {
    return this.graph.src(e)
  }

  tgt(e: number): number {
    return this.graph.tgt(e)
  }

  outEdges(v: number): number[] {
    return this.graph.outEdges(v)
  }

  inEdges(v: number): number[] {
    return this.graph.inEdges(v)
  }

  // ─── Attributes ───────────────────────────────────────────────────────────

  /** Object at vertex `v`. Throws MissingAttributeError if unbound. */
  ob(v: number): Ob {
    return this.graph.vertexAttr(v)
  }

  /** Morphism on edge `e`. Throws MissingAttributeError if unbound. */
  hom(e: number): Hom {
    return this.graph.edgeAttr(e)
  }

  isObBound(v: number): boolean {
    return this.graph.isVertexAttrBound(v)
  }

  isHomBound(e: number): boolean {
    return this.graph.isEdgeAttrBound(e)
  }

  obs(): Ob[] {
    return this.vertices().map((v) => this.ob(v))
  }

  homs(): Hom[] {
    return this.edges().map((e) => this.hom(e))
  }

  // ─── Insertion ────────────────────────────────────────────────────────────

  addVertex(ob?: Ob): number {
    return this.graph.addVertex(ob)
  }

  addVertices(obs: readonly Ob[]): number[] {
    return this.graph.addVertices(obs.length, obs)
  }

  /**
   * Append an edge. When the morphism and an endpoint object are both bound,
   * they must agree; nothing is inserted otherwise.
   */
  addEdge(source: number, target: number, hom?: Hom): number {
    if (hom !== undefined) {
      const violation = this.checkEndpoints(this.ne, source, target, hom)
      if (violation) {
        throw rejected(new ShapeMismatchError(violation.message, 'edges', violation.aspect, [violation.position]))
      }
    }
    return this.graph.addEdge(source, target, hom)
  }

  /**
   * Append one edge per position of the parallel sequences; all-or-nothing.
   * Error positions are the ids the offending edges would have received.
   */
  addEdges(sources: readonly number[], targets: readonly number[], homs: readonly Hom[]): number[] {
    if (sources.length !== targets.length || sources.length !== homs.length) {
      throw rejected(new ShapeMismatchError(
        `Edge sequences differ in length: ${sources.length} / ${targets.length} / ${homs.length}`,
        'edges',
        'length',
        [],
      ))
    }
    const violations = homs.flatMap((f, i) => this.checkEndpoints(this.ne + i, sources[i], targets[i], f) ?? [])
    if (violations.length > 0) {
      throw rejected(new ShapeMismatchError(
        violations[0].message,
        'edges',
        violations[0].aspect,
        violations.map((v) => v.position),
      ))
    }
    return this.graph.addEdges(sources, targets, homs)
  }

  private checkEndpoints(position: number, source: number, target: number, hom: Hom): EndpointViolation | undefined {
    const C = this.category
    for (const v of [source, target]) {
      if (!this.graph.hasVertex(v)) throw new IndexOutOfRangeError('vertex', v, this.nv)
    }
    if (this.graph.isVertexAttrBound(source) && !C.obEquals(this.ob(source), C.dom(hom))) {
      return {
        position,
        aspect: 'dom',
        message: `Edge ${position} (${source} -> ${target}): object ${formatValue(this.ob(source))} ` +
          `is not the domain of ${formatValue(hom)}`,
      }
    }
    if (this.graph.isVertexAttrBound(target) && !C.obEquals(this.ob(target), C.codom(hom))) {
      return {
        position,
        aspect: 'codom',
        message: `Edge ${position} (${source} -> ${target}): object ${formatValue(this.ob(target))} ` +
          `is not the codomain of ${formatValue(hom)}`,
      }
    }
    return undefined
  }
}

// ─── Construction ───────────────────────────────────────────────────────────

/**
 * Build a diagram from an object list and `[source, target, morphism]`
 * triples (0-based indices into `obs`).
 *
 * Every triple is checked before anything is built. All violating triples are
 * collected into the error's `positions`; the message names the first.
 */
export function freeDiagram<Ob, Hom>(
  C: Category<Ob, Hom>,
  obs: readonly Ob[],
  triples: readonly EdgeTriple<Hom>[],
): FreeDiagram<Ob, Hom> {
  const violations: EndpointViolation[] = []
  triples.forEach(([s, t, f], i) => {
    for (const v of [s, t]) {
      if (!Number.isInteger(v) || v < 0 || v >= obs.length) throw new IndexOutOfRangeError('vertex', v, obs.length)
    }
    if (!C.obEquals(obs[s], C.dom(f))) {
      violations.push({
        position: i,
        aspect: 'dom',
        message: `Triple ${i} (${s} -> ${t}): object ${formatValue(obs[s])} is not the domain of ${formatValue(f)}`,
      })
    } else if (!C.obEquals(obs[t], C.codom(f))) {
      violations.push({
        position: i,
        aspect: 'codom',
        message: `Triple ${i} (${s} -> ${t}): object ${formatValue(obs[t])} is not the codomain of ${formatValue(f)}`,
      })
    }
  })
  if (violations.length > 0) {
    throw rejected(new ShapeMismatchError(
      violations[0].message,
      'free-diagram',
      violations[0].aspect,
      violations.map((v) => v.position),
    ))
  }

  const d = new FreeDiagram(C)
  d.addVertices(obs)
  d.addEdges(triples.map((t) => t[0]), triples.map((t) => t[1]), triples.map((t) => t[2]))
  trace('diagram.built', { shape: 'free-diagram', nv: d.nv, ne: d.ne })
  return d
}

/** Diagram with the given objects and no morphisms: the shape of a (co)product. */
export function discreteDiagram<Ob, Hom>(C: Category<Ob, Hom>, obs: readonly Ob[]): FreeDiagram<Ob, Hom> {
  const d = new FreeDiagram(C)
  d.addVertices(obs)
  trace('diagram.built', { shape: 'discrete', nv: d.nv, ne: 0 })
  return d
}
