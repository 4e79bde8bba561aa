/**
 * Attributed Directed Multigraph
 *
 * Arena storage: vertices and edges are dense integer ids starting at 0,
 * assigned in insertion order. Each arena carries one attribute column.
 * Edges additionally record their source and target, and both endpoints are
 * indexed so that incident edges can be looked up without a scan.
 *
 *   V = { 0, 1, ..., nv - 1 }       attr: V → VAttr
 *   E = { 0, 1, ..., ne - 1 }       attr: E → EAttr,  src, tgt: E → V
 *
 * The structure is append-only. Attributes are optional at insertion; reading
 * an unbound attribute is an error, never a default.
 */

import { IndexOutOfRangeError, MissingAttributeError, ShapeMismatchError } from './errors'

// ─── Column Storage ─────────────────────────────────────────────────────────

const UNBOUND: unique symbol = Symbol('unbound')
type Slot<T> = T | typeof UNBOUND

function slot<T>(value: T | undefined): Slot<T> {
  return value === undefined ? UNBOUND : value
}

function range(start: number, end: number): number[] {
  const ids: number[] = []
  for (let i = start; i < end; i++) ids.push(i)
  return ids
}

export interface ColumnNames {
  /** Name of the vertex attribute column, used in error reports. */
  readonly vertex: string
  /** Name of the edge attribute column, used in error reports. */
  readonly edge: string
}

const DEFAULT_COLUMNS: ColumnNames = { vertex: 'vertex', edge: 'edge' }

// ─── Graph ──────────────────────────────────────────────────────────────────

export class AttributedGraph<VAttr, EAttr> {
  private readonly vertexAttrs: Slot<VAttr>[] = []
  private readonly edgeAttrs: Slot<EAttr>[] = []
  private readonly srcs: number[] = []
  private readonly tgts: number[] = []
  private readonly outIndex: number[][] = []
  private readonly inIndex: number[][] = []

  constructor(private readonly columns: ColumnNames = DEFAULT_COLUMNS) {}

  get nv(): number {
    return this.vertexAttrs.length
  }

  get ne(): number {
    return this.edgeAttrs.length
  }

  vertices(): number[] {
    return range(0, this.nv)
  }

  edges(): number[] {
    return range(0, this.ne)
  }

  hasVertex(v: number): boolean {
    return Number.isInteger(v) && v >= 0 && v < this.nv
  }

  hasEdge(e: number): boolean {
    return Number.isInteger(e) && e >= 0 && e < this.ne
  }

  // ─── Insertion ────────────────────────────────────────────────────────────

  /** Append a vertex. `undefined` leaves its attribute unbound. */
  addVertex(attr?: VAttr): number {
    this.vertexAttrs.push(slot(attr))
    this.outIndex.push([])
    this.inIndex.push([])
    return this.nv - 1
  }

  /**
   * Append `count` vertices. When `attrs` is given it must hold exactly
   * `count` entries; the returned ids are contiguous.
   */
  addVertices(count: number, attrs?: readonly VAttr[]): number[] {
    if (attrs !== undefined && attrs.length !== count) {
      throw new ShapeMismatchError(
        `Expected ${count} vertex attributes, got ${attrs.length}`,
        'vertices',
        'length',
        [],
      )
    }
    const start = this.nv
    for (let i = 0; i < count; i++) this.addVertex(attrs?.[i])
    return range(start, this.nv)
  }

  /** Append an edge from `source` to `target`. Both must already exist. */
  addEdge(source: number, target: number, attr?: EAttr): number {
    this.assertVertex(source)
    this.assertVertex(target)
    const e = this.ne
    this.edgeAttrs.push(slot(attr))
    this.srcs.push(source)
    this.tgts.push(target)
    this.outIndex[source].push(e)
    this.inIndex[target].push(e)
    return e
  }

  /**
   * Append one edge per position of the parallel `sources`/`targets`(/`attrs`)
   * sequences. Lengths and endpoints are checked before anything is inserted.
   */
  addEdges(sources: readonly number[], targets: readonly number[], attrs?: readonly EAttr[]): number[] {
    if (sources.length !== targets.length || (attrs !== undefined && attrs.length !== sources.length)) {
      const lengths = [sources.length, targets.length]
      if (attrs !== undefined) lengths.push(attrs.length)
      throw new ShapeMismatchError(
        `Edge sequences differ in length: ${lengths.join(' / ')}`,
        'edges',
        'length',
        [],
      )
    }
    sources.forEach((s) => this.assertVertex(s))
    targets.forEach((t) => this.assertVertex(t))
    return sources.map((s, i) => this.addEdge(s, targets[i], attrs?.[i]))
  }

  // ─── Incidence ────────────────────────────────────────────────────────────

  src(e: number): number {
    this.assertEdge(e)
    return this.srcs[e]
  }

  tgt(e: number): number {
    this.assertEdge(e)
    return this.tgts[e]
  }

  /** Edges whose source is `v`, in insertion order. */
  outEdges(v: number): number[] {
    this.assertVertex(v)
    return [...this.outIndex[v]]
  }

  /** Edges whose target is `v`, in insertion order. */
  inEdges(v: number): number[] {
    this.assertVertex(v)
    return [...this.inIndex[v]]
  }

  // ─── Attributes ───────────────────────────────────────────────────────────

  isVertexAttrBound(v: number): boolean {
    this.assertVertex(v)
    return this.vertexAttrs[v] !== UNBOUND
  }

  isEdgeAttrBound(e: number): boolean {
    this.assertEdge(e)
    return this.edgeAttrs[e] !== UNBOUND
  }

  vertexAttr(v: number): VAttr {
    this.assertVertex(v)
    const value = this.vertexAttrs[v]
    if (value === UNBOUND) throw new MissingAttributeError(this.columns.vertex, v)
    return value
  }

  edgeAttr(e: number): EAttr {
    this.assertEdge(e)
    const value = this.edgeAttrs[e]
    if (value === UNBOUND) throw new MissingAttributeError(this.columns.edge, e)
    return value
  }

  private assertVertex(v: number): void {
    if (!this.hasVertex(v)) throw new IndexOutOfRangeError('vertex', v, this.nv)
  }

  private assertEdge(e: number): void {
    if (!this.hasEdge(e)) throw new IndexOutOfRangeError('edge', e, this.ne)
  }
}
