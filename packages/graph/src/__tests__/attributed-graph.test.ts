/**
 * Attributed graph storage: id assignment, incidence indexes, attribute columns.
 */

import { describe, test, expect } from 'vitest'
import fc from 'fast-check'
import { AttributedGraph } from '../attributed-graph'
import {
  IndexOutOfRangeError, MissingAttributeError, ShapeMismatchError, formatValue,
} from '../errors'

// ─── Insertion ──────────────────────────────────────────────────────────────

describe('AttributedGraph: insertion', () => {
  test('vertex ids are contiguous from 0 in insertion order', () => {
    const g = new AttributedGraph<string, number>()
    expect(g.addVertex('a')).toBe(0)
    expect(g.addVertices(3, ['b', 'c', 'd'])).toEqual([1, 2, 3])
    expect(g.addVertex('e')).toBe(4)
    expect(g.nv).toBe(5)
    expect(g.vertices()).toEqual([0, 1, 2, 3, 4])
    expect(g.vertexAttr(2)).toBe('c')
  })

  test('edge ids are contiguous from 0 in insertion order', () => {
    const g = new AttributedGraph<string, number>()
    g.addVertices(3, ['a', 'b', 'c'])
    expect(g.addEdge(0, 1, 10)).toBe(0)
    expect(g.addEdges([1, 0], [2, 2], [20, 30])).toEqual([1, 2])
    expect(g.ne).toBe(3)
    expect(g.edges()).toEqual([0, 1, 2])
    expect([g.src(1), g.tgt(1), g.edgeAttr(1)]).toEqual([1, 2, 20])
  })

  test('vertex attribute count must match the vertex count', () => {
    const g = new AttributedGraph<string, number>()
    expect(() => g.addVertices(2, ['a'])).toThrow(ShapeMismatchError)
    expect(g.nv).toBe(0)
  })

  test('edge sequences of different lengths are rejected before insertion', () => {
    const g = new AttributedGraph<string, number>()
    g.addVertices(2, ['a', 'b'])
    try {
      g.addEdges([0, 0], [1], [1, 2])
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ShapeMismatchError)
      if (e instanceof ShapeMismatchError) {
        expect(e.aspect).toBe('length')
        expect(e.message).toBe('Edge sequences differ in length: 2 / 1 / 2')
      }
    }
    expect(g.ne).toBe(0)
  })

  test('edges to missing vertices are rejected before insertion', () => {
    const g = new AttributedGraph<string, number>()
    g.addVertices(2, ['a', 'b'])
    expect(() => g.addEdges([0, 0], [1, 5], [1, 2])).toThrow(IndexOutOfRangeError)
    expect(g.ne).toBe(0)
    expect(() => g.addEdge(-1, 0)).toThrow('vertex -1 out of range [0, 2)')
  })

  test('node counts follow any insertion sequence', () => {
    fc.assert(fc.property(
      fc.array(fc.string(), { minLength: 1, maxLength: 20 }),
      fc.array(fc.tuple(fc.nat(), fc.nat()), { maxLength: 30 }),
      (labels, pairs) => {
        const g = new AttributedGraph<string, number>()
        const vs = g.addVertices(labels.length, labels)
        const n = labels.length
        const es = pairs.map(([s, t], i) => g.addEdge(s % n, t % n, i))
        return vs.length === n && g.nv === n && g.ne === pairs.length &&
          es.every((e, i) => e === i && g.edgeAttr(e) === i)
      },
    ))
  })
})

// ─── Incidence ──────────────────────────────────────────────────────────────

describe('AttributedGraph: incidence indexes', () => {
  test('outEdges and inEdges list incident edges in insertion order', () => {
    const g = new AttributedGraph<string, string>()
    g.addVertices(3, ['x', 'y', 'z'])
    g.addEdges([0, 1, 0, 2], [1, 2, 2, 2], ['f', 'g', 'h', 'loop'])
    expect(g.outEdges(0)).toEqual([0, 2])
    expect(g.inEdges(2)).toEqual([1, 2, 3])
    expect(g.outEdges(2)).toEqual([3])
    expect(g.inEdges(0)).toEqual([])
  })

  test('returned index lists are copies', () => {
    const g = new AttributedGraph<string, string>()
    g.addVertices(2, ['x', 'y'])
    g.addEdge(0, 1, 'f')
    g.outEdges(0).push(99)
    expect(g.outEdges(0)).toEqual([0])
  })

  test('src and tgt reject unknown edges', () => {
    const g = new AttributedGraph<string, string>()
    expect(() => g.src(0)).toThrow(IndexOutOfRangeError)
    expect(() => g.tgt(0)).toThrow('edge 0 out of range [0, 0)')
  })

  test('hasVertex and hasEdge accept only valid integer ids', () => {
    const g = new AttributedGraph<string, string>()
    g.addVertices(2, ['x', 'y'])
    g.addEdge(0, 1, 'f')
    expect([g.hasVertex(0), g.hasVertex(1), g.hasVertex(2), g.hasVertex(0.5), g.hasVertex(-1)])
      .toEqual([true, true, false, false, false])
    expect([g.hasEdge(0), g.hasEdge(1)]).toEqual([true, false])
  })
})

// ─── Attributes ─────────────────────────────────────────────────────────────

describe('AttributedGraph: attribute columns', () => {
  test('unbound attributes are reported, not defaulted', () => {
    const g = new AttributedGraph<string, string>({ vertex: 'ob', edge: 'hom' })
    const v = g.addVertex()
    const e = g.addEdge(v, v)
    expect(g.isVertexAttrBound(v)).toBe(false)
    expect(g.isEdgeAttrBound(e)).toBe(false)
    expect(() => g.vertexAttr(v)).toThrow(MissingAttributeError)
    expect(() => g.edgeAttr(e)).toThrow('Attribute hom is not bound for id 0')
  })

  test('falsy attribute values are still bound', () => {
    const g = new AttributedGraph<number, boolean>()
    const v = g.addVertex(0)
    const e = g.addEdge(v, v, false)
    expect(g.vertexAttr(v)).toBe(0)
    expect(g.edgeAttr(e)).toBe(false)
  })

  test('missing attribute error carries column and id', () => {
    const g = new AttributedGraph<string, string>({ vertex: 'ob', edge: 'hom' })
    g.addVertices(2)
    try {
      g.vertexAttr(1)
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(MissingAttributeError)
      if (e instanceof MissingAttributeError) {
        expect(e.column).toBe('ob')
        expect(e.id).toBe(1)
      }
    }
  })
})

describe('formatValue', () => {
  test('renders strings bare and other values as JSON', () => {
    expect(formatValue('A')).toBe('A')
    expect(formatValue({ size: 2 })).toBe('{"size":2}')
    expect(formatValue(undefined)).toBe('undefined')
  })

  test('falls back to String for unserializable values', () => {
    const cyclic: { self?: unknown } = {}
    cyclic.self = cyclic
    expect(formatValue(cyclic)).toBe('[object Object]')
  })
})
