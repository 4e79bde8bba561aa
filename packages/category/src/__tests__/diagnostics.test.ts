/**
 * Construction tracing: JSON lines on stdout, gated by runtime flags.
 */

import { describe, test, expect, vi, afterEach, beforeEach } from 'vitest'
import { clearAllFlagOverrides, setFlagOverride } from '@free-diagrams/config'
import { multispan, span } from '../multispan'
import { freeDiagram } from '../free-diagram'
import { Arrows, arrow } from './fixtures'

const f = arrow('f', 'A', 'B')
const g = arrow('g', 'A', 'C')
const h = arrow('h', 'X', 'C')

function silenceStdout() {
  return vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
}

let write: ReturnType<typeof silenceStdout>

function lines(): Record<string, unknown>[] {
  return write.mock.calls.map((call): Record<string, unknown> => JSON.parse(String(call[0])))
}

beforeEach(() => {
  clearAllFlagOverrides()
  write = silenceStdout()
})

afterEach(() => {
  write.mockRestore()
  clearAllFlagOverrides()
  vi.unstubAllEnvs()
})

describe('trace', () => {
  test('is silent by default', () => {
    span(Arrows, f, g)
    expect(() => span(Arrows, f, h)).toThrow()
    expect(write).not.toHaveBeenCalled()
  })

  test('TRACE_CONSTRUCTION logs built shapes', () => {
    setFlagOverride('TRACE_CONSTRUCTION', true)
    multispan(Arrows, [f, g, f])
    const [entry] = lines()
    expect(entry).toMatchObject({ event: 'shape.built', shape: 'multispan', legs: 3 })
    expect(typeof entry.ts).toBe('string')
  })

  test('TRACE_FAILURES logs rejections with their positions', () => {
    setFlagOverride('TRACE_FAILURES', true)
    expect(() => multispan(Arrows, [f, h, g, h])).toThrow()
    expect(lines()).toEqual([
      expect.objectContaining({ event: 'shape.rejected', shape: 'multispan', aspect: 'dom', positions: [1, 3] }),
    ])
  })

  test('diagram rejections carry their own event', () => {
    setFlagOverride('TRACE_FAILURES', true)
    expect(() => freeDiagram(Arrows, ['A', 'C'], [[0, 1, f]])).toThrow()
    expect(lines()).toEqual([
      expect.objectContaining({ event: 'diagram.rejected', shape: 'free-diagram', aspect: 'codom', positions: [0] }),
    ])
  })

  test('the two flags are independent', () => {
    setFlagOverride('TRACE_FAILURES', true)
    span(Arrows, f, g)
    expect(write).not.toHaveBeenCalled()
  })

  test('flags can be switched on from the environment', () => {
    vi.stubEnv('FREE_DIAGRAMS_TRACE_CONSTRUCTION', '1')
    freeDiagram(Arrows, ['A', 'B'], [[0, 1, f]])
    expect(lines()).toEqual([
      expect.objectContaining({ event: 'diagram.built', shape: 'free-diagram', nv: 2, ne: 1 }),
    ])
  })
})
