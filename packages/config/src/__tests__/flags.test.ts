import { describe, it, expect, afterEach, vi } from 'vitest'
import {
  resolveFlag, resolveFlags, setFlagOverride, clearFlagOverride,
  clearAllFlagOverrides, readOverrides, DEFAULT_FLAGS, FLAG_KEYS,
} from '../index'

afterEach(() => {
  clearAllFlagOverrides()
  vi.unstubAllEnvs()
})

describe('resolveFlag', () => {
  it('falls back to defaults', () => {
    vi.stubEnv('FREE_DIAGRAMS_TRACE_FAILURES', '')
    expect(resolveFlag('TRACE_FAILURES')).toBe(DEFAULT_FLAGS.TRACE_FAILURES)
  })

  it('reads true/1 and false/0 from the environment', () => {
    vi.stubEnv('FREE_DIAGRAMS_TRACE_CONSTRUCTION', '1')
    expect(resolveFlag('TRACE_CONSTRUCTION')).toBe(true)
    vi.stubEnv('FREE_DIAGRAMS_TRACE_CONSTRUCTION', 'false')
    expect(resolveFlag('TRACE_CONSTRUCTION')).toBe(false)
  })

  it('ignores unrecognised environment values', () => {
    vi.stubEnv('FREE_DIAGRAMS_TRACE_CONSTRUCTION', 'yes')
    expect(resolveFlag('TRACE_CONSTRUCTION')).toBe(false)
  })

  it('prefers an in-process override over the environment', () => {
    vi.stubEnv('FREE_DIAGRAMS_TRACE_FAILURES', 'true')
    setFlagOverride('TRACE_FAILURES', false)
    expect(resolveFlag('TRACE_FAILURES')).toBe(false)
    clearFlagOverride('TRACE_FAILURES')
    expect(resolveFlag('TRACE_FAILURES')).toBe(true)
  })
})

describe('overrides', () => {
  it('clearAllFlagOverrides removes every override', () => {
    setFlagOverride('TRACE_CONSTRUCTION', true)
    setFlagOverride('TRACE_FAILURES', true)
    expect(readOverrides()).toEqual({ TRACE_CONSTRUCTION: true, TRACE_FAILURES: true })
    clearAllFlagOverrides()
    expect(readOverrides()).toEqual({})
  })

  it('resolveFlags covers every key', () => {
    setFlagOverride('TRACE_CONSTRUCTION', true)
    setFlagOverride('TRACE_FAILURES', false)
    const flags = resolveFlags()
    expect(Object.keys(flags).sort()).toEqual([...FLAG_KEYS].sort())
    expect(flags).toEqual({ TRACE_CONSTRUCTION: true, TRACE_FAILURES: false })
  })
})
