/**
 * A small free category for tests: objects are names, morphisms are named
 * arrows between them.
 */

import fc from 'fast-check'
import { category } from '../core'

export interface Arrow {
  readonly name: string
  readonly from: string
  readonly to: string
}

export function arrow(name: string, from: string, to: string): Arrow {
  return { name, from, to }
}

export const Arrows = category<string, Arrow>({
  dom: (f) => f.from,
  codom: (f) => f.to,
})

export const objectArb = fc.constantFrom('A', 'B', 'C', 'D')

export const arrowArb = fc.record({
  name: fc.constantFrom('f', 'g', 'h', 'k'),
  from: objectArb,
  to: objectArb,
})

/** Arrows sharing the domain `from`. */
export function arrowsFrom(from: string, minLength = 1) {
  return fc.array(arrowArb.map((f) => ({ ...f, from })), { minLength, maxLength: 6 })
}

/** Arrows sharing the codomain `to`. */
export function arrowsInto(to: string, minLength = 1) {
  return fc.array(arrowArb.map((f) => ({ ...f, to })), { minLength, maxLength: 6 })
}
