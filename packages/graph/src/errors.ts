/**
 * Diagram error taxonomy.
 *
 * Every error here is a programming-logic failure raised at the call site that
 * attempted the malformed construction or access. None are retried.
 */

export type ShapeAspect = 'empty' | 'dom' | 'codom' | 'length'

export type IndexTarget = 'vertex' | 'edge' | 'hom'

/** Raised when a structural invariant (domain/codomain agreement, non-emptiness, parallel lengths) fails. */
export class ShapeMismatchError extends Error {
  constructor(
    message: string,
    public readonly shape: string,
    public readonly aspect: ShapeAspect,
    public readonly positions: readonly number[],
  ) {
    super(message)
    this.name = 'ShapeMismatchError'
  }
}

/** Raised by positional access outside `[0, length)`. */
export class IndexOutOfRangeError extends Error {
  constructor(
    public readonly target: IndexTarget,
    public readonly index: number,
    public readonly length: number,
  ) {
    super(`${target} ${index} out of range [0, ${length})`)
    this.name = 'IndexOutOfRangeError'
  }
}

/** Raised when reading an attribute that was never bound. */
export class MissingAttributeError extends Error {
  constructor(
    public readonly column: string,
    public readonly id: number,
  ) {
    super(`Attribute ${column} is not bound for id ${id}`)
    this.name = 'MissingAttributeError'
  }
}

/** Render an arbitrary object or morphism for an error message. */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    // cyclic or bigint-bearing values
    return String(value)
  }
}
