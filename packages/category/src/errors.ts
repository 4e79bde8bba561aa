/**
 * Errors raised by diagram construction and access. The structural errors
 * live with the graph storage and are re-exported here.
 */

import type { ZodError } from 'zod'

export {
  ShapeMismatchError, IndexOutOfRangeError, MissingAttributeError,
  type ShapeAspect, type IndexTarget,
} from '@free-diagrams/graph'

/** Untyped input rejected by its schema. One `path: message` entry per issue. */
export class DiagramInputError extends Error {
  constructor(
    public readonly subject: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid ${subject}: ${issues.join('; ')}`)
    this.name = 'DiagramInputError'
  }

  static fromZod(subject: string, error: ZodError): DiagramInputError {
    return new DiagramInputError(
      subject,
      error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    )
  }
}
