/**
 * Free diagrams from untyped data (parsed JSON, fixtures, RPC payloads).
 *
 * The payload is validated against `freeDiagramInputSchema`, then handed to
 * the bulk constructor, which checks index range and the dom/codom invariant.
 */

import type { z } from 'zod'
import { freeDiagramInputSchema } from '@free-diagrams/shared'
import type { Category } from './core'
import { DiagramInputError } from './errors'
import type { FreeDiagram } from './free-diagram'
import { freeDiagram } from './free-diagram'

export interface DiagramSchemas<Ob, Hom> {
  readonly ob: z.ZodType<Ob, z.ZodTypeDef, unknown>
  readonly hom: z.ZodType<Hom, z.ZodTypeDef, unknown>
}

export function parseFreeDiagram<Ob, Hom>(
  C: Category<Ob, Hom>,
  input: unknown,
  schemas: DiagramSchemas<Ob, Hom>,
): FreeDiagram<Ob, Hom> {
  const result = freeDiagramInputSchema(schemas.ob, schemas.hom).safeParse(input)
  if (!result.success) throw DiagramInputError.fromZod('free diagram', result.error)
  return freeDiagram(C, result.data.obs, result.data.homs)
}
