import { z } from 'zod'

/** A vertex position in an object list. Range is checked against the list by the diagram builder. */
export const vertexIndexSchema = z.number().int('Vertex index must be an integer').min(0, 'Vertex index must be non-negative')

/** `[sourceIndex, targetIndex, morphism]` */
export function edgeTripleSchema<H extends z.ZodTypeAny>(hom: H) {
  return z.tuple([vertexIndexSchema, vertexIndexSchema, hom])
}

/** Untyped description of a free diagram: an object list plus edge triples. */
export function freeDiagramInputSchema<O extends z.ZodTypeAny, H extends z.ZodTypeAny>(ob: O, hom: H) {
  return z.object({
    obs: z.array(ob),
    homs: z.array(edgeTripleSchema(hom)),
  })
}
