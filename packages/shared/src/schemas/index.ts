export {
  vertexIndexSchema,
  edgeTripleSchema,
  freeDiagramInputSchema,
} from './diagram'

export {
  finSetSchema,
  finFunctionSchema,
} from './fin-sets'
