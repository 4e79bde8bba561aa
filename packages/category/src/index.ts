/**
 * @free-diagrams/category: Free Diagrams in a Category
 *
 * Finite, freely generated diagrams: the input shapes of limits and colimits.
 *
 *   Fixed shapes     multispan / span          (colimit: pushout)
 *                    multicospan / cospan      (limit: pullback)
 *                    parallel morphisms / pair (limit: equalizer, colimit: coequalizer)
 *   General shape    FreeDiagram, an attributed multigraph of objects and morphisms
 *   Conversions      fixed shape → FreeDiagram, in a fixed vertex/edge order
 *   Open networks    decorated cospans
 */

// ─── Category Capability ────────────────────────────────────────────────────
export {
  type Category, type CategoryOps,
  category, structuralEquals, mismatches, frozenCopy,
} from './core'

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  ShapeMismatchError, IndexOutOfRangeError, MissingAttributeError,
  DiagramInputError,
  type ShapeAspect, type IndexTarget,
} from './errors'

// ─── Fixed Shapes ───────────────────────────────────────────────────────────
export {
  Multispan, type Span,
  multispan, span, isSpan,
} from './multispan'

export {
  Multicospan, type Cospan,
  multicospan, cospan, isCospan,
} from './multicospan'

export {
  ParallelMorphisms, type ParallelPair,
  parallelMorphisms, parallelPair, isParallelPair,
} from './parallel-morphisms'

export {
  type FixedFreeDiagram,
  left, right, shapeMorphisms,
} from './shapes'

// ─── General Shape ──────────────────────────────────────────────────────────
export {
  FreeDiagram, type EdgeTriple,
  freeDiagram, discreteDiagram,
} from './free-diagram'

export {
  type DiagramSchemas,
  parseFreeDiagram,
} from './input'

// ─── Conversions ────────────────────────────────────────────────────────────
export {
  multispanToDiagram, multicospanToDiagram, parallelToDiagram,
  toFreeDiagram,
} from './conversions'

// ─── Equality ───────────────────────────────────────────────────────────────
export {
  seqEquals, shapeEquals, diagramEquals,
} from './equality'

// ─── Decorated Cospans ──────────────────────────────────────────────────────
export {
  type AbstractFunctor, type AbstractLaxator, type LaxMonoidalFunctor,
  capability, laxMonoidalFunctor,
} from './functor'

export {
  DecoratedCospan, decoratedCospan,
} from './decorated-cospan'

// ─── Finite Sets ────────────────────────────────────────────────────────────
export {
  type FinSet, type FinFunction,
  finSet, finFunction, identityFinFunction, composeFinFunctions,
  finSetCategory,
} from './fin-sets'

// ─── Diagnostics ────────────────────────────────────────────────────────────
export {
  type TraceEvent, type TraceFields,
  trace,
} from './diagnostics'
