/**
 * @free-diagrams/graph: attributed directed multigraph storage.
 *
 * Dense-id arenas for vertices and edges with one attribute column each,
 * plus the error taxonomy shared by every diagram package.
 */

export {
  type ColumnNames,
  AttributedGraph,
} from './attributed-graph'

export {
  type ShapeAspect, type IndexTarget,
  ShapeMismatchError, IndexOutOfRangeError, MissingAttributeError,
  formatValue,
} from './errors'
