// Graph store
export { Dag } from './dag'
export type { DagView } from './dag'

// Errors
export {
  DagError,
  DagErrorCode,
  duplicateEdgeError,
  duplicateNodeError,
  edgeNotFoundError,
  isDagError,
  nodeNotFoundError,
  selfLoopError,
  wouldCycleError,
} from './errors'

// Options and ordering
export { DagOptionsSchema, IterationOrder } from './options'
export type { DagOptions, ResolvedDagOptions } from './options'
export { compareNodeIds } from './order'

export type { EdgeEntry, NeighborEntry, NodeEntry, NodeId, RemovedNode } from './types'
