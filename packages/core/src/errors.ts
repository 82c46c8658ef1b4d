import type { NodeId } from './types'

/**
 * Error codes for rejected graph operations
 */
export const DagErrorCode = {
  DUPLICATE_NODE: 'DUPLICATE_NODE',
  NODE_NOT_FOUND: 'NODE_NOT_FOUND',
  EDGE_NOT_FOUND: 'EDGE_NOT_FOUND',
  SELF_LOOP: 'SELF_LOOP',
  DUPLICATE_EDGE: 'DUPLICATE_EDGE',
  WOULD_CYCLE: 'WOULD_CYCLE',
} as const

export type DagErrorCode = (typeof DagErrorCode)[keyof typeof DagErrorCode]

/**
 * Raised when an operation would break a graph invariant.
 * The graph is unchanged whenever one of these is thrown.
 */
export class DagError extends Error {
  constructor(
    public readonly code: DagErrorCode,
    message: string,
    /** The offending node id, or the `[from, to]` pair of an edge */
    public readonly nodeIds: readonly NodeId[],
  ) {
    super(message)
    this.name = 'DagError'
  }
}

export function isDagError(err: unknown, code?: DagErrorCode): err is DagError {
  return err instanceof DagError && (code === undefined || err.code === code)
}

export function duplicateNodeError(id: NodeId): DagError {
  return new DagError(DagErrorCode.DUPLICATE_NODE, `Node "${id}" already exists`, [id])
}

export function nodeNotFoundError(id: NodeId): DagError {
  return new DagError(DagErrorCode.NODE_NOT_FOUND, `Node "${id}" not found`, [id])
}

export function edgeNotFoundError(from: NodeId, to: NodeId): DagError {
  return new DagError(DagErrorCode.EDGE_NOT_FOUND, `Edge "${from}" -> "${to}" not found`, [from, to])
}

export function selfLoopError(id: NodeId): DagError {
  return new DagError(DagErrorCode.SELF_LOOP, `Edge "${id}" -> "${id}" is a self-loop`, [id, id])
}

export function duplicateEdgeError(from: NodeId, to: NodeId): DagError {
  return new DagError(DagErrorCode.DUPLICATE_EDGE, `Edge "${from}" -> "${to}" already exists`, [from, to])
}

/**
 * `from` is already reachable from `to`, so the edge would close a cycle
 */
export function wouldCycleError(from: NodeId, to: NodeId): DagError {
  return new DagError(
    DagErrorCode.WOULD_CYCLE,
    `Edge "${from}" -> "${to}" would create a cycle`,
    [from, to],
  )
}
