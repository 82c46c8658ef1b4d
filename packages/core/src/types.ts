/**
 * Node identifier. Compared with SameValueZero, like Map keys.
 */
export type NodeId = string | number

/** A node and its payload */
export interface NodeEntry<Id extends NodeId, N> {
  id: Id
  data: N
}

/** A directed edge and its payload */
export interface EdgeEntry<Id extends NodeId, E> {
  source: Id
  target: Id
  data: E
}

/**
 * A direct neighbour: its id and payload, plus the payload of the edge
 * connecting it to the node that was queried
 */
export interface NeighborEntry<Id extends NodeId, N, E> {
  id: Id
  data: N
  edge: E
}

/**
 * Result of removing a node: its payload and every edge removed with it
 */
export interface RemovedNode<Id extends NodeId, N, E> {
  data: N
  edges: Array<EdgeEntry<Id, E>>
}
