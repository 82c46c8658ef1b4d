import type { Logger } from '@dagstore/utils/logger'
import type { DagError } from './errors'
import type { DagOptions, ResolvedDagOptions } from './options'
import type { EdgeEntry, NeighborEntry, NodeEntry, NodeId, RemovedNode } from './types'
import { createLogger } from '@dagstore/utils/logger'
import {
  duplicateEdgeError,
  duplicateNodeError,
  edgeNotFoundError,
  nodeNotFoundError,
  selfLoopError,
  wouldCycleError,
} from './errors'
import { DagOptionsSchema, IterationOrder } from './options'
import { compareNodeIds } from './order'

/**
 * Read-only surface of a graph. Safe to hand to code that must not mutate it.
 */
export interface DagView<Id extends NodeId = NodeId, N = void, E = void> {
  readonly nodeCount: number
  readonly edgeCount: number

  // ==================== Lookups ====================

  containsNode: (id: Id) => boolean
  containsEdge: (from: Id, to: Id) => boolean
  getNode: (id: Id) => N | undefined
  getEdge: (from: Id, to: Id) => E | undefined
  inDegree: (id: Id) => number
  outDegree: (id: Id) => number

  // ==================== Sequences ====================

  nodes: () => IterableIterator<NodeEntry<Id, N>>
  edges: () => IterableIterator<EdgeEntry<Id, E>>
  roots: () => IterableIterator<NodeEntry<Id, N>>
  leaves: () => IterableIterator<NodeEntry<Id, N>>
  children: (id: Id) => IterableIterator<NeighborEntry<Id, N, E>>
  parents: (id: Id) => IterableIterator<NeighborEntry<Id, N, E>>
}

// Shared by the source's outgoing map and the target's incoming map
interface EdgeCell<E> {
  data: E
}

interface NodeSlot<Id extends NodeId, N, E> {
  data: N
  outgoing: Map<Id, EdgeCell<E>>
  incoming: Map<Id, EdgeCell<E>>
}

function sameId(a: NodeId, b: NodeId): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b))
}

/**
 * Dag — in-memory directed acyclic graph.
 *
 * Stores nodes as (id, data) and edges as (source, target, data). Every
 * mutation either succeeds and leaves the graph acyclic, or throws a
 * `DagError` and leaves the graph exactly as it was.
 *
 * Nodes and edges never reference each other directly: each node slot holds
 * its payload plus maps from neighbour id to the connecting edge.
 *
 * @example
 * ```typescript
 * const dag = new Dag<number>()
 * dag.insertNode(2)
 * dag.insertNode(4)
 * dag.insertNode(3)
 * dag.insertEdge(2, 3)
 * dag.insertEdge(2, 4)
 * [...dag.roots()].map(n => n.id) // [2]
 * dag.insertEdge(3, 2) // throws DagError WOULD_CYCLE
 * ```
 */
export class Dag<Id extends NodeId = NodeId, N = void, E = void> implements DagView<Id, N, E> {
  private readonly slots = new Map<Id, NodeSlot<Id, N, E>>()
  private edgeTotal = 0
  private readonly options: ResolvedDagOptions
  private readonly log: Logger

  constructor(options: DagOptions = {}) {
    this.options = DagOptionsSchema.parse(options)
    this.log = createLogger(this.options.name)
  }

  get nodeCount(): number {
    return this.slots.size
  }

  get edgeCount(): number {
    return this.edgeTotal
  }

  getOptions(): ResolvedDagOptions {
    return { ...this.options }
  }

  // ==================== Node Operations ====================

  insertNode(id: Id, data: N): void {
    if (this.slots.has(id))
      throw this.reject(duplicateNodeError(id))
    this.slots.set(id, { data, outgoing: new Map(), incoming: new Map() })
  }

  /**
   * Remove a node together with every edge incident to it.
   * Outgoing edges are reported first, then incoming ones.
   */
  removeNode(id: Id): RemovedNode<Id, N, E> {
    const slot = this.slots.get(id)
    if (!slot)
      throw this.reject(nodeNotFoundError(id))

    const edges: Array<EdgeEntry<Id, E>> = []
    for (const [target, cell] of this.entries(slot.outgoing)) {
      this.slot(target).incoming.delete(id)
      edges.push({ source: id, target, data: cell.data })
    }
    for (const [source, cell] of this.entries(slot.incoming)) {
      this.slot(source).outgoing.delete(id)
      edges.push({ source, target: id, data: cell.data })
    }
    this.slots.delete(id)
    this.edgeTotal -= edges.length

    if (edges.length > 0)
      this.log.debug(`Removed node "${id}" and ${edges.length} incident edge(s)`)
    return { data: slot.data, edges }
  }

  /**
   * Replace a node's payload. Returns the previous payload.
   */
  updateNode(id: Id, data: N): N {
    const slot = this.slots.get(id)
    if (!slot)
      throw this.reject(nodeNotFoundError(id))
    const previous = slot.data
    slot.data = data
    return previous
  }

  containsNode(id: Id): boolean {
    return this.slots.has(id)
  }

  getNode(id: Id): N | undefined {
    return this.slots.get(id)?.data
  }

  inDegree(id: Id): number {
    const slot = this.slots.get(id)
    if (!slot)
      throw this.reject(nodeNotFoundError(id))
    return slot.incoming.size
  }

  outDegree(id: Id): number {
    const slot = this.slots.get(id)
    if (!slot)
      throw this.reject(nodeNotFoundError(id))
    return slot.outgoing.size
  }

  // ==================== Edge Operations ====================

  /**
   * Insert the edge `from -> to`.
   *
   * Checks run in a fixed order and the first failure is thrown:
   * SELF_LOOP, NODE_NOT_FOUND (`from`, then `to`), DUPLICATE_EDGE, WOULD_CYCLE.
   */
  insertEdge(from: Id, to: Id, data: E): void {
    if (sameId(from, to))
      throw this.reject(selfLoopError(from))
    const source = this.slots.get(from)
    if (!source)
      throw this.reject(nodeNotFoundError(from))
    const target = this.slots.get(to)
    if (!target)
      throw this.reject(nodeNotFoundError(to))
    if (source.outgoing.has(to))
      throw this.reject(duplicateEdgeError(from, to))
    if (this.reaches(to, from))
      throw this.reject(wouldCycleError(from, to))

    const cell: EdgeCell<E> = { data }
    source.outgoing.set(to, cell)
    target.incoming.set(from, cell)
    this.edgeTotal++
  }

  /**
   * Remove the edge `from -> to` and return its payload.
   */
  removeEdge(from: Id, to: Id): E {
    const source = this.slots.get(from)
    const cell = source?.outgoing.get(to)
    if (!source || !cell)
      throw this.reject(edgeNotFoundError(from, to))
    source.outgoing.delete(to)
    this.slot(to).incoming.delete(from)
    this.edgeTotal--
    return cell.data
  }

  /**
   * Replace an edge's payload. Returns the previous payload.
   */
  updateEdge(from: Id, to: Id, data: E): E {
    const cell = this.slots.get(from)?.outgoing.get(to)
    if (!cell)
      throw this.reject(edgeNotFoundError(from, to))
    const previous = cell.data
    cell.data = data
    return previous
  }

  containsEdge(from: Id, to: Id): boolean {
    return this.slots.get(from)?.outgoing.has(to) ?? false
  }

  getEdge(from: Id, to: Id): E | undefined {
    return this.slots.get(from)?.outgoing.get(to)?.data
  }

  // ==================== Sequences ====================

  * nodes(): IterableIterator<NodeEntry<Id, N>> {
    for (const [id, slot] of this.entries(this.slots))
      yield { id, data: slot.data }
  }

  * edges(): IterableIterator<EdgeEntry<Id, E>> {
    for (const [source, slot] of this.entries(this.slots)) {
      for (const [target, cell] of this.entries(slot.outgoing))
        yield { source, target, data: cell.data }
    }
  }

  /** Nodes without incoming edges */
  * roots(): IterableIterator<NodeEntry<Id, N>> {
    for (const [id, slot] of this.entries(this.slots)) {
      if (slot.incoming.size === 0)
        yield { id, data: slot.data }
    }
  }

  /** Nodes without outgoing edges */
  * leaves(): IterableIterator<NodeEntry<Id, N>> {
    for (const [id, slot] of this.entries(this.slots)) {
      if (slot.outgoing.size === 0)
        yield { id, data: slot.data }
    }
  }

  /**
   * Direct successors of `id`. Throws NODE_NOT_FOUND on call, not on iteration.
   */
  children(id: Id): IterableIterator<NeighborEntry<Id, N, E>> {
    const slot = this.slots.get(id)
    if (!slot)
      throw this.reject(nodeNotFoundError(id))
    return this.neighbors(slot.outgoing)
  }

  /**
   * Direct predecessors of `id`. Throws NODE_NOT_FOUND on call, not on iteration.
   */
  parents(id: Id): IterableIterator<NeighborEntry<Id, N, E>> {
    const slot = this.slots.get(id)
    if (!slot)
      throw this.reject(nodeNotFoundError(id))
    return this.neighbors(slot.incoming)
  }

  // ==================== Copy ====================

  /**
   * Structural copy with the same options. Payload values are shared.
   */
  clone(): Dag<Id, N, E> {
    const copy = new Dag<Id, N, E>(this.options)
    for (const [id, slot] of this.slots) {
      const outgoing = new Map<Id, EdgeCell<E>>()
      for (const [target, cell] of slot.outgoing)
        outgoing.set(target, { data: cell.data })
      copy.slots.set(id, { data: slot.data, outgoing, incoming: new Map() })
    }
    // Second pass keeps each incoming map in its original order
    for (const [id, slot] of this.slots) {
      const target = copy.slot(id)
      for (const source of slot.incoming.keys()) {
        const cell = copy.slot(source).outgoing.get(id)
        if (cell)
          target.incoming.set(source, cell)
      }
    }
    copy.edgeTotal = this.edgeTotal
    return copy
  }

  // ==================== Internals ====================

  /**
   * Depth-first search along outgoing edges: is `goal` reachable from `start`?
   */
  private reaches(start: Id, goal: Id): boolean {
    const visited = new Set<Id>()
    const stack: Id[] = [start]
    let current = stack.pop()
    while (current !== undefined) {
      if (sameId(current, goal))
        return true
      if (!visited.has(current)) {
        visited.add(current)
        for (const next of this.slot(current).outgoing.keys()) {
          if (!visited.has(next))
            stack.push(next)
        }
      }
      current = stack.pop()
    }
    return false
  }

  private* neighbors(links: Map<Id, EdgeCell<E>>): IterableIterator<NeighborEntry<Id, N, E>> {
    for (const [id, cell] of this.entries(links))
      yield { id, data: this.slot(id).data, edge: cell.data }
  }

  private entries<V>(map: Map<Id, V>): Iterable<[Id, V]> {
    if (this.options.order === IterationOrder.Insertion)
      return map
    return [...map].sort(([a], [b]) => compareNodeIds(a, b))
  }

  // Lookup for ids the invariants guarantee are present
  private slot(id: Id): NodeSlot<Id, N, E> {
    const slot = this.slots.get(id)
    if (!slot)
      throw nodeNotFoundError(id)
    return slot
  }

  private reject(err: DagError): DagError {
    this.log.debug(`Rejected: ${err.message}`)
    return err
  }
}
