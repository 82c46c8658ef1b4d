import type { NodeId } from './types'

/**
 * Total order over node ids: numbers ascending, then strings by code unit.
 */
export function compareNodeIds(a: NodeId, b: NodeId): number {
  if (typeof a === 'number' && typeof b === 'number')
    return a < b ? -1 : a > b ? 1 : 0
  if (typeof a === 'number')
    return -1
  if (typeof b === 'number')
    return 1
  return a < b ? -1 : a > b ? 1 : 0
}
