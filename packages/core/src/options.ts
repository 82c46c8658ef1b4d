import { z } from 'zod/v4'

/**
 * Iteration order of every sequence a graph yields
 */
export const IterationOrder = {
  /** Nodes and edges in the order they were inserted */
  Insertion: 'insertion',
  /** Ids sorted with `compareNodeIds` */
  Sorted: 'sorted',
} as const

export type IterationOrder = (typeof IterationOrder)[keyof typeof IterationOrder]

export const DagOptionsSchema = z.object({
  /** Logger tag */
  name: z.string().min(1).default('dag'),
  order: z.enum(['insertion', 'sorted']).default('insertion'),
})

/** Options as accepted by the constructor (every field optional) */
export type DagOptions = z.input<typeof DagOptionsSchema>

/** Options after defaults are applied */
export type ResolvedDagOptions = z.output<typeof DagOptionsSchema>
