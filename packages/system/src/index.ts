/**
 * @facegate/system
 *
 * Generic runtime pieces for the recognition pipeline. Nothing in here
 * knows about faces, cameras or side effects.
 *
 * ## Modules
 *
 * ### State
 * Subscriptions and atoms with atomic reference replace.
 *
 * ### Render Loop
 * Cooperative frame loop with async hooks and a pluggable scheduler.
 *
 * ### Task Pipeline
 * Ordered per-frame tasks with isolated error handling.
 *
 * ### Concurrency
 * Latest-wins frame handoff, bounded task groups, mutex.
 *
 * ### Logging
 * winston logger with per-component children.
 *
 * @example
 * ```ts
 * import { createFrameHandoff, createAtom } from '@facegate/system'
 *
 * const handoff = createFrameHandoff<Frame>()
 * handoff.offer(frame)              // never blocks
 * const next = await handoff.take(100) // newest frame or null
 *
 * const latest = createAtom<ResultSet | null>(null)
 * latest.subscribe((set) => console.log(set?.sequence))
 * ```
 */

// ============================================================================
// State
// ============================================================================

export * from './state'

// ============================================================================
// Loops and Pipelines
// ============================================================================

export * from './renderLoop'
export * from './taskPipeline'

// ============================================================================
// Concurrency
// ============================================================================

export * from './frameHandoff'
export * from './taskGroup'
export * from './mutex'
export * from './clock'

// ============================================================================
// Logging
// ============================================================================

export * from './logger'
