/**
 * @facegate/recognition
 *
 * Everything between a captured frame and a published ResultSet:
 * the remote face service client, pixel codec, labelling rules,
 * the latest-result cache and the inference worker that drives them.
 */

// ============================================================================
// Vocabulary
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Errors
// ============================================================================

export * from './errors'

// ============================================================================
// Pure helpers
// ============================================================================

export * from './geometry'
export * from './labelling'

// ============================================================================
// Adapters
// ============================================================================

export * from './codec'
export * from './inferenceClient'

// ============================================================================
// Pipeline
// ============================================================================

export * from './resultCache'
export * from './inferenceWorker'
export * from './enrollment'
