import { recognitionKeywords } from './vocabulary/keywords'
import type { RecognitionCandidate, RecognitionResult } from './vocabulary/schemas'

const { labels, status, serviceUnknownUserId } = recognitionKeywords

export const unknownResult = (confidence = 0): RecognitionResult => ({
  identity: labels.unknown,
  confidence,
})

/**
 * Label a face from the service's ranked candidates.
 *
 * Only the top candidate counts. It names the face when its user id is
 * non-empty, is not the service's own "unknown", and meets `minConfidence`.
 */
export function labelCandidates(
  candidates: ReadonlyArray<RecognitionCandidate>,
  minConfidence: number,
): RecognitionResult {
  const [top] = candidates
  if (!top) return unknownResult(0)

  const named =
    top.userId !== '' &&
    top.userId.toLowerCase() !== serviceUnknownUserId &&
    top.confidence >= minConfidence

  return named
    ? { identity: top.userId, confidence: top.confidence }
    : unknownResult(top.confidence)
}

export const isKnown = (result: RecognitionResult) =>
  result.identity !== labels.unknown

export const statusOf = (result: RecognitionResult) =>
  isKnown(result) ? status.recognized : status.unknown

/**
 * Overlay caption: `Amy (0.92)` or `Unknown`
 */
export const formatLabel = (result: RecognitionResult) =>
  isKnown(result)
    ? `${result.identity} (${result.confidence.toFixed(2)})`
    : labels.unknown
