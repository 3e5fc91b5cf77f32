/**
 * Recognition Keywords
 *
 * Single source of truth for recognition constants: labels, statuses,
 * error kinds and the inference service's wire names.
 *
 * No magic strings anywhere else in the codebase.
 */

export const recognitionKeywords = {
  /**
   * Reserved identity for faces the service could not (or would not) name
   */
  labels: {
    unknown: 'Unknown',
  },

  /**
   * Audit row status
   */
  status: {
    recognized: 'Recognized',
    unknown: 'Unknown',
  },

  errorKinds: {
    networkTimeout: 'NetworkTimeout',
    networkUnreachable: 'NetworkUnreachable',
    malformedResponse: 'MalformedResponse',
    emptyFrame: 'EmptyFrame',
    encodeFailure: 'EncodeFailure',
    frameSourceClosed: 'FrameSourceClosed',
  },

  /**
   * Paths under `<baseUrl>/v1/`
   */
  endpoints: {
    detect: 'vision/face',
    recognize: 'vision/face/recognize',
    register: 'vision/face/register',
  },

  /**
   * Multipart field names
   */
  fields: {
    image: 'image',
    minConfidence: 'min_confidence',
    userId: 'userid',
  },

  /**
   * The service reports unmatched faces under this user id (any case)
   */
  serviceUnknownUserId: 'unknown',
} as const

// ============================================================================
// Type Exports
// ============================================================================

export type ErrorKind =
  (typeof recognitionKeywords.errorKinds)[keyof typeof recognitionKeywords.errorKinds]

export type RecognitionStatus =
  (typeof recognitionKeywords.status)[keyof typeof recognitionKeywords.status]

export type InferenceEndpoint =
  (typeof recognitionKeywords.endpoints)[keyof typeof recognitionKeywords.endpoints]
