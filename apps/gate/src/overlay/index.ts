export * from './overlayCanvas'
export * from './types'
export * from './tasks/createTimestampTask'
export * from './tasks/createFaceBoxesTask'
export * from './tasks/createErrorBannerTask'
export * from './tasks/createStatusTask'
export * from './tasks/createEnrollmentStatusTask'
export * from './presets'
