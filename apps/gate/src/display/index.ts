export * from './types'
export * from './ffplayDisplay'
export * from './headlessDisplay'
