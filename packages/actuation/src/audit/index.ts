export * from './types'
export * from './csvAuditLog'
