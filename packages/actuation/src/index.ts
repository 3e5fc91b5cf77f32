/**
 * @facegate/actuation
 *
 * Side effects driven by recognition results: the actuator signal, the
 * alert photo and the audit log, each behind its own debounce policy.
 */

export * from './keywords'
export * from './errors'
export * from './policies'
export * from './channels'
export * from './audit'
export * from './actuationController'
