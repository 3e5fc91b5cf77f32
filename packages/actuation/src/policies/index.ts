export * from './actuatorPolicy'
export * from './alertPolicy'
export * from './logPolicy'
