export * from './types'
export * from './udpActuator'
export * from './telegramAlert'
