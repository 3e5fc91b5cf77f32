/**
 * UDP Actuator
 *
 * Fire-and-forget datagrams (`ON` / `OFF`) to a fixed host and port.
 * At most once; nothing is acknowledged or retried.
 */

import dgram from 'node:dgram'
import { errorMeta } from '@facegate/system'
import type { Logger } from '@facegate/system'
import { ChannelError } from '../errors'
import type { ActuatorChannel } from './types'

export type UdpActuatorOptions = {
  host: string
  port: number
  logger: Logger
  createSocket?: () => dgram.Socket
}

export function createUdpActuator(options: UdpActuatorOptions): ActuatorChannel {
  const { host, port, logger, createSocket = () => dgram.createSocket('udp4') } = options
  const socket = createSocket()
  let closed = false

  // The implicit bind on first send reports failures here, not to the send callback
  socket.on('error', (error: Error) => {
    logger.error('Actuator socket error', errorMeta(error))
  })

  return {
    send: (command) =>
      new Promise<void>((resolve, reject) => {
        if (closed) {
          reject(new ChannelError('UdpActuator', 'socket closed'))
          return
        }
        socket.send(Buffer.from(command, 'utf8'), port, host, (error) => {
          if (error) {
            reject(new ChannelError('UdpActuator', `send ${command} failed: ${error.message}`, { cause: error }))
            return
          }
          resolve()
        })
      }),

    close: () =>
      new Promise<void>((resolve) => {
        if (closed) {
          resolve()
          return
        }
        closed = true
        socket.close(() => resolve())
      }),
  }
}
