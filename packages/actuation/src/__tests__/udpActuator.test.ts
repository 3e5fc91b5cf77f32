import dgram from 'node:dgram'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ChannelError, createUdpActuator } from '@facegate/actuation'
import { silentLogger } from './fixtures'

describe('createUdpActuator', () => {
  let receiver: dgram.Socket
  let port: number

  beforeEach(async () => {
    receiver = dgram.createSocket('udp4')
    await new Promise<void>((resolve) => {
      receiver.bind(0, '127.0.0.1', () => resolve())
    })
    port = receiver.address().port
  })

  afterEach(async () => {
    await new Promise<void>((resolve) => {
      receiver.close(() => resolve())
    })
  })

  it('should deliver the command as a datagram', async () => {
    const received = new Promise<string>((resolve) => {
      receiver.once('message', (message) => resolve(message.toString('utf8')))
    })
    const actuator = createUdpActuator({ host: '127.0.0.1', port, logger: silentLogger })

    await actuator.send('ON')

    expect(await received).toBe('ON')
    await actuator.close()
  })

  it('should refuse to send after close', async () => {
    const actuator = createUdpActuator({ host: '127.0.0.1', port, logger: silentLogger })
    await actuator.close()
    await actuator.close()

    await expect(actuator.send('OFF')).rejects.toBeInstanceOf(ChannelError)
  })

  it('should log socket errors instead of crashing', async () => {
    const socket = dgram.createSocket('udp4')
    const logError = vi.spyOn(silentLogger, 'error')
    const actuator = createUdpActuator({
      host: '127.0.0.1',
      port,
      logger: silentLogger,
      createSocket: () => socket,
    })

    socket.emit('error', new Error('bind EADDRINUSE'))

    expect(logError).toHaveBeenCalledWith('Actuator socket error', {
      error: 'bind EADDRINUSE',
      name: 'Error',
    })
    logError.mockRestore()
    await actuator.close()
  })
})
