import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { loadConfig } from '../config'

describe('loadConfig', () => {
  it('should fill every default from an empty environment', () => {
    const config = loadConfig({})

    expect(config.source).toEqual({
      url: 'rtsp://127.0.0.1:8554/feeder',
      frameSize: 640,
      squareCrop: true,
      offerEvery: 2,
    })
    expect(config.inference.baseUrl).toBe('http://localhost:32168')
    expect(config.inference.minConfidence).toBe(0.6)
    expect(config.inference.registerTimeoutMs).toBe(2500)
    expect(config.actuator).toEqual({ host: '127.0.0.1', port: 5005 })
    expect(config.alert).toEqual({ telegram: null, cooldownMs: 15_000, on: 'unknown' })
    expect(config.audit).toEqual({
      path: 'recognition_log.csv',
      cooldownMs: 3000,
      imagesDir: 'images',
    })
    expect(config.display).toEqual({ mode: 'ffplay', size: 800 })
    expect(config.logLevel).toBe('info')
    expect(config.rejectStale).toBe(false)
  })

  it('should coerce numbers and boolean strings', () => {
    const config = loadConfig({
      FACEGATE_FRAME_SIZE: '480',
      FACEGATE_SQUARE_CROP: 'no',
      FACEGATE_ACTUATOR_PORT: '6000',
      FACEGATE_MIN_CONFIDENCE: '0.75',
      FACEGATE_REJECT_STALE: '1',
    })

    expect(config.source.frameSize).toBe(480)
    expect(config.source.squareCrop).toBe(false)
    expect(config.actuator.port).toBe(6000)
    expect(config.inference.minConfidence).toBe(0.75)
    expect(config.rejectStale).toBe(true)
  })

  it('should enable Telegram only when token and chat id are both set', () => {
    expect(
      loadConfig({
        FACEGATE_TELEGRAM_TOKEN: 'test-token',
        FACEGATE_TELEGRAM_CHAT_ID: 'test-chat',
      }).alert.telegram,
    ).toEqual({ token: 'test-token', chatId: 'test-chat' })

    expect(loadConfig({ FACEGATE_TELEGRAM_TOKEN: 'test-token' }).alert.telegram).toBeNull()
    expect(
      loadConfig({ FACEGATE_TELEGRAM_TOKEN: '  ', FACEGATE_TELEGRAM_CHAT_ID: 'test-chat' }).alert
        .telegram,
    ).toBeNull()
  })

  it('should reject out-of-range values', () => {
    expect(() => loadConfig({ FACEGATE_MIN_CONFIDENCE: '1.5' })).toThrow(ZodError)
    expect(() => loadConfig({ FACEGATE_ACTUATOR_PORT: '70000' })).toThrow(ZodError)
    expect(() => loadConfig({ FACEGATE_DISPLAY: 'window' })).toThrow(ZodError)
    expect(() => loadConfig({ FACEGATE_SQUARE_CROP: 'maybe' })).toThrow(ZodError)
  })
})
