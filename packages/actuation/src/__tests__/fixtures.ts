import { vi } from 'vitest'
import { createLogger, createManualClock } from '@facegate/system'
import type { Recognition, ResultSet } from '@facegate/recognition'
import { createActuationController } from '@facegate/actuation'
import type {
  ActuationControllerOptions,
  ActuatorChannel,
  AlertChannel,
  AuditEntry,
  AuditLog,
} from '@facegate/actuation'

export const silentLogger = createLogger({ silent: true })

export const face = (identity: string, confidence: number): Recognition => ({
  box: { xMin: 100, yMin: 100, xMax: 200, yMax: 200 },
  result: { identity, confidence },
})

let nextSequence = 1

export const resultSet = (
  recognitions: Array<Recognition>,
  error: ResultSet['error'] = null,
): ResultSet => {
  const sequence = nextSequence++
  return {
    sequence,
    frame: {
      sequence,
      image: { data: Buffer.alloc(12), width: 2, height: 2, channels: 3 },
      capturedAt: sequence,
    },
    imageSize: { width: 640, height: 640 },
    recognitions,
    error,
    completedAt: sequence,
  }
}

export const T0 = 1_000_000

export const setupController = (
  overrides: Partial<Omit<ActuationControllerOptions, 'logger' | 'clock'>> = {},
) => {
  const clock = createManualClock(T0)
  const actuator = {
    send: vi.fn<ActuatorChannel['send']>(async () => {}),
    close: vi.fn<ActuatorChannel['close']>(async () => {}),
  }
  const alert = {
    send: vi.fn<AlertChannel['send']>(async () => {}),
  }
  const rows: Array<AuditEntry> = []
  const audit = {
    append: vi.fn<AuditLog['append']>(async (entry) => {
      rows.push(entry)
      return { ...entry, sequence: rows.length }
    }),
  }
  const encodeJpeg = vi.fn(async () => Buffer.from('photo'))

  const controller = createActuationController({
    actuator,
    alert,
    audit,
    encodeJpeg,
    logger: silentLogger,
    clock,
    ...overrides,
  })

  return { controller, clock, actuator, alert, audit, rows, encodeJpeg }
}
