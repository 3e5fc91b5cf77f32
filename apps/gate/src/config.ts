/**
 * Gate Configuration
 *
 * Read once at startup from FACEGATE_* environment variables. Every value
 * has a default except the Telegram credentials; without them alerts are
 * disabled. Invalid values fail startup with a ZodError.
 */

import { z } from 'zod'

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : null))

export const gateEnvSchema = z.object({
  FACEGATE_SOURCE_URL: z.string().min(1).default('rtsp://127.0.0.1:8554/feeder'),
  FACEGATE_FRAME_SIZE: z.coerce.number().int().min(64).default(640),
  FACEGATE_SQUARE_CROP: booleanString.default('true'),
  FACEGATE_OFFER_EVERY: z.coerce.number().int().min(1).default(2),

  FACEGATE_INFERENCE_URL: z.string().url().default('http://localhost:32168'),
  FACEGATE_DETECT_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  FACEGATE_RECOGNIZE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  FACEGATE_REGISTER_TIMEOUT_MS: z.coerce.number().int().positive().default(2500),
  FACEGATE_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),
  FACEGATE_CROP_PADDING: z.coerce.number().int().min(0).default(20),
  FACEGATE_MIN_CROP_WIDTH: z.coerce.number().int().min(1).default(40),
  FACEGATE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(100),

  FACEGATE_ACTUATOR_HOST: z.string().min(1).default('127.0.0.1'),
  FACEGATE_ACTUATOR_PORT: z.coerce.number().int().min(1).max(65535).default(5005),

  FACEGATE_TELEGRAM_TOKEN: optionalString,
  FACEGATE_TELEGRAM_CHAT_ID: optionalString,
  FACEGATE_ALERT_COOLDOWN_MS: z.coerce.number().int().min(0).default(15_000),
  FACEGATE_ALERT_ON: z.enum(['unknown', 'recognized', 'any']).default('unknown'),

  FACEGATE_LOG_COOLDOWN_MS: z.coerce.number().int().min(0).default(3000),
  FACEGATE_AUDIT_PATH: z.string().min(1).default('recognition_log.csv'),
  FACEGATE_IMAGES_DIR: z.string().min(1).default('images'),

  FACEGATE_DISPLAY: z.enum(['ffplay', 'headless']).default('ffplay'),
  FACEGATE_DISPLAY_SIZE: z.coerce.number().int().min(64).default(800),
  FACEGATE_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  FACEGATE_REJECT_STALE: booleanString.default('false'),
})

/**
 * Typed configuration shared by every resource
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env) => {
  const parsed = gateEnvSchema.parse(env)

  return {
    source: {
      url: parsed.FACEGATE_SOURCE_URL,
      frameSize: parsed.FACEGATE_FRAME_SIZE,
      squareCrop: parsed.FACEGATE_SQUARE_CROP,
      offerEvery: parsed.FACEGATE_OFFER_EVERY,
    },
    inference: {
      baseUrl: parsed.FACEGATE_INFERENCE_URL,
      detectTimeoutMs: parsed.FACEGATE_DETECT_TIMEOUT_MS,
      recognizeTimeoutMs: parsed.FACEGATE_RECOGNIZE_TIMEOUT_MS,
      registerTimeoutMs: parsed.FACEGATE_REGISTER_TIMEOUT_MS,
      minConfidence: parsed.FACEGATE_MIN_CONFIDENCE,
      padding: parsed.FACEGATE_CROP_PADDING,
      minCropWidth: parsed.FACEGATE_MIN_CROP_WIDTH,
      pollIntervalMs: parsed.FACEGATE_POLL_INTERVAL_MS,
    },
    actuator: {
      host: parsed.FACEGATE_ACTUATOR_HOST,
      port: parsed.FACEGATE_ACTUATOR_PORT,
    },
    alert: {
      telegram:
        parsed.FACEGATE_TELEGRAM_TOKEN && parsed.FACEGATE_TELEGRAM_CHAT_ID
          ? { token: parsed.FACEGATE_TELEGRAM_TOKEN, chatId: parsed.FACEGATE_TELEGRAM_CHAT_ID }
          : null,
      cooldownMs: parsed.FACEGATE_ALERT_COOLDOWN_MS,
      on: parsed.FACEGATE_ALERT_ON,
    },
    audit: {
      path: parsed.FACEGATE_AUDIT_PATH,
      cooldownMs: parsed.FACEGATE_LOG_COOLDOWN_MS,
      imagesDir: parsed.FACEGATE_IMAGES_DIR,
    },
    display: {
      mode: parsed.FACEGATE_DISPLAY,
      size: parsed.FACEGATE_DISPLAY_SIZE,
    },
    logLevel: parsed.FACEGATE_LOG_LEVEL,
    rejectStale: parsed.FACEGATE_REJECT_STALE,
  }
}

export type GateConfig = ReturnType<typeof loadConfig>
