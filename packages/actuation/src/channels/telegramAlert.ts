/**
 * Telegram Alert
 *
 * Sends the alert frame with `sendPhoto`. Best effort: one attempt,
 * bounded by `timeoutMs`.
 */

import { z } from 'zod'
import { ChannelError } from '../errors'
import type { AlertChannel } from './types'

export type TelegramAlertOptions = {
  token: string
  chatId: string
  timeoutMs?: number
  apiBase?: string
  fetchFn?: typeof fetch
}

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
})

export function createTelegramAlert(options: TelegramAlertOptions): AlertChannel {
  const {
    token,
    chatId,
    timeoutMs = 10_000,
    apiBase = 'https://api.telegram.org',
    fetchFn = fetch,
  } = options

  const url = `${apiBase}/bot${token}/sendPhoto`

  return {
    send: async (photo, caption) => {
      const form = new FormData()
      form.append('chat_id', chatId)
      form.append('caption', caption)
      form.append('photo', new Blob([photo], { type: 'image/jpeg' }), 'alert.jpg')

      let body: unknown
      try {
        const response = await fetchFn(url, {
          method: 'POST',
          body: form,
          signal: AbortSignal.timeout(timeoutMs),
        })
        body = await response.json()
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        throw new ChannelError('TelegramAlert', `sendPhoto failed: ${message}`, { cause: error })
      }

      const parsed = telegramResponseSchema.safeParse(body)
      if (!parsed.success) {
        throw new ChannelError('TelegramAlert', 'sendPhoto returned an unexpected body')
      }
      if (!parsed.data.ok) {
        throw new ChannelError(
          'TelegramAlert',
          `sendPhoto refused: ${parsed.data.description ?? 'no description'}`,
        )
      }
    },
  }
}
