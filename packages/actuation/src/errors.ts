/**
 * Side-effect delivery failure. Logged by the task group that ran it,
 * never retried.
 */
export class ChannelError extends Error {
  readonly channel: string

  constructor(channel: string, message: string, options?: { cause?: unknown }) {
    super(`[${channel}] ${message}`, options)
    this.name = 'ChannelError'
    this.channel = channel
  }
}
