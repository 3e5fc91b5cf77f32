/**
 * Command Line
 *
 *   facegate [watch]
 *   facegate enroll <name> [samples]
 */

import { z } from 'zod'

export const commandSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('watch') }),
  z.object({
    mode: z.literal('enroll'),
    userId: z
      .string({ required_error: 'enroll needs a name' })
      .trim()
      .min(1, 'enroll needs a name')
      .regex(/^[\w-]+$/, 'name may only use letters, digits, _ and -'),
    samples: z.coerce.number().int().min(1).max(100).default(10),
  }),
])

export type GateCommand = z.infer<typeof commandSchema>

export const usage = 'Usage: facegate [watch] | facegate enroll <name> [samples]'

/**
 * Parse `process.argv.slice(2)`. Throws a ZodError on bad input.
 */
export const parseCommand = (argv: ReadonlyArray<string>): GateCommand => {
  const [mode = 'watch', userId, samples] = argv
  return commandSchema.parse(mode === 'enroll' ? { mode, userId, samples } : { mode })
}
