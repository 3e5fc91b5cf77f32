import type { ActuatorCommand } from '../keywords'

export type ActuatorChannel = {
  send: (command: ActuatorCommand) => Promise<void>
  close: () => Promise<void>
}

export type AlertChannel = {
  send: (photo: Buffer, caption: string) => Promise<void>
}
