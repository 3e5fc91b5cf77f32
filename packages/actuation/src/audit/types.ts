import type { RecognitionStatus } from '@facegate/recognition'
import type { ActuatorCommand } from '../keywords'

/**
 * Row as decided by the controller; the store assigns `sequence`
 */
export type AuditEntry = {
  timestamp: number
  identity: string
  confidence: number
  status: RecognitionStatus
  actuatorState: ActuatorCommand
}

export type AuditRow = AuditEntry & {
  /** 1-based row number, continued across restarts */
  sequence: number
}

export type AuditLog = {
  append: (entry: AuditEntry) => Promise<AuditRow>
}
