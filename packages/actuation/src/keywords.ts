/**
 * Actuation Keywords
 */

export const actuationKeywords = {
  /** UDP payloads */
  actuatorCommands: {
    on: 'ON',
    off: 'OFF',
  },

  /** Which results raise an alert */
  alertTriggers: {
    unknown: 'unknown',
    recognized: 'recognized',
    any: 'any',
  },

  defaultAlertCaption: '⚠️ Alert: Unknown Face Detected!',

  auditHeader: [
    'sequence',
    'timestamp',
    'identity',
    'confidence',
    'status',
    'actuator_state',
  ],
} as const

export type ActuatorCommand =
  (typeof actuationKeywords.actuatorCommands)[keyof typeof actuationKeywords.actuatorCommands]

export type AlertTrigger =
  (typeof actuationKeywords.alertTriggers)[keyof typeof actuationKeywords.alertTriggers]

export const commandFor = (on: boolean): ActuatorCommand =>
  on ? actuationKeywords.actuatorCommands.on : actuationKeywords.actuatorCommands.off
