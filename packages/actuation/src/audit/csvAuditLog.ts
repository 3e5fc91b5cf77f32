/**
 * CSV Audit Log
 *
 * Append-only file, one row per logged recognition:
 *
 *   sequence,timestamp,identity,confidence,status,actuator_state
 *   1,2026-01-04T10:00:00.000Z,Amy,0.92,Recognized,ON
 *
 * Writers may overlap; appends are serialised by a mutex so row numbers
 * and file order agree. An existing file is continued, not rewritten.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { createMutex } from '@facegate/system'
import { actuationKeywords } from '../keywords'
import type { AuditEntry, AuditLog, AuditRow } from './types'

export type CsvAuditLogOptions = {
  path: string
}

/**
 * Quote a field when it holds a comma, quote or line break
 */
export const csvField = (value: string) =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value

export const formatAuditRow = (row: AuditRow) =>
  [
    String(row.sequence),
    new Date(row.timestamp).toISOString(),
    row.identity,
    row.confidence.toFixed(2),
    row.status,
    row.actuatorState,
  ]
    .map(csvField)
    .join(',')

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

export function createCsvAuditLog(options: CsvAuditLogOptions): AuditLog {
  const { path } = options
  const mutex = createMutex()
  let rowCount: number | null = null

  // Count existing rows. A file with no non-blank line gets the header, and a
  // last line without its newline is terminated before appending.
  const open = async () => {
    let existing = ''
    try {
      existing = await readFile(path, 'utf8')
    } catch (error) {
      if (!isMissingFile(error)) throw error
      await mkdir(dirname(path), { recursive: true })
    }

    const lines = existing.split('\n').filter((line) => line.trim() !== '')
    const unterminated = existing !== '' && !existing.endsWith('\n')
    const lead = unterminated ? '\n' : ''

    if (lines.length === 0) {
      await appendFile(path, `${lead}${actuationKeywords.auditHeader.join(',')}\n`, 'utf8')
      return 0
    }
    if (unterminated) await appendFile(path, lead, 'utf8')
    return lines.length - 1
  }

  return {
    append: (entry) =>
      mutex.runExclusive(async () => {
        const count = rowCount ?? (await open())
        const row: AuditRow = { ...entry, sequence: count + 1 }
        await appendFile(path, `${formatAuditRow(row)}\n`, 'utf8')
        rowCount = row.sequence
        return row
      }),
  }
}
