/**
 * CSV wire format
 *
 * RFC-4180 style records: a configurable primary delimiter, fields quoted
 * with `"` when they hold a delimiter, quote or line break, quotes doubled
 * inside quoted fields. Quoted fields may span lines.
 *
 * @module csv/format
 */

import { DEFAULT_CSV_DELIMITER, DEFAULT_VALUE_SEPARATOR } from '../constants'
import { ValidationError, ErrorCode } from '../errors'

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a CSV payload into records. Blank lines are skipped.
 *
 * @throws ValidationError when a quoted field is never closed
 *
 * @example
 * parseCsv('name,teams\nalice,"a;b"') // [['name', 'teams'], ['alice', 'a;b']]
 */
export function parseCsv(text: string, delimiter: string = DEFAULT_CSV_DELIMITER): string[][] {
  const records: string[][] = []
  let record: string[] = []
  let current = ''
  let inQuotes = false
  // Whether the current record has any content (a lone line break is blank)
  let started = false
  let i = 0

  const endField = (): void => {
    record.push(current)
    current = ''
  }
  const endRecord = (): void => {
    if (started) {
      endField()
      records.push(record)
    }
    record = []
    current = ''
    started = false
  }

  while (i < text.length) {
    const char = text.charAt(i)

    if (inQuotes) {
      if (char === '"') {
        // Escaped quote
        if (text.charAt(i + 1) === '"') {
          current += '"'
          i += 2
          continue
        }
        inQuotes = false
        i++
        continue
      }
      current += char
      i++
      continue
    }

    if (char === '"') {
      inQuotes = true
      started = true
      i++
      continue
    }
    if (char === delimiter) {
      endField()
      started = true
      i++
      continue
    }
    if (char === '\r' || char === '\n') {
      endRecord()
      i += char === '\r' && text.charAt(i + 1) === '\n' ? 2 : 1
      continue
    }
    current += char
    started = true
    i++
  }

  if (inQuotes) {
    throw new ValidationError('Unterminated quoted field in CSV payload', { value: current }, ErrorCode.VALIDATION_FAILED)
  }
  endRecord()
  return records
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Quote a field when it holds the delimiter, a quote or a line break
 */
export function formatCsvField(value: string, delimiter: string = DEFAULT_CSV_DELIMITER): string {
  if (value.includes(delimiter) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function formatCsvRecord(fields: readonly string[], delimiter: string = DEFAULT_CSV_DELIMITER): string {
  return fields.map(f => formatCsvField(f, delimiter)).join(delimiter)
}

/**
 * Records joined by line feeds, with a trailing line feed
 */
export function formatCsv(records: readonly (readonly string[])[], delimiter: string = DEFAULT_CSV_DELIMITER): string {
  return records.map(r => formatCsvRecord(r, delimiter) + '\n').join('')
}

// =============================================================================
// Multi-valued cells
// =============================================================================

/**
 * Values of a multi-valued cell, trimmed, empty entries dropped
 *
 * @example
 * splitValues('teamA; teamB;') // ['teamA', 'teamB']
 */
export function splitValues(cell: string, separator: string = DEFAULT_VALUE_SEPARATOR): string[] {
  return cell
    .split(separator)
    .map(v => v.trim())
    .filter(v => v !== '')
}

export function joinValues(values: readonly string[], separator: string = DEFAULT_VALUE_SEPARATOR): string {
  return values.join(separator)
}
