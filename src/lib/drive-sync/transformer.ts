/**
 * CSV Transformer
 *
 * Decodes a downloaded CSV (trying each supported encoding in turn) and
 * applies the fixed cleaning rules. Rows are never added or dropped.
 */

import * as Papa from 'papaparse'
import {
  ABSENT_MARKER,
  CSV_ENCODINGS,
  NULL_MARKER,
  RESULT_ENCODING,
  VALID_POD_ENCODING,
  type CsvEncoding,
} from '@/lib/constants'
import { DecodeError, TransformError, toErrorMessage } from './errors'
import type { TabularPayload, TransformResult } from './types'

// =============================================================================
// Encoding Strategies
// =============================================================================

type Decoder = (raw: Buffer) => string

/**
 * Node's platform default text encoding is UTF-8; it strips a leading BOM
 * the way TextDecoder does out of the box. The explicit `utf-8` strategy
 * keeps the BOM as data and `utf-8-sig` strips it.
 */
const DECODERS: Record<CsvEncoding, Decoder> = {
  default: (raw) => new TextDecoder('utf-8', { fatal: true }).decode(raw),
  'utf-8': (raw) => new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(raw),
  'utf-8-sig': (raw) => new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(raw),
  latin1: (raw) => raw.toString('latin1'),
}

function parseCsv(text: string): TabularPayload {
  const { data, errors, meta } = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
  })

  const columns = meta.fields ?? []
  if (columns.length === 0) {
    throw new Error('No columns to parse from file')
  }

  // A stray quote inside a quoted field (InvalidQuotes) is kept as data
  const fatal = errors.find((e) => e.code === 'MissingQuotes' || e.code === 'TooManyFields')
  if (fatal) {
    throw new Error(`${fatal.message} (row ${fatal.row ?? 'unknown'})`)
  }

  const rows = data.map((record) => {
    const row: Record<string, string> = {}
    for (const column of columns) {
      row[column] = record[column] ?? ''
    }
    return row
  })

  return { columns, rows }
}

/**
 * Try each encoding in order; the first one that both decodes and parses
 * wins.
 */
export function decodeCsv(raw: Buffer): { payload: TabularPayload; encoding: CsvEncoding } {
  const attempted: string[] = []
  const reasons: string[] = []

  for (const encoding of CSV_ENCODINGS) {
    attempted.push(encoding)
    try {
      const payload = parseCsv(DECODERS[encoding](raw))
      return { payload, encoding }
    } catch (error) {
      reasons.push(toErrorMessage(error))
    }
  }

  throw new DecodeError(attempted, reasons)
}

// =============================================================================
// Column Rules
// =============================================================================

interface ColumnRule {
  /** Column the rule reads */
  source: string
  /** Column the rule writes; defaults to the source column */
  target?: string
  apply: (value: string) => string
}

const stripTrailingZero = (value: string) => value.replace(/\.0$/, '')

const COLUMN_RULES: readonly ColumnRule[] = [
  { source: 'partner_id', apply: stripTrailingZero },
  { source: 'team_id', apply: stripTrailingZero },
  {
    // Drop the ZIP+4 suffix
    source: 'zipcode',
    apply: (value) => value.split('-')[0] ?? value,
  },
  {
    source: 'VALID POD',
    target: 'VALID POD_encoded',
    apply: (value) =>
      Object.hasOwn(VALID_POD_ENCODING, value) ? String(VALID_POD_ENCODING[value]) : ABSENT_MARKER,
  },
  {
    source: 'result',
    target: 'result_encoded',
    apply: (value) =>
      Object.hasOwn(RESULT_ENCODING, value) ? String(RESULT_ENCODING[value]) : NULL_MARKER,
  },
]

/**
 * Apply the cleaning rules to every column that is present. Missing columns
 * are not an error.
 */
export function cleanPayload(payload: TabularPayload): TabularPayload {
  const columns = [...payload.columns]
  const rows = payload.rows.map((row) => ({ ...row }))

  for (const rule of COLUMN_RULES) {
    if (!payload.columns.includes(rule.source)) continue

    const target = rule.target ?? rule.source
    if (!columns.includes(target)) columns.push(target)

    for (const row of rows) {
      row[target] = rule.apply(row[rule.source] ?? '')
    }
  }

  return { columns, rows }
}

// =============================================================================
// Public API
// =============================================================================

export function transform(raw: Buffer): TransformResult {
  const { payload, encoding } = decodeCsv(raw)
  const rowsIn = payload.rows.length

  let cleaned: TabularPayload
  try {
    cleaned = cleanPayload(payload)
  } catch (error) {
    throw new TransformError(`Transform failed: ${toErrorMessage(error)}`, { cause: error })
  }

  const rowsOut = cleaned.rows.length
  if (rowsOut !== rowsIn) {
    throw new TransformError(`Row count changed during transform (${rowsIn} → ${rowsOut})`)
  }

  return { payload: cleaned, rowsIn, rowsOut, encoding }
}

/**
 * Render a payload as CSV text with a header row
 */
export function serialize(payload: TabularPayload): string {
  if (payload.rows.length === 0) return Papa.unparse([payload.columns], { newline: '\n' })

  return Papa.unparse(
    {
      fields: payload.columns,
      data: payload.rows.map((row) => payload.columns.map((column) => row[column] ?? '')),
    },
    { newline: '\n' }
  )
}
