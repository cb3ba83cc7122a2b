/**
 * QR-label CSV template
 *
 * The template file holds two CSV records: the column header and one row of
 * default values shared by every exported release. Three data columns are
 * filled per release; the remaining columns configure the label generator
 * and must match the schema it was agreed to parse.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { TemplateError } from '~/lib/error-utils'
import type { CsvTemplate } from '~/types'

export const QR_LABEL_DATA_COLUMNS = ['BottomText', 'Content', 'FileName'] as const

export type QrLabelDataColumn = typeof QR_LABEL_DATA_COLUMNS[number]

/**
 * Configuration columns the label generator expects, in generator order
 */
export const QR_LABEL_CONSTANT_COLUMNS: readonly string[] = [
  'Type',
  'OutputSize',
  'FileType',
  'ColorSpace',
  'RotationAngle',
  'ReliabilityLevel',
  'UseAutoReliabilityLevel',
  'PixelRoundness',
  'PixelColorType',
  'BackgroundColorType',
  'BackgroundColor',
  'PixelColorStart',
  'PixelColorEnd',
  'GradientAngle',
  'IconPath',
  'IconLockToSquares',
  'IconSizePercent',
  'IconBorderType',
  'IconBorderPercent',
  'IconBorderSquareCornerSize',
  'IconBorderColor',
  'BottomTextSize',
  'BottomTextColor',
  'BottomTextFont',
  'BottomTextFontStyle',
  'SafeZonePercent',
  'SafeZoneColor'
]

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL('../../templates/qr-label-template.csv', import.meta.url))

export const CSV_RECORD_SEPARATOR = '\r\n'

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

export function formatCsvRow(values: string[]): string {
  return values.map(escapeCsvValue).join(',')
}

/**
 * Parse CSV text into records. Accepts CRLF or LF line endings and quoted
 * fields spanning lines; a trailing line break does not produce a record.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text
  const records: string[][] = []
  let record: string[] = []
  let field = ''
  let inQuotes = false
  let fieldStarted = false

  for (let i = 0; i < input.length; i++) {
    const char = input[i]

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        field += char
      }
      continue
    }

    if (char === '"' && field === '') {
      inQuotes = true
      fieldStarted = true
    } else if (char === ',') {
      record.push(field)
      field = ''
      fieldStarted = true
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && input[i + 1] === '\n') i++
      record.push(field)
      records.push(record)
      record = []
      field = ''
      fieldStarted = false
    } else {
      field += char
      fieldStarted = true
    }
  }

  if (inQuotes) {
    throw new TemplateError('Unterminated quoted field in CSV input')
  }

  if (fieldStarted || record.length > 0) {
    record.push(field)
    records.push(record)
  }

  return records
}

/**
 * Build a template from its CSV text
 */
export function parseTemplate(text: string): CsvTemplate {
  const records = parseCsv(text).filter(record => !(record.length === 1 && record[0] === ''))
  const [header, defaultsRow] = records

  if (!header || !defaultsRow) {
    throw new TemplateError('Template must contain a header row and a defaults row')
  }

  if (defaultsRow.length !== header.length) {
    throw new TemplateError('Template defaults row does not match the header width', [
      `Header has ${header.length} columns, defaults row has ${defaultsRow.length}`
    ])
  }

  const columns = header.map(column => column.trim())
  const defaults: Record<string, string> = {}
  columns.forEach((column, index) => {
    defaults[column] = defaultsRow[index] ?? ''
  })

  return { columns, defaults }
}

/**
 * List every way the template differs from the agreed layout
 */
export function verifyTemplate(template: CsvTemplate): string[] {
  const problems: string[] = []
  const seen = new Set<string>()

  for (const column of template.columns) {
    if (seen.has(column)) {
      problems.push(`Duplicate column: ${column}`)
    }
    seen.add(column)

    if (!(column in template.defaults)) {
      problems.push(`No default value for column: ${column}`)
    }
  }

  for (const column of QR_LABEL_DATA_COLUMNS) {
    if (!seen.has(column)) {
      problems.push(`Missing data column: ${column}`)
    }
  }

  const dataColumns: readonly string[] = QR_LABEL_DATA_COLUMNS
  const agreed = new Set(QR_LABEL_CONSTANT_COLUMNS)
  for (const column of seen) {
    if (!dataColumns.includes(column) && !agreed.has(column)) {
      problems.push(`Unexpected column: ${column}`)
    }
  }
  for (const column of QR_LABEL_CONSTANT_COLUMNS) {
    if (!seen.has(column)) {
      problems.push(`Missing constant column: ${column}`)
    }
  }

  return problems
}

export function assertTemplate(template: CsvTemplate): void {
  const problems = verifyTemplate(template)
  if (problems.length > 0) {
    throw new TemplateError(`QR-label template is malformed: ${problems.join('; ')}`, problems)
  }
}

/**
 * Read, parse and verify the template file
 */
export function loadTemplate(path: string = DEFAULT_TEMPLATE_PATH): CsvTemplate {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    throw new TemplateError(
      `Cannot read QR-label template at ${path}: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  const template = parseTemplate(text)
  assertTemplate(template)
  return template
}
