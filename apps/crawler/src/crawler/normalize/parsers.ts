/**
 * Value parsers for listing fields.
 *
 * Every parser takes the display string and returns undefined for anything
 * it cannot read. Nothing is guessed or defaulted.
 */

import type { CurrencyCode, MileageUnit } from '../types.js'

/**
 * Collapse runs of whitespace and trim. Empty results become undefined.
 */
export function cleanText(value: string | undefined | null): string | undefined {
  if (value === undefined || value === null) return undefined
  const cleaned = value.replace(/\s+/g, ' ').trim()
  return cleaned || undefined
}

// ═══════════════════════════════════════════════════════════════════════════════
// Amounts
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Grouped amount ("31,980", "12 500", "1'234.50") or plain amount ("12500", "31,98").
 * A separator followed by exactly 1-2 trailing digits is a decimal separator.
 */
const AMOUNT =
  /\d{1,3}(?:[.,'\u2019\s\u00a0\u202f]\d{3})+(?:[.,]\d{1,2})?(?!\d)|\d+(?:[.,]\d{1,2})?(?!\d)/

const DECIMAL_TAIL = /[.,](\d{1,2})$/

/**
 * First amount in the string, thousands separators removed.
 */
export function parseAmount(value: string): number | undefined {
  const match = AMOUNT.exec(value)
  if (!match) return undefined

  const amount = match[0]
  const decimal = DECIMAL_TAIL.exec(amount)
  if (decimal) {
    const integerPart = amount.slice(0, amount.length - decimal[0].length).replace(/\D/g, '')
    return Number(`${integerPart || '0'}.${decimal[1]}`)
  }
  return Number(amount.replace(/\D/g, ''))
}

/**
 * First amount as a whole number; decimals are dropped, not rounded.
 */
export function parseWholeNumber(value: string): number | undefined {
  const amount = parseAmount(value)
  return amount === undefined ? undefined : Math.trunc(amount)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Price
// ═══════════════════════════════════════════════════════════════════════════════

/** Currency markers, checked in order */
const CURRENCY_MARKERS: ReadonlyArray<readonly [RegExp, CurrencyCode]> = [
  [/\bEUR\b|€/i, 'EUR'],
  [/\bCHF\b/i, 'CHF'],
  [/\bGBP\b|£/i, 'GBP'],
  [/\bUSD\b|\$/i, 'USD'],
]

export function parseCurrency(value: string): CurrencyCode | undefined {
  for (const [pattern, code] of CURRENCY_MARKERS) {
    if (pattern.test(value)) return code
  }
  return undefined
}

// ═══════════════════════════════════════════════════════════════════════════════
// Mileage
// ═══════════════════════════════════════════════════════════════════════════════

export function parseMileageUnit(value: string): MileageUnit | undefined {
  if (/\bkm\b/i.test(value)) return 'km'
  if (/\b(?:mi|miles?)\b/i.test(value)) return 'mi'
  return undefined
}

// ═══════════════════════════════════════════════════════════════════════════════
// Power
// ═══════════════════════════════════════════════════════════════════════════════

const KW_PATTERN = /(\d+(?:[.,]\d+)?)\s*kW\b/i
const HP_PATTERN = /(\d+(?:[.,]\d+)?)\s*(?:hp|bhp|PS|CV)\b/i

function decimalOf(raw: string): number {
  return Number(raw.replace(',', '.'))
}

export function parsePower(value: string): { kw?: number; hp?: number } {
  const kw = KW_PATTERN.exec(value)
  const hp = HP_PATTERN.exec(value)
  return {
    kw: kw ? decimalOf(kw[1]) : undefined,
    hp: hp ? decimalOf(hp[1]) : undefined,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Registration date
// ═══════════════════════════════════════════════════════════════════════════════

const DAY_MONTH_YEAR = /\b(\d{1,2})[./-](\d{1,2})[./-](\d{4})\b/
const MONTH_YEAR = /\b(\d{1,2})[./-](\d{4})\b/
const YEAR_ONLY = /\b(\d{4})\b/

function validMonth(raw: string): number | undefined {
  const month = Number(raw)
  return month >= 1 && month <= 12 ? month : undefined
}

/**
 * Accepts MM/YYYY, DD/MM/YYYY, MM.YYYY, MM-YYYY and a bare YYYY.
 * An out-of-range month leaves month absent and keeps the year.
 */
export function parseRegistration(value: string): { month?: number; year?: number } {
  const full = DAY_MONTH_YEAR.exec(value)
  if (full) {
    return { month: validMonth(full[2]), year: Number(full[3]) }
  }

  const monthYear = MONTH_YEAR.exec(value)
  if (monthYear) {
    return { month: validMonth(monthYear[1]), year: Number(monthYear[2]) }
  }

  const year = YEAR_ONLY.exec(value)
  if (year) {
    return { year: Number(year[1]) }
  }

  return {}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Lists
// ═══════════════════════════════════════════════════════════════════════════════

const FEATURE_SEPARATORS = /[;,\n]/

/**
 * Clean a list of items: empty items dropped, first occurrence kept.
 * A list given as one string is split on `;`, `,` and newlines first.
 */
export function cleanList(values: readonly string[] | undefined): string[] {
  if (!values || values.length === 0) return []

  const items = values.length === 1 ? values[0].split(FEATURE_SEPARATORS) : values
  const seen = new Set<string>()
  const cleaned: string[] = []
  for (const item of items) {
    const text = cleanText(item)
    if (text && !seen.has(text)) {
      seen.add(text)
      cleaned.push(text)
    }
  }
  return cleaned
}
