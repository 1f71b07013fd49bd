/**
 * Localized price text -> number
 *
 * Handles both separator conventions:
 *   "1.234,56 EUR" -> 1234.56   (comma decimal)
 *   "$1,234.56"    -> 1234.56   (dot decimal)
 *   "1 234,56 €"   -> 1234.56   (space thousands)
 *
 * Promotional text ("~~200,00€~~ 150,00€", "De: 89.90 Por: 69.90") yields the
 * last price; "from" text ("Desde 45,00€") yields the first.
 */

/** Larger values are treated as parse errors */
export const MAX_PRICE = 100_000

const PROMO_MARKERS = ['~~', 'agora', 'por:', '→', '->']
const FROM_MARKERS = ['desde', 'a partir de', 'from']

const NUMBER_RUN = /\d[\d.,]*/g
const CURRENCY_SYMBOLS = /[€$£¥₹¢]/g
const CURRENCY_CODES = /EUR|USD|GBP/gi
const SPACES = /\s/g
const PLAIN_NUMBER = /^\d+(?:\.\d+)?$/

const SYMBOL_CURRENCIES: Record<string, string> = {
  '€': 'EUR',
  $: 'USD',
  '£': 'GBP',
}

export function parsePrice(text: string | null | undefined): number | null {
  if (!text) return null

  const lower = text.toLowerCase()

  if (PROMO_MARKERS.some((marker) => lower.includes(marker))) {
    const runs = numberRuns(text)
    if (runs.length > 0) return parseSinglePrice(runs[runs.length - 1])
  }

  if (FROM_MARKERS.some((marker) => lower.includes(marker))) {
    const runs = numberRuns(text)
    if (runs.length > 0) return parseSinglePrice(runs[0])
  }

  return parseSinglePrice(text)
}

/**
 * ISO currency code named or symbolized in the text, if any.
 */
export function detectCurrency(text: string | null | undefined): string | null {
  if (!text) return null

  const code = text.match(/\b(EUR|USD|GBP)\b/i)
  if (code) return code[1].toUpperCase()

  for (const [symbol, currency] of Object.entries(SYMBOL_CURRENCIES)) {
    if (text.includes(symbol)) return currency
  }
  return null
}

function numberRuns(text: string): string[] {
  return (text.match(NUMBER_RUN) ?? []).map((run) => run.replace(/[.,]+$/, ''))
}

function parseSinglePrice(raw: string): number | null {
  let s = raw.replace(CURRENCY_SYMBOLS, '').replace(CURRENCY_CODES, '').trim()
  if (!s) return null

  const hasComma = s.includes(',')
  const hasDot = s.includes('.')

  if (hasComma && hasDot) {
    // Whichever separator comes last is the decimal one
    s = s.lastIndexOf(',') > s.lastIndexOf('.')
      ? s.replace(/\./g, '').replace(',', '.')
      : s.replace(/,/g, '')
  } else if (hasComma) {
    const parts = s.split(',')
    s = parts.length === 2 && parts[1].trim().length <= 2
      ? s.replace(',', '.')
      : s.replace(/,/g, '')
  }

  s = s.replace(SPACES, '')
  if (!PLAIN_NUMBER.test(s)) return null

  const value = Number(s)
  if (!Number.isFinite(value) || value > MAX_PRICE) return null
  return value
}
