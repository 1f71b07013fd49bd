import type { PageSignals, PageSignalsInput } from './types'

/** Fields a page is expected to provide for scoring to be meaningful */
const EXPECTED_FIELDS = ['title', 'url', 'bodyText'] as const

export type ExpectedSignalField = (typeof EXPECTED_FIELDS)[number]

function text(value: string | null | undefined): string {
  return typeof value === 'string' ? value : ''
}

/**
 * Coerce scraper output into complete PageSignals.
 * Missing strings become "", missing codes an empty list; never throws.
 */
export function toPageSignals(input: PageSignalsInput | null | undefined): PageSignals {
  const source = input ?? {}
  const sku = text(source.sku).trim()
  const metaCodes = source.metaCodes
    ? [...source.metaCodes].filter((code): code is string => typeof code === 'string' && code.trim() !== '')
    : []
  const price =
    typeof source.price === 'number' && Number.isFinite(source.price) ? source.price : undefined
  const currency = text(source.currency).trim()

  return {
    ...(sku ? { sku } : {}),
    title: text(source.title),
    url: text(source.url),
    metaCodes,
    bodyText: text(source.bodyText),
    ...(price !== undefined ? { price } : {}),
    ...(currency ? { currency } : {}),
  }
}

/**
 * Expected fields the scraper left empty. Used by the orchestration to
 * report incomplete pages; scoring itself does not care.
 */
export function missingSignalFields(
  input: PageSignalsInput | null | undefined
): ExpectedSignalField[] {
  const source = input ?? {}
  return EXPECTED_FIELDS.filter((field) => !text(source[field]).trim())
}
