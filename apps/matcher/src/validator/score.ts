/**
 * Match Validator
 *
 * Scores how confidently a fetched page corresponds to the queried
 * reference. Rules run in strict priority order and the first one that
 * holds decides the verdict:
 *
 *   1. SKU_MATCH     1.00        page SKU equals the reference
 *   2. EXACT_MATCH   0.95        reference inside a meta code or the title
 *   3. STRONG_MATCH  0.90        reference inside the URL path
 *   4. STRONG_MATCH  0.85        composite: every segment in title, codes or path
 *   5. FUZZY_MATCH   0.60-0.75   reference only in body text, or some parts
 *   6. NO_MATCH      0.00
 *
 * Pure: no I/O, no clock, no shared state.
 */

import { canonicalize, segmentsOf } from '@refwatch/reference'
import type { NormalizedReference } from '@refwatch/reference'
import { toPageSignals } from './signals'
import { DEFAULT_ACCEPT_THRESHOLD } from './types'
import type { MatchType, MatchVerdict, PageSignalsInput } from './types'
import { createVerdict } from './verdict'

export interface ScoreOptions {
  acceptThreshold?: number
}

const FUZZY_FLOOR = 0.6
const FUZZY_SPAN = 0.15

/**
 * Path component of a page URL. Query strings are left out because search
 * result URLs echo the searched reference back.
 */
export function urlPath(url: string): string {
  if (!url) return ''
  try {
    return safeDecode(new URL(url).pathname)
  } catch {
    // Relative or malformed URL
    return safeDecode(url.split(/[?#]/, 1)[0] ?? '')
  }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}

function foundIn(haystacks: readonly string[], needle: string): boolean {
  return haystacks.some((haystack) => haystack.includes(needle))
}

export function score(
  ref: NormalizedReference,
  input: PageSignalsInput | null | undefined,
  options: ScoreOptions = {}
): MatchVerdict {
  const acceptThreshold = options.acceptThreshold ?? DEFAULT_ACCEPT_THRESHOLD
  const signals = toPageSignals(input)
  const extras = {
    price: signals.price,
    currency: signals.currency,
    url: signals.url || undefined,
  }
  const verdict = (
    matchType: MatchType,
    confidence: number,
    matchedParts: readonly string[],
    reason: string
  ): MatchVerdict =>
    createVerdict({ matchType, confidence, matchedParts, reason, ...extras }, acceptThreshold)

  const canonical = ref.canonical
  if (!canonical) {
    return verdict('NO_MATCH', 0, [], 'empty reference')
  }

  // 1. SKU
  if (signals.sku && canonicalize(signals.sku) === canonical) {
    return verdict('SKU_MATCH', 1.0, [canonical], `sku ${signals.sku} equals reference`)
  }

  // 2. Declared codes and title
  const metaCodes = signals.metaCodes.map(canonicalize).filter((code) => code.length > 0)
  const title = canonicalize(signals.title)
  if (foundIn(metaCodes, canonical)) {
    return verdict('EXACT_MATCH', 0.95, [canonical], 'reference found in page codes')
  }
  if (title.includes(canonical)) {
    return verdict('EXACT_MATCH', 0.95, [canonical], 'reference found in title')
  }

  // 3. URL path
  const path = canonicalize(urlPath(signals.url))
  if (path.includes(canonical)) {
    return verdict('STRONG_MATCH', 0.9, [canonical], 'reference found in url path')
  }

  // 4. Composite: every segment in the structured signals.
  // A SKU that did not equal the whole reference can still carry one segment.
  const segments = segmentsOf(ref)
  const sku = signals.sku ? canonicalize(signals.sku) : ''
  const structured = [title, path, sku, ...metaCodes].filter((value) => value.length > 0)
  if (segments.length > 0 && segments.every((segment) => foundIn(structured, segment))) {
    return verdict(
      'STRONG_MATCH',
      0.85,
      segments,
      `all ${segments.length} composite segments found`
    )
  }

  // 5. Body text or a subset of parts
  const body = canonicalize(signals.bodyText)
  const everywhere = body ? [...structured, body] : structured
  const matched = ref.parts.filter((part) => foundIn(everywhere, part))
  const inBody = body.includes(canonical)
  const someSegments = segments.some((segment) => foundIn(everywhere, segment))

  if (matched.length > 0 && (inBody || someSegments)) {
    const fraction = matched.length / ref.parts.length
    const reason = inBody
      ? 'reference found in body text'
      : `${matched.length}/${ref.parts.length} reference parts found`
    return verdict('FUZZY_MATCH', FUZZY_FLOOR + FUZZY_SPAN * fraction, matched, reason)
  }

  // 6.
  return verdict('NO_MATCH', 0, [], 'reference not found on page')
}
