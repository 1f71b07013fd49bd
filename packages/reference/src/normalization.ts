/**
 * Manufacturer Reference Normalization
 *
 * Canonical normalization for manufacturer part references. The canonical
 * form is the comparison key for page matching and the cache key for stored
 * lookups, so it must stay stable across processes and restarts.
 *
 * Canonical form: uppercase A-Z and 0-9 only. Everything else (dots, dashes,
 * spaces, underscores, slashes, accents) is removed.
 *
 * Composite references join alternative codes with "+", for example
 * "71821AKN + 71614MI". Each joined segment is canonicalized on its own and
 * listed after the full canonical form.
 */

/** Bump when normalization rules change (cache keys depend on it) */
export const REFERENCE_NORMALIZATION_VERSION = '1.0.0'

/** Joins alternative codes inside one composite reference */
export const COMPOSITE_DELIMITER = '+'

const NON_CANONICAL = /[^A-Z0-9]/g
const COMPOSITE_SPLIT = /\s*\+\s*/

export interface NormalizedReference {
  /** Full reference, separators and case removed */
  readonly canonical: string
  /** canonical first, then each composite segment in original order */
  readonly parts: readonly string[]
}

/**
 * Canonicalize a single token: uppercase, then strip everything outside
 * A-Z and 0-9. toUpperCase() is locale-independent.
 */
export function canonicalize(token: string): string {
  return token.toUpperCase().replace(NON_CANONICAL, '')
}

/**
 * Normalize a raw reference.
 *
 * Total: never throws. Empty or whitespace-only input yields canonical "".
 * A "+" only makes the reference composite when it separates at least two
 * non-empty segments; "ABC+" is treated as the simple reference "ABC".
 *
 * @example
 * normalize('H.085.LR1X') // { canonical: 'H085LR1X', parts: ['H085LR1X'] }
 * normalize('ABC+DEF')    // { canonical: 'ABCDEF', parts: ['ABCDEF', 'ABC', 'DEF'] }
 */
export function normalize(raw: string | null | undefined): NormalizedReference {
  const input = raw ?? ''
  const canonical = canonicalize(input)

  if (!input.includes(COMPOSITE_DELIMITER)) {
    return Object.freeze({ canonical, parts: Object.freeze([canonical]) })
  }

  const segments = input
    .split(COMPOSITE_SPLIT)
    .map(canonicalize)
    .filter((segment) => segment.length > 0)

  if (segments.length < 2) {
    return Object.freeze({ canonical, parts: Object.freeze([canonical]) })
  }

  return Object.freeze({ canonical, parts: Object.freeze([canonical, ...segments]) })
}

/**
 * Whether a normalized reference can be searched at all.
 * Empty canonical forms are rejected before any lookup.
 */
export function isSearchable(ref: NormalizedReference): boolean {
  return ref.canonical.length > 0
}

export function isComposite(ref: NormalizedReference): boolean {
  return ref.parts.length > 1
}

/** Composite segments only (without the leading canonical form) */
export function segmentsOf(ref: NormalizedReference): readonly string[] {
  return ref.parts.slice(1)
}
