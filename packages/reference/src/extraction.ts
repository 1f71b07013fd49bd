/**
 * Labels that introduce the manufacturer reference inside a feed item's
 * free-text description. Checked in order; first hit wins.
 */
const REFERENCE_LABELS: readonly RegExp[] = [
  /\bref\.\s*fabricante\s*:\s*([^\r\n<]+)/i,
  /\bref\s+fabricante\s*:\s*([^\r\n<]+)/i,
  /\bref\s+do\s+fabricante\s*:\s*([^\r\n<]+)/i,
  /\bmanufacturer\s+ref(?:erence)?\.?\s*:\s*([^\r\n<]+)/i,
]

const CODE_SEPARATOR = /\s*\+\s*|\s+/g

/**
 * Pull the manufacturer reference out of a product description.
 *
 * Whitespace inside the captured value separates alternative codes, so runs
 * of whitespace (and any spacing around an existing "+") collapse to a single
 * "+" ("71821AKN 71614MI" -> "71821AKN+71614MI").
 *
 * @returns the raw reference, or null when no label is present
 */
export function extractReferenceFromDescription(
  description: string | null | undefined
): string | null {
  if (!description) return null

  for (const pattern of REFERENCE_LABELS) {
    const match = pattern.exec(description)
    const value = match?.[1]?.trim()
    if (value) {
      return value.replace(CODE_SEPARATOR, '+')
    }
  }

  return null
}
