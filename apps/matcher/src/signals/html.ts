import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return collapseWhitespace($(selector).first().text())
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

/** Microdata value: the content attribute when present, the text otherwise */
export function itemValues($: cheerio.CheerioAPI, selector: string): string[] {
  const values: string[] = []
  $(selector).each((_, element) => {
    const node = $(element)
    const value = collapseWhitespace(node.attr('content') ?? node.text())
    if (value) values.push(value)
  })
  return values
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export type SafeJsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string }

export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = JSON.parse(input)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}
