import { TRUNCATE_TEXT_AT, TRUNCATED_TEXT_SUFFIX, TRUNCATION_BOUNDARY_WINDOW } from '../../config/bodyText'
import { rangeEnd, textOf } from '../../types/bodyText'
import type { BodyRange, DisplayableText, TextValue } from '../../types/bodyText'
import { TLDS } from '../../lib/detector/patternDetector'
import { naturalAlignment } from '../../utils/rtl'

export interface DisplayableTextOptions {
  truncateAt?: number
}

const URL_LIKE = /(?:https?:\/\/|www\.)[^\s<>"]+/gi
const BARE_HOST = new RegExp(String.raw`[^\s/?#@<>"().,]+(?:\.[^\s/?#@<>"().,]+)*\.(?:${TLDS})\b`, 'giu')
const NON_ASCII = /[^\x00-\x7F]/

function hostOf(candidate: string): string | null {
  const href = /^www\./i.test(candidate) ? `http://${candidate}` : candidate
  try {
    return new URL(href.replace(/[.,;:!?)\]'"]+$/, '')).hostname
  } catch {
    return null
  }
}

// Hosts that mix in non-ASCII characters can impersonate other domains, so
// such bodies are never linkified. Only link hosts are checked.
export function shouldAllowLinkification(text: string): boolean {
  for (const m of text.matchAll(URL_LIKE)) {
    // URL hostnames come back IDNA-encoded
    const host = hostOf(m[0])
    if (host && host.split('.').some((label) => label.startsWith('xn--'))) return false
  }
  for (const m of text.matchAll(BARE_HOST)) {
    if (NON_ASCII.test(m[0])) return false
  }
  return true
}

function textValue(text: string, ranges: readonly BodyRange[]): TextValue {
  return ranges.length ? { kind: 'attributedText', body: { text, ranges: [...ranges] } } : { kind: 'text', text }
}

function truncationPoint(text: string, limit: number): number {
  const floor = Math.max(0, limit - TRUNCATION_BOUNDARY_WINDOW)
  for (let i = limit; i > floor; i--) {
    if (/\s/.test(text[i])) return i
  }
  // Never split a surrogate pair.
  const code = text.charCodeAt(limit - 1)
  return code >= 0xd800 && code <= 0xdbff ? limit - 1 : limit
}

function clipRanges(ranges: readonly BodyRange[], length: number): BodyRange[] {
  const clipped: BodyRange[] = []
  for (const r of ranges) {
    if (r.range.start >= length) continue
    const end = Math.min(rangeEnd(r.range), length)
    clipped.push({ ...r, range: { start: r.range.start, length: end - r.range.start } })
  }
  return clipped
}

export function buildDisplayableText(
  text: string,
  ranges: readonly BodyRange[] = [],
  options: DisplayableTextOptions = {},
): DisplayableText {
  const limit = options.truncateAt ?? TRUNCATE_TEXT_AT
  const fullTextValue = textValue(text, ranges)

  let truncatedTextValue: TextValue | null = null
  if (text.length > limit) {
    const kept = text.slice(0, truncationPoint(text, limit)).trimEnd()
    truncatedTextValue = textValue(kept + TRUNCATED_TEXT_SUFFIX, clipRanges(ranges, kept.length))
  }

  return {
    fullTextValue,
    truncatedTextValue,
    isTextTruncated: truncatedTextValue !== null,
    shouldAllowLinkification: shouldAllowLinkification(text),
    fullTextNaturalAlignment: naturalAlignment(text),
    displayTextNaturalAlignment: naturalAlignment(textOf(truncatedTextValue ?? fullTextValue)),
  }
}

export function displayedTextValue(displayableText: DisplayableText, isTextExpanded: boolean): TextValue {
  if (isTextExpanded || !displayableText.truncatedTextValue) return displayableText.fullTextValue
  return displayableText.truncatedTextValue
}
