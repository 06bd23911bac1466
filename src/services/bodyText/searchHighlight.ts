import { MINIMUM_SEARCH_TEXT_LENGTH } from '../../config/bodyText'
import type { TextRange } from '../../types/bodyText'
import { assertDebug, failDebug } from './diagnostics'

export function normalizeSearchText(text: string): string {
  return text.normalize('NFKC').replace(/\s+/g, ' ').trim()
}

export function escapePattern(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

// Ranges of `text` matching the conversation search query. Recomputed per
// render pass; never stored with the message.
export function matchedSearchRanges(text: string, searchText: string | null): TextRange[] {
  if (searchText === null) return []
  const searchable = normalizeSearchText(searchText)
  if (searchable.length < MINIMUM_SEARCH_TEXT_LENGTH) return []

  let re: RegExp
  try {
    re = new RegExp(escapePattern(searchable), 'giu')
  } catch (error) {
    failDebug('could not compile search pattern', error)
    return []
  }

  const ranges: TextRange[] = []
  for (const m of text.matchAll(re)) {
    if (m.index === undefined) continue
    assertDebug(m[0].length >= MINIMUM_SEARCH_TEXT_LENGTH, 'search match shorter than the minimum')
    ranges.push({ start: m.index, length: m[0].length })
  }
  return ranges
}
