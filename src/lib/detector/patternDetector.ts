import type { DataItem, DataItemKind } from '../../types/bodyText'

export interface PatternDetector {
  readonly types: ReadonlySet<DataItemKind>
  detect(text: string): DataItem[]
}

interface PatternDef {
  kind: DataItemKind
  re: RegExp
  // Returns the payload for a match, or null to reject the match.
  toUrl: (surface: string) => string | null
  trimTrailing?: boolean
}

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December'
const STREET_SUFFIXES = 'Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Way|Court|Ct|Place|Pl'
export const TLDS = 'com|org|net|io|dev|app|co|edu|gov|me|info|uk|de'

function validUrl(candidate: string): string | null {
  try {
    new URL(candidate)
    return candidate
  } catch {
    return null
  }
}

function linkUrl(surface: string): string | null {
  if (/^https?:\/\//i.test(surface)) return validUrl(surface)
  if (/^[^\s/]+@/.test(surface)) return validUrl(`mailto:${surface}`)
  return validUrl(`http://${surface}`)
}

function phoneUrl(surface: string): string | null {
  const digits = surface.replace(/\D/g, '')
  if (digits.length < 7 || digits.length > 15) return null
  // ISO dates and IPv4 addresses look like digit groups too
  if (/^\d{4}-\d{2}-\d{2}$/.test(surface)) return null
  if (/^\d{1,3}(?:\.\d{1,3}){3}$/.test(surface)) return null
  return `tel:${surface.trim().startsWith('+') ? '+' : ''}${digits}`
}

const PATTERNS: PatternDef[] = [
  {
    kind: 'link',
    re: new RegExp(
      [
        String.raw`\b(?:https?:\/\/|www\.)[^\s<>"]+`,
        String.raw`\b[\w.+-]+@[\w-]+(?:\.[\w-]+)*\.[a-z]{2,}\b`,
        String.raw`\b(?:[a-z0-9-]+\.)+(?:${TLDS})\b(?:\/[^\s<>"]*)?`,
      ].join('|'),
      'gi',
    ),
    toUrl: linkUrl,
    trimTrailing: true,
  },
  {
    kind: 'phoneNumber',
    re: /(?<![\w+])\+?\(?\d{1,4}\)?(?:[\s.-]?\(?\d{1,4}\)?){2,5}(?![\w])/g,
    toUrl: phoneUrl,
  },
  {
    kind: 'address',
    re: new RegExp(String.raw`\b\d{1,5}\s+(?:[A-Z][a-z]+\s+){1,4}(?:${STREET_SUFFIXES})\b`, 'g'),
    toUrl: (surface) => `maps:?q=${encodeURIComponent(surface)}`,
  },
  {
    kind: 'date',
    re: new RegExp(String.raw`\b\d{4}-\d{2}-\d{2}\b|\b(?:${MONTHS})\s+\d{1,2},\s+\d{4}\b`, 'g'),
    toUrl: (surface) => `date:${encodeURIComponent(surface)}`,
  },
]

const KNOWN_KINDS = new Set<DataItemKind>(PATTERNS.map((p) => p.kind))

function trimTrailingPunctuation(surface: string): string {
  return surface.replace(/[.,;:!?)\]'"]+$/, '')
}

// Regex-backed detector for links, addresses, phone numbers and dates.
// Throws when configured with nothing to detect.
export class RegexPatternDetector implements PatternDetector {
  readonly types: ReadonlySet<DataItemKind>
  private readonly patterns: PatternDef[]

  constructor(types: Iterable<DataItemKind>) {
    const set = new Set(types)
    if (set.size === 0) throw new Error('RegexPatternDetector: no checking types')
    for (const t of set) {
      if (!KNOWN_KINDS.has(t)) throw new Error(`RegexPatternDetector: unknown checking type ${String(t)}`)
    }
    this.types = set
    // Each detector owns its RegExp objects; lastIndex is per instance.
    this.patterns = PATTERNS
      .filter((p) => set.has(p.kind))
      .map((p) => ({ ...p, re: new RegExp(p.re.source, p.re.flags) }))
  }

  detect(text: string): DataItem[] {
    const candidates: DataItem[] = []
    if (!text) return candidates

    for (const { kind, re, toUrl, trimTrailing } of this.patterns) {
      let m: RegExpExecArray | null
      re.lastIndex = 0
      while ((m = re.exec(text)) !== null) {
        if (m[0].length === 0) { re.lastIndex++; continue }
        const surface = trimTrailing ? trimTrailingPunctuation(m[0]) : m[0]
        if (!surface) continue
        const url = toUrl(surface)
        if (url === null) continue
        candidates.push({
          kind,
          range: { start: m.index, length: surface.length },
          snippet: surface,
          url,
        })
      }
    }

    // Earliest start wins; on a tie the longer match wins.
    candidates.sort((a, b) => a.range.start - b.range.start || b.range.length - a.range.length)
    const filtered: DataItem[] = []
    let lastEnd = -1
    for (const c of candidates) {
      if (c.range.start < lastEnd) continue
      filtered.push(c)
      lastEnd = c.range.start + c.range.length
    }
    return filtered
  }
}
