import type { ParticipantID, TextAlignment, TextRange } from '../../types/bodyText'

export interface TextAttributes {
  foregroundColor?: string
  alignment?: TextAlignment
  link?: string
  underlineStyle?: 'single'
  underlineColor?: string
  mention?: ParticipantID
  bold?: true
  italic?: true
  strikethrough?: true
  monospace?: true
  spoiler?: 'hidden' | 'revealed'
  searchMatch?: true
}

export type AttributeKey = keyof TextAttributes

interface AttributeSpan {
  key: AttributeKey
  value: TextAttributes[AttributeKey]
  start: number
  end: number
}

export interface StyledRun {
  text: string
  start: number
  attributes: TextAttributes
}

function assign<K extends AttributeKey>(target: TextAttributes, key: K, value: TextAttributes[K]) {
  target[key] = value
}

function attributesKey(attrs: TextAttributes): string {
  return JSON.stringify(Object.entries(attrs).sort(([a], [b]) => a.localeCompare(b)))
}

/**
 * Mutable text with range-scoped attributes. Adding an attribute over a range
 * replaces that key's previous value there, so re-applying is a no-op.
 */
export class StyledText {
  private spans: AttributeSpan[] = []

  constructor(readonly string: string) {}

  get length(): number {
    return this.string.length
  }

  get entireRange(): TextRange {
    return { start: 0, length: this.string.length }
  }

  addAttribute<K extends AttributeKey>(key: K, value: NonNullable<TextAttributes[K]>, range: TextRange) {
    const start = Math.max(0, range.start)
    const end = Math.min(this.string.length, range.start + range.length)
    if (end <= start) return

    const next: AttributeSpan[] = []
    for (const span of this.spans) {
      if (span.key !== key || span.end <= start || span.start >= end) {
        next.push(span)
        continue
      }
      if (span.start < start) next.push({ ...span, end: start })
      if (span.end > end) next.push({ ...span, start: end })
    }
    next.push({ key, value, start, end })
    this.spans = next
  }

  attributesAt(offset: number): TextAttributes {
    const attrs: TextAttributes = {}
    for (const span of this.spans) {
      if (offset >= span.start && offset < span.end) assign(attrs, span.key, span.value)
    }
    return attrs
  }

  runs(): StyledRun[] {
    const bounds = new Set<number>([0, this.string.length])
    for (const span of this.spans) {
      bounds.add(span.start)
      bounds.add(span.end)
    }
    const points = [...bounds].sort((a, b) => a - b)
    const runs: StyledRun[] = []
    for (let i = 0; i < points.length - 1; i++) {
      const start = points[i]
      const end = points[i + 1]
      if (end <= start) continue
      const attributes = this.attributesAt(start)
      const last = runs[runs.length - 1]
      if (last && attributesKey(last.attributes) === attributesKey(attributes)) {
        last.text += this.string.slice(start, end)
        continue
      }
      runs.push({ text: this.string.slice(start, end), start, attributes })
    }
    return runs
  }

  copy(): StyledText {
    const copy = new StyledText(this.string)
    copy.spans = this.spans.map((s) => ({ ...s }))
    return copy
  }
}
