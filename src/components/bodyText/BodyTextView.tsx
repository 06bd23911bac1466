import { Ban, Download } from 'lucide-react'
import type { CSSProperties, ReactNode } from 'react'
import { buildBodyTextLabelConfig } from '../../services/bodyText/componentState'
import type { BodyTextAppearance } from '../../services/bodyText/componentState'
import { findLongPressHandler, handleTap, itemAt } from '../../services/bodyText/gestures'
import type { BodyTextDelegate, LongPressHandler } from '../../services/bodyText/gestures'
import type { StyledRun, TextAttributes } from '../../services/bodyText/styledText'
import { rangeEnd } from '../../types/bodyText'
import type { BodyTextItem, BodyTextState, ChatMessage } from '../../types/bodyText'
import InlineItemLink from './InlineItemLink'

type Props = {
  state: BodyTextState
  message: ChatMessage
  appearance: BodyTextAppearance
  delegate: BodyTextDelegate
  onLongPress?: (handler: LongPressHandler) => void
}

// Splits styled runs wherever an item starts or ends, so each piece maps to
// at most one item.
export function splitRunsAtItems(runs: StyledRun[], items: readonly BodyTextItem[]): StyledRun[] {
  const cuts = new Set<number>()
  for (const item of items) {
    cuts.add(item.range.start)
    cuts.add(rangeEnd(item.range))
  }
  const pieces: StyledRun[] = []
  for (const run of runs) {
    const end = run.start + run.text.length
    const inner = [...cuts].filter((c) => c > run.start && c < end).sort((a, b) => a - b)
    let from = run.start
    for (const cut of [...inner, end]) {
      pieces.push({ text: run.text.slice(from - run.start, cut - run.start), start: from, attributes: run.attributes })
      from = cut
    }
  }
  return pieces
}

export function runClassName(attributes: TextAttributes): string {
  const classes: string[] = []
  if (attributes.bold) classes.push('font-semibold')
  if (attributes.italic) classes.push('italic')
  if (attributes.strikethrough) classes.push('line-through')
  if (attributes.monospace) classes.push('font-mono')
  if (attributes.underlineStyle === 'single') classes.push('underline')
  if (attributes.mention) classes.push('user-mention')
  if (attributes.spoiler === 'hidden') classes.push('spoiler-text')
  if (attributes.spoiler === 'revealed') classes.push('spoiler-text revealed')
  return classes.join(' ')
}

function runStyle(attributes: TextAttributes): CSSProperties | undefined {
  if (!attributes.underlineColor) return undefined
  return { textDecorationColor: attributes.underlineColor }
}

export default function BodyTextView({ state, message, appearance, delegate, onLongPress }: Props) {
  const config = buildBodyTextLabelConfig(state, appearance)

  if (config.kind === 'placeholder') {
    const Icon = config.variant === 'remotelyDeleted' ? Ban : Download
    return (
      <div className="italic text-center" style={{ color: appearance.bodyTextColor }}>
        <Icon className="inline-block w-4 h-4 mr-1 align-text-bottom" aria-hidden="true" />
        {config.text}
      </div>
    )
  }

  if (config.kind === 'plainText') {
    return (
      <div className="whitespace-pre-wrap break-words" style={{ color: appearance.bodyTextColor, textAlign: config.alignment }}>
        {config.text}
      </div>
    )
  }

  const pieces = splitRunsAtItems(config.styled.runs(), state.items)
  const nodes: ReactNode[] = pieces.map((piece) => {
    const className = runClassName(piece.attributes)
    const content = piece.attributes.searchMatch ? <mark>{piece.text}</mark> : piece.text
    const item = itemAt(state.items, piece.start)
    if (!item) {
      return className
        ? <span key={piece.start} className={className} style={runStyle(piece.attributes)}>{content}</span>
        : <span key={piece.start}>{content}</span>
    }
    return (
      <InlineItemLink
        key={piece.start}
        item={item}
        className={className}
        style={runStyle(piece.attributes)}
        onActivate={() => { handleTap(state, message, piece.start, delegate) }}
        onLongPress={() => {
          const handler = findLongPressHandler(state, message, piece.start)
          if (handler && onLongPress) onLongPress(handler)
        }}
      >
        {content}
      </InlineItemLink>
    )
  })

  return (
    <div className="whitespace-pre-wrap break-words" style={{ color: appearance.bodyTextColor, textAlign: config.alignment }}>
      {nodes}
    </div>
  )
}
