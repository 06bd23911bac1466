export type MessageID = string
export type ParticipantID = string
export type SpoilerID = number

// UTF-16 offsets, same as String.prototype.slice
export interface TextRange {
  start: number
  length: number
}

export type TextStyle = 'bold' | 'italic' | 'strikethrough' | 'monospace' | 'spoiler'

export type BodyRange =
  | { kind: 'mention'; participantId: ParticipantID; range: TextRange }
  | { kind: 'style'; id: SpoilerID; style: TextStyle; range: TextRange }

// Structured text as produced by the rich-text builder. Trusted input.
export interface MessageBody {
  text: string
  ranges: BodyRange[]
}

export type TextValue =
  | { kind: 'text'; text: string }
  | { kind: 'attributedText'; body: MessageBody }

export type DataItemKind = 'link' | 'address' | 'phoneNumber' | 'date'

export interface DataItem {
  kind: DataItemKind
  range: TextRange
  snippet: string
  url: string
}

export type BodyTextItem =
  | { kind: 'mention'; participantId: ParticipantID; range: TextRange }
  | { kind: 'referencedUser'; address: string; range: TextRange }
  | { kind: 'unrevealedSpoiler'; spoilerId: SpoilerID; messageId: MessageID; range: TextRange }
  | { kind: 'dataItem'; dataItem: DataItem; range: TextRange }

export type TextAlignment = 'left' | 'right'

export interface DisplayableText {
  fullTextValue: TextValue
  truncatedTextValue: TextValue | null
  isTextTruncated: boolean
  shouldAllowLinkification: boolean
  fullTextNaturalAlignment: TextAlignment
  displayTextNaturalAlignment: TextAlignment
}

export type BodyTextVariant =
  | { kind: 'bodyText'; displayableText: DisplayableText }
  | { kind: 'oversizeTextDownloading' }
  | { kind: 'remotelyDeleted' }

export interface RenderContext {
  expandedMessageIds: ReadonlySet<MessageID>
  searchText: string | null
  revealedSpoilers: ReadonlyMap<MessageID, ReadonlySet<SpoilerID>>
}

export interface BodyTextState {
  readonly messageId: MessageID
  readonly bodyText: BodyTextVariant
  readonly isTextExpanded: boolean
  readonly searchText: string | null
  readonly revealedSpoilerIds: ReadonlySet<SpoilerID>
  readonly hasTapForMore: boolean
  readonly shouldUseAttributedText: boolean
  readonly hasPendingMessageRequest: boolean
  readonly items: readonly BodyTextItem[]
}

export type OversizeTextAttachment =
  | { kind: 'stream'; text: string }
  | { kind: 'pointer' }

export type OutgoingMessageState = 'sending' | 'failed' | 'sent'

// Storage-side view of a message; only what the body text component reads.
export interface ChatMessage {
  id: MessageID
  direction: 'incoming' | 'outgoing'
  messageState?: OutgoingMessageState
  body: string | null
  bodyRanges: BodyRange[]
  oversizeTextAttachment: OversizeTextAttachment | null
  wasRemotelyDeleted: boolean
}

export function rangeEnd(range: TextRange): number {
  return range.start + range.length
}

export function rangeContains(range: TextRange, offset: number): boolean {
  return offset >= range.start && offset < rangeEnd(range)
}

export function rangesIntersect(a: TextRange, b: TextRange): boolean {
  return a.start < rangeEnd(b) && b.start < rangeEnd(a)
}

export function textOf(value: TextValue): string {
  return value.kind === 'text' ? value.text : value.body.text
}
