import { localized } from '../../config/strings'
import { textOf } from '../../types/bodyText'
import type {
  BodyTextItem,
  BodyTextState,
  BodyTextVariant,
  ChatMessage,
  MessageID,
  RenderContext,
  SpoilerID,
  TextAlignment,
  TextValue,
} from '../../types/bodyText'
import { detectItems } from './detectItems'
import { buildDisplayableText, displayedTextValue } from './displayableText'
import { applyBodyAttributes } from './hydrate'
import { linkifyData } from './linkify'
import { matchedSearchRanges } from './searchHighlight'
import { StyledText } from './styledText'

const NO_REVEALED_SPOILERS: ReadonlySet<SpoilerID> = new Set()

// Resolves which body text a message shows, or null when it has none.
export function buildComponentState(message: ChatMessage): BodyTextVariant | null {
  if (message.wasRemotelyDeleted) return { kind: 'remotelyDeleted' }

  const build = (text: string): BodyTextVariant | null => {
    if (!text) return null
    return { kind: 'bodyText', displayableText: buildDisplayableText(text, message.bodyRanges) }
  }

  const attachment = message.oversizeTextAttachment
  if (attachment) {
    switch (attachment.kind) {
      case 'stream':
        return build(attachment.text)
      case 'pointer':
        return { kind: 'oversizeTextDownloading' }
    }
  }
  if (message.body) return build(message.body)
  return null
}

export function buildState(
  messageId: MessageID,
  bodyText: BodyTextVariant,
  context: RenderContext,
  hasTapForMore: boolean,
  hasPendingMessageRequest: boolean,
): BodyTextState {
  const searchText = context.searchText
  const isTextExpanded = context.expandedMessageIds.has(messageId)
  const revealedSpoilerIds = context.revealedSpoilers.get(messageId) ?? NO_REVEALED_SPOILERS

  let items: BodyTextItem[] = []
  let shouldUseAttributedText = false

  if (bodyText.kind === 'bodyText') {
    const { displayableText } = bodyText
    const value = displayedTextValue(displayableText, isTextExpanded)
    const common = {
      hasPendingMessageRequest,
      shouldAllowLinkification: displayableText.shouldAllowLinkification,
      textWasTruncated: !isTextExpanded && displayableText.isTextTruncated,
      revealedSpoilerIds,
      messageId,
    }
    switch (value.kind) {
      case 'text':
        items = detectItems({ ...common, text: value.text, body: null })
        // Plain labels are cheaper; styled text is only needed to highlight
        // search matches or to style detected items.
        shouldUseAttributedText = searchText !== null || items.length > 0
        break
      case 'attributedText':
        items = detectItems({ ...common, text: value.body.text, body: value.body })
        shouldUseAttributedText = true
        break
    }
  }

  return Object.freeze({
    messageId,
    bodyText,
    isTextExpanded,
    searchText,
    revealedSpoilerIds,
    hasTapForMore,
    shouldUseAttributedText,
    hasPendingMessageRequest,
    items: Object.freeze(items),
  })
}

export function canUseDedicatedCell(state: BodyTextState): boolean {
  if (state.hasTapForMore || state.searchText !== null) return false
  switch (state.bodyText.kind) {
    case 'bodyText':
      return true
    case 'oversizeTextDownloading':
    case 'remotelyDeleted':
      return false
  }
}

export function textValueOf(state: BodyTextState): TextValue | null {
  if (state.bodyText.kind !== 'bodyText') return null
  return displayedTextValue(state.bodyText.displayableText, state.isTextExpanded)
}

export interface BodyTextAppearance {
  isIncoming: boolean
  bodyTextColor: string
}

export type BodyTextLabelConfig =
  | { kind: 'styledText'; styled: StyledText; alignment: TextAlignment; extraCacheKeyFactors: string[] }
  | { kind: 'plainText'; text: string; alignment: TextAlignment }
  | { kind: 'placeholder'; text: string; variant: 'oversizeTextDownloading' | 'remotelyDeleted' }

function placeholderText(variant: 'oversizeTextDownloading' | 'remotelyDeleted', isIncoming: boolean): string {
  switch (variant) {
    case 'oversizeTextDownloading':
      return localized('MESSAGE_STATUS_DOWNLOADING')
    case 'remotelyDeleted':
      return localized(isIncoming ? 'THIS_MESSAGE_WAS_DELETED' : 'YOU_DELETED_THIS_MESSAGE')
  }
}

export function buildBodyTextLabelConfig(state: BodyTextState, appearance: BodyTextAppearance): BodyTextLabelConfig {
  const { bodyText } = state
  if (bodyText.kind !== 'bodyText') {
    return { kind: 'placeholder', text: placeholderText(bodyText.kind, appearance.isIncoming), variant: bodyText.kind }
  }

  const { displayableText } = bodyText
  const value = displayedTextValue(displayableText, state.isTextExpanded)
  const text = textOf(value)
  const alignment = state.isTextExpanded
    ? displayableText.fullTextNaturalAlignment
    : displayableText.displayTextNaturalAlignment

  if (!state.shouldUseAttributedText) return { kind: 'plainText', text, alignment }

  const styled = new StyledText(text)
  styled.addAttribute('foregroundColor', appearance.bodyTextColor, styled.entireRange)
  styled.addAttribute('alignment', alignment, styled.entireRange)
  linkifyData(styled, { kind: 'underlined', bodyTextColor: appearance.bodyTextColor }, state.items)
  applyBodyAttributes(styled, value.kind === 'attributedText' ? value.body.ranges : [], {
    revealedSpoilerIds: state.revealedSpoilerIds,
    searchRanges: matchedSearchRanges(text, state.searchText),
  })

  const extraCacheKeyFactors: string[] = []
  if (state.hasPendingMessageRequest) extraCacheKeyFactors.push('hasPendingMessageRequest')
  extraCacheKeyFactors.push(`items: ${state.items.length > 0}`)

  return { kind: 'styledText', styled, alignment, extraCacheKeyFactors }
}

export function accessibilityDescription(state: BodyTextState, isIncoming: boolean): string {
  switch (state.bodyText.kind) {
    case 'bodyText':
      // Always the full text, even when the bubble shows it truncated.
      return textOf(state.bodyText.displayableText.fullTextValue)
    case 'oversizeTextDownloading':
    case 'remotelyDeleted':
      return placeholderText(state.bodyText.kind, isIncoming)
  }
}
