import { rangeContains } from '../../types/bodyText'
import type { BodyTextItem, BodyTextState, ChatMessage, MessageID } from '../../types/bodyText'
import { sortItems } from './detectItems'

export interface BodyTextDelegate {
  didTapBodyTextItem(item: BodyTextItem): void
  didTapTruncatedTextMessage(messageId: MessageID): void
}

export interface LongPressHandler {
  messageId: MessageID
  item: BodyTextItem
}

// Taps on outgoing messages that haven't been sent would fight "tap to retry".
export function shouldIgnoreEvents(message: ChatMessage): boolean {
  return message.direction === 'outgoing' && message.messageState !== 'sent'
}

export function itemAt(items: readonly BodyTextItem[], offset: number): BodyTextItem | null {
  return sortItems(items).find((item) => rangeContains(item.range, offset)) ?? null
}

/**
 * Routes a tap at a character offset (null when the tap missed the text).
 * Returns whether the tap was handled.
 */
export function handleTap(
  state: BodyTextState,
  message: ChatMessage,
  offset: number | null,
  delegate: BodyTextDelegate,
): boolean {
  if (shouldIgnoreEvents(message)) return false
  const item = offset === null ? null : itemAt(state.items, offset)
  if (item) {
    delegate.didTapBodyTextItem(item)
    return true
  }
  if (state.hasTapForMore) {
    delegate.didTapTruncatedTextMessage(state.messageId)
    return true
  }
  return false
}

export function findLongPressHandler(
  state: BodyTextState,
  message: ChatMessage,
  offset: number | null,
): LongPressHandler | null {
  if (shouldIgnoreEvents(message) || offset === null) return null
  const item = itemAt(state.items, offset)
  return item ? { messageId: state.messageId, item } : null
}
