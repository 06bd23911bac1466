import type { ChatMessage, RenderContext } from '../../src/types/bodyText'

export function context(overrides: Partial<RenderContext> = {}): RenderContext {
  return {
    expandedMessageIds: new Set(),
    searchText: null,
    revealedSpoilers: new Map(),
    ...overrides,
  }
}

export function message(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: 'm1',
    direction: 'incoming',
    body: null,
    bodyRanges: [],
    oversizeTextAttachment: null,
    wasRemotelyDeleted: false,
    ...overrides,
  }
}
