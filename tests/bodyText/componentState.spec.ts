import { describe, it, expect } from 'vitest'
import {
  accessibilityDescription,
  buildBodyTextLabelConfig,
  buildComponentState,
  buildState,
  canUseDedicatedCell,
  textValueOf,
} from '../../src/services/bodyText/componentState'
import { buildDisplayableText } from '../../src/services/bodyText/displayableText'
import type { BodyRange, BodyTextVariant } from '../../src/types/bodyText'
import { context, message } from './fixtures'

function bodyText(text: string, ranges: BodyRange[] = [], truncateAt?: number): BodyTextVariant {
  return { kind: 'bodyText', displayableText: buildDisplayableText(text, ranges, { truncateAt }) }
}

const appearance = { isIncoming: true, bodyTextColor: '#222' }

describe('buildComponentState', () => {
  it('resolves each body variant', () => {
    expect(buildComponentState(message({ body: 'hi', wasRemotelyDeleted: true }))).toEqual({ kind: 'remotelyDeleted' })
    expect(buildComponentState(message({ oversizeTextAttachment: { kind: 'pointer' } })))
      .toEqual({ kind: 'oversizeTextDownloading' })
    expect(buildComponentState(message({ body: '' }))).toBeNull()
    expect(buildComponentState(message())).toBeNull()
  })

  it('prefers the downloaded oversize text over the inline body', () => {
    const variant = buildComponentState(message({ body: 'short', oversizeTextAttachment: { kind: 'stream', text: 'the long version' } }))
    expect(variant?.kind).toBe('bodyText')
    if (variant?.kind === 'bodyText') {
      expect(variant.displayableText.fullTextValue).toEqual({ kind: 'text', text: 'the long version' })
    }
  })
})

describe('buildState', () => {
  it('uses a plain label for text without items or search', () => {
    const state = buildState('m1', bodyText('hello there'), context(), false, false)
    expect(state.items).toEqual([])
    expect(state.shouldUseAttributedText).toBe(false)
    expect(Object.isFrozen(state)).toBe(true)
  })

  it('uses styled text to highlight search matches', () => {
    const state = buildState('m1', bodyText('hello there'), context({ searchText: 'hello' }), false, false)
    expect(state.shouldUseAttributedText).toBe(true)
  })

  it('uses styled text when a link is detected', () => {
    const state = buildState('m1', bodyText('visit http://example.com now'), context(), false, false)
    expect(state.items).toHaveLength(1)
    expect(state.shouldUseAttributedText).toBe(true)
  })

  it('still links bodies with non-ASCII text outside the link', () => {
    const euro = String.fromCharCode(0x20ac)
    const smile = String.fromCodePoint(0x1f60a)
    const etc = `${String.fromCharCode(0x0438)} ${String.fromCharCode(0x0442)}.${String.fromCharCode(0x0434)}.`
    for (const text of [
      `It costs 3.50${euro}, order at http://example.com`,
      `Thanks.${smile} see http://example.com`,
      `${etc} http://example.com`,
    ]) {
      const state = buildState('m1', bodyText(text), context(), false, false)
      expect(state.items).toHaveLength(1)
      expect(state.items[0].kind).toBe('dataItem')
    }
  })

  it('always uses styled text for structured bodies', () => {
    const state = buildState('m1', bodyText('bold move', [{ kind: 'style', id: 1, style: 'bold', range: { start: 0, length: 4 } }]), context(), false, false)
    expect(state.items).toEqual([])
    expect(state.shouldUseAttributedText).toBe(true)
  })

  it('detects nothing while a message request is pending', () => {
    const state = buildState('m1', bodyText('visit http://example.com now'), context(), false, true)
    expect(state.items).toEqual([])
    expect(state.shouldUseAttributedText).toBe(false)
  })

  it('skips detection for placeholders', () => {
    const state = buildState('m1', { kind: 'remotelyDeleted' }, context({ searchText: 'hello' }), false, false)
    expect(state.items).toEqual([])
    expect(state.shouldUseAttributedText).toBe(false)
    expect(textValueOf(state)).toBeNull()
  })

  it('drops a match cut off by truncation until the text is expanded', () => {
    const variant = bodyText('call me at 555-123-4567 later', [], 23)
    const collapsed = buildState('m1', variant, context(), true, false)
    expect(textValueOf(collapsed)).toEqual({ kind: 'text', text: 'call me at 555-123-4567…' })
    expect(collapsed.items).toEqual([])

    const expanded = buildState('m1', variant, context({ expandedMessageIds: new Set(['m1']) }), false, false)
    expect(expanded.isTextExpanded).toBe(true)
    expect(expanded.items.map((i) => i.range)).toEqual([{ start: 11, length: 12 }])
  })

  it('reads revealed spoilers for its own message only', () => {
    const variant = bodyText('secret plan', [{ kind: 'style', id: 4, style: 'spoiler', range: { start: 0, length: 6 } }])
    const revealedElsewhere = context({ revealedSpoilers: new Map([['m2', new Set([4])]]) })
    expect(buildState('m1', variant, revealedElsewhere, false, false).items.map((i) => i.kind)).toEqual(['unrevealedSpoiler'])
    const revealedHere = context({ revealedSpoilers: new Map([['m1', new Set([4])]]) })
    expect(buildState('m1', variant, revealedHere, false, false).items).toEqual([])
  })
})

describe('canUseDedicatedCell', () => {
  it('only allows plain body text without tap-for-more or search', () => {
    expect(canUseDedicatedCell(buildState('m1', bodyText('hi there'), context(), false, false))).toBe(true)
    expect(canUseDedicatedCell(buildState('m1', bodyText('hi there'), context(), true, false))).toBe(false)
    expect(canUseDedicatedCell(buildState('m1', bodyText('hi there'), context({ searchText: 'hi' }), false, false))).toBe(false)
    expect(canUseDedicatedCell(buildState('m1', { kind: 'oversizeTextDownloading' }, context(), false, false))).toBe(false)
    expect(canUseDedicatedCell(buildState('m1', { kind: 'remotelyDeleted' }, context(), false, false))).toBe(false)
  })
})

describe('buildBodyTextLabelConfig', () => {
  it('uses fixed placeholder labels', () => {
    const deleted = buildState('m1', { kind: 'remotelyDeleted' }, context(), false, false)
    expect(buildBodyTextLabelConfig(deleted, appearance)).toEqual({
      kind: 'placeholder',
      text: 'This message was deleted.',
      variant: 'remotelyDeleted',
    })
    expect(buildBodyTextLabelConfig(deleted, { ...appearance, isIncoming: false })).toMatchObject({ text: 'You deleted this message.' })
    const downloading = buildState('m1', { kind: 'oversizeTextDownloading' }, context(), false, false)
    expect(buildBodyTextLabelConfig(downloading, appearance)).toMatchObject({ text: 'Downloading…' })
  })

  it('returns plain text on the cheap path', () => {
    const state = buildState('m1', bodyText('hello there'), context(), false, false)
    expect(buildBodyTextLabelConfig(state, appearance)).toEqual({ kind: 'plainText', text: 'hello there', alignment: 'left' })
  })

  it('underlines detected links', () => {
    const state = buildState('m1', bodyText('visit http://example.com now'), context(), false, false)
    const config = buildBodyTextLabelConfig(state, appearance)
    expect(config.kind).toBe('styledText')
    if (config.kind !== 'styledText') return
    expect(config.extraCacheKeyFactors).toEqual(['items: true'])
    expect(config.styled.attributesAt(6)).toEqual({
      foregroundColor: '#222',
      alignment: 'left',
      underlineStyle: 'single',
      underlineColor: '#222',
    })
  })

  it('marks search matches and structured styling', () => {
    const variant = bodyText('hello world', [{ kind: 'mention', participantId: 'p1', range: { start: 0, length: 5 } }])
    const state = buildState('m1', variant, context({ searchText: 'world' }), false, false)
    const config = buildBodyTextLabelConfig(state, appearance)
    if (config.kind !== 'styledText') throw new Error(`unexpected ${config.kind}`)
    expect(config.extraCacheKeyFactors).toEqual(['items: true'])
    expect(config.styled.attributesAt(0).mention).toBe('p1')
    expect(config.styled.attributesAt(6).searchMatch).toBe(true)
    expect(config.styled.attributesAt(5).searchMatch).toBeUndefined()
  })
})

describe('accessibilityDescription', () => {
  it('reads the full text even when truncated', () => {
    const state = buildState('m1', bodyText('aaaa bbbb cccc', [], 7), context(), false, false)
    expect(accessibilityDescription(state, true)).toBe('aaaa bbbb cccc')
  })

  it('reads placeholders', () => {
    const state = buildState('m1', { kind: 'oversizeTextDownloading' }, context(), false, false)
    expect(accessibilityDescription(state, true)).toBe('Downloading…')
  })
})
