import { describe, it, expect } from 'vitest'
import { renderToStaticMarkup } from 'react-dom/server'
import BodyTextView, { runClassName, splitRunsAtItems } from '../../src/components/bodyText/BodyTextView'
import { buildState } from '../../src/services/bodyText/componentState'
import { buildDisplayableText } from '../../src/services/bodyText/displayableText'
import type { BodyTextDelegate } from '../../src/services/bodyText/gestures'
import type { BodyTextVariant, RenderContext } from '../../src/types/bodyText'
import { context, message } from './fixtures'

const appearance = { isIncoming: true, bodyTextColor: '#222' }
const noop: BodyTextDelegate = { didTapBodyTextItem: () => {}, didTapTruncatedTextMessage: () => {} }

function render(variant: BodyTextVariant, ctx: RenderContext = context()): string {
  const state = buildState('m1', variant, ctx, false, false)
  return renderToStaticMarkup(<BodyTextView state={state} message={message()} appearance={appearance} delegate={noop} />)
}

const text = (value: string): BodyTextVariant => ({ kind: 'bodyText', displayableText: buildDisplayableText(value) })

describe('BodyTextView', () => {
  it('renders the deleted placeholder with an icon', () => {
    const html = render({ kind: 'remotelyDeleted' })
    expect(html).toContain('<svg')
    expect(html).toContain('This message was deleted.</div>')
  })

  it('renders plain text without links', () => {
    const html = render(text('hello there'))
    expect(html).toContain('>hello there</div>')
    expect(html).not.toContain('role="link"')
  })

  it('renders detected links as tappable spans', () => {
    const html = render(text('visit http://example.com now'))
    expect(html).toContain('aria-label="link: http://example.com"')
    expect(html).toContain('class="cursor-pointer underline"')
    expect(html).toContain('>http://example.com</span>')
  })

  it('marks search matches', () => {
    const html = render(text('hello world'), context({ searchText: 'world' }))
    expect(html).toContain('<mark>world</mark>')
  })
})

describe('splitRunsAtItems', () => {
  it('cuts runs at item boundaries', () => {
    const pieces = splitRunsAtItems(
      [{ text: 'abcdef', start: 0, attributes: {} }],
      [{ kind: 'mention', participantId: 'p1', range: { start: 2, length: 2 } }],
    )
    expect(pieces.map((p) => [p.text, p.start])).toEqual([['ab', 0], ['cd', 2], ['ef', 4]])
  })
})

describe('runClassName', () => {
  it('maps attributes to classes', () => {
    expect(runClassName({ bold: true, spoiler: 'hidden' })).toBe('font-semibold spoiler-text')
    expect(runClassName({})).toBe('')
  })
})
