import { rangeEnd } from '../../types/bodyText'
import type { BodyTextItem } from '../../types/bodyText'
import { detectItems, sortItems } from './detectItems'
import type { DetectItemsInput } from './detectItems'
import { failDebug } from './diagnostics'
import type { StyledText } from './styledText'

export type LinkifyStyle =
  | { kind: 'linkAttribute' }
  | { kind: 'underlined'; bodyTextColor: string }

/**
 * Styles data items (links, phone numbers, addresses) in place. Mentions,
 * referenced users and hidden spoilers already carry their styling and are
 * skipped. Returns the furthest offset styled.
 */
export function linkifyData(styled: StyledText, style: LinkifyStyle, items: readonly BodyTextItem[]): number {
  let lastIndex = 0
  // Sort so that we can detect overlap.
  for (const item of sortItems(items)) {
    switch (item.kind) {
      case 'mention':
      case 'referencedUser':
      case 'unrevealedSpoiler':
        continue
      case 'dataItem': {
        const link = item.dataItem.url
        if (!link) {
          failDebug('could not build data link')
          continue
        }
        const range = item.range
        switch (style.kind) {
          case 'linkAttribute':
            styled.addAttribute('link', link, range)
            break
          case 'underlined':
            styled.addAttribute('underlineStyle', 'single', range)
            styled.addAttribute('underlineColor', style.bodyTextColor, range)
            styled.addAttribute('foregroundColor', style.bodyTextColor, range)
            break
        }
        lastIndex = Math.max(lastIndex, rangeEnd(range))
      }
    }
  }
  return lastIndex
}

// Detects and styles in one step, for callers (compose previews, quoted
// replies) that have no render state of their own.
export function linkifyDetected(
  styled: StyledText,
  style: LinkifyStyle,
  input: Omit<DetectItemsInput, 'text'>,
): BodyTextItem[] {
  const items = detectItems({ ...input, text: styled.string })
  linkifyData(styled, style, items)
  return items
}
