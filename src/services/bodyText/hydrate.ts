import { features } from '../../config/features'
import type { BodyRange, SpoilerID, TextRange } from '../../types/bodyText'
import type { StyledText } from './styledText'

export interface DisplayConfiguration {
  revealedSpoilerIds: ReadonlySet<SpoilerID>
  searchRanges: readonly TextRange[]
}

// Applies mention, formatting, spoiler and search-match attributes carried by
// the structured body. Data items are styled separately by linkifyData.
export function applyBodyAttributes(
  styled: StyledText,
  ranges: readonly BodyRange[],
  config: DisplayConfiguration,
) {
  for (const bodyRange of ranges) {
    if (bodyRange.kind === 'mention') {
      styled.addAttribute('mention', bodyRange.participantId, bodyRange.range)
      continue
    }
    if (!features.textFormattingReceiveSupport) continue
    switch (bodyRange.style) {
      case 'bold':
      case 'italic':
      case 'strikethrough':
      case 'monospace':
        styled.addAttribute(bodyRange.style, true, bodyRange.range)
        break
      case 'spoiler':
        styled.addAttribute(
          'spoiler',
          config.revealedSpoilerIds.has(bodyRange.id) ? 'revealed' : 'hidden',
          bodyRange.range,
        )
        break
    }
  }
  for (const range of config.searchRanges) {
    styled.addAttribute('searchMatch', true, range)
  }
}
