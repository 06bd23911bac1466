import { TRUNCATED_TEXT_SUFFIX } from '../../config/bodyText'
import { features } from '../../config/features'
import { ExclusiveLock } from '../../lib/lock'
import type { PatternDetector } from '../../lib/detector/patternDetector'
import { rangesIntersect } from '../../types/bodyText'
import type {
  BodyTextItem,
  DataItem,
  MessageBody,
  MessageID,
  SpoilerID,
  TextRange,
} from '../../types/bodyText'
import { dataDetector } from './detectorCache'
import { assertDebug } from './diagnostics'
import { shouldDiscardDataItem } from './truncation'

export interface DetectItemsInput {
  text: string
  body: MessageBody | null
  hasPendingMessageRequest: boolean
  shouldAllowLinkification: boolean
  textWasTruncated: boolean
  revealedSpoilerIds: ReadonlySet<SpoilerID>
  messageId: MessageID
}

// One lock for every caller: render and off-thread measurement share the
// detectors, which are not assumed to be reentrant.
export const detectionLock = new ExclusiveLock('detectItems')

function detectedItems(text: string, detector: PatternDetector | null): DataItem[] {
  return detector ? detector.detect(text) : []
}

function structuredItems(
  body: MessageBody,
  detector: PatternDetector | null,
  revealedSpoilerIds: ReadonlySet<SpoilerID>,
  messageId: MessageID,
  keepDataItem: (item: DataItem) => boolean,
): BodyTextItem[] {
  const items: BodyTextItem[] = []
  const hiddenRanges: TextRange[] = []

  for (const bodyRange of body.ranges) {
    if (bodyRange.kind === 'mention') {
      items.push({ kind: 'mention', participantId: bodyRange.participantId, range: bodyRange.range })
      continue
    }
    if (bodyRange.style !== 'spoiler' || revealedSpoilerIds.has(bodyRange.id)) continue
    hiddenRanges.push(bodyRange.range)
    if (!features.textFormattingReceiveSupport) continue
    items.push({
      kind: 'unrevealedSpoiler',
      spoilerId: bodyRange.id,
      messageId,
      range: bodyRange.range,
    })
  }

  for (const dataItem of detectedItems(body.text, detector)) {
    // Tapping a hidden span must not reveal what it hides.
    if (hiddenRanges.some((r) => rangesIntersect(r, dataItem.range))) continue
    if (!keepDataItem(dataItem)) continue
    items.push({ kind: 'dataItem', dataItem, range: dataItem.range })
  }
  return items
}

/**
 * Finds every interactive span of a body text: mentions and hidden spoilers
 * from the structured body, plus whatever the pattern detector matches.
 * Returns nothing while a message request is pending.
 */
export function detectItems(input: DetectItemsInput): BodyTextItem[] {
  const {
    text,
    body,
    hasPendingMessageRequest,
    shouldAllowLinkification,
    textWasTruncated,
    revealedSpoilerIds,
    messageId,
  } = input

  if (hasPendingMessageRequest) return []

  return detectionLock.withLock(() => {
    if (textWasTruncated) {
      assertDebug(text.endsWith(TRUNCATED_TEXT_SUFFIX), 'truncated text is missing its suffix')
    }
    const keepDataItem = (item: DataItem) =>
      !shouldDiscardDataItem(item.range, textWasTruncated, text, TRUNCATED_TEXT_SUFFIX)

    const detector = dataDetector(shouldAllowLinkification)

    if (body) {
      return structuredItems(body, detector, revealedSpoilerIds, messageId, keepDataItem)
    }
    return detectedItems(text, detector)
      .filter(keepDataItem)
      .map((dataItem): BodyTextItem => ({ kind: 'dataItem', dataItem, range: dataItem.range }))
  })
}

export function sortItems(items: readonly BodyTextItem[]): BodyTextItem[] {
  return [...items].sort((a, b) => a.range.start - b.range.start)
}
