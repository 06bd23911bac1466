import { rangeEnd } from '../../types/bodyText'
import type { TextRange } from '../../types/bodyText'

/**
 * Whether a detected range is an artifact of truncation. Only applies when
 * the displayed text was cut short and ends with `suffix`.
 */
export function shouldDiscardDataItem(
  range: TextRange,
  textWasTruncated: boolean,
  fullText: string,
  suffix: string,
): boolean {
  if (!textWasTruncated) return false
  const end = rangeEnd(range)
  // The detector matched into the suffix itself.
  if (end === fullText.length) return true
  // The match ran up to the cut; whatever followed it was dropped.
  return fullText.slice(end) === suffix
}
