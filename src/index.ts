export * from './types/bodyText'
export { features, setTextFormattingReceiveSupport, shouldDetectDates } from './config/features'
export { MINIMUM_SEARCH_TEXT_LENGTH, TRUNCATED_TEXT_SUFFIX } from './config/bodyText'
export { RegexPatternDetector } from './lib/detector/patternDetector'
export type { PatternDetector } from './lib/detector/patternDetector'
export { dataDetector, setDetectorFactory, resetDetectorCache } from './services/bodyText/detectorCache'
export type { DetectorFactory } from './services/bodyText/detectorCache'
export { shouldDiscardDataItem } from './services/bodyText/truncation'
export { detectItems, sortItems, detectionLock } from './services/bodyText/detectItems'
export type { DetectItemsInput } from './services/bodyText/detectItems'
export { StyledText } from './services/bodyText/styledText'
export type { StyledRun, TextAttributes } from './services/bodyText/styledText'
export { linkifyData, linkifyDetected } from './services/bodyText/linkify'
export type { LinkifyStyle } from './services/bodyText/linkify'
export { matchedSearchRanges } from './services/bodyText/searchHighlight'
export { applyBodyAttributes } from './services/bodyText/hydrate'
export { buildDisplayableText, displayedTextValue } from './services/bodyText/displayableText'
export {
  accessibilityDescription,
  buildBodyTextLabelConfig,
  buildComponentState,
  buildState,
  canUseDedicatedCell,
  textValueOf,
} from './services/bodyText/componentState'
export type { BodyTextAppearance, BodyTextLabelConfig } from './services/bodyText/componentState'
export { findLongPressHandler, handleTap, itemAt, shouldIgnoreEvents } from './services/bodyText/gestures'
export type { BodyTextDelegate, LongPressHandler } from './services/bodyText/gestures'
export { default as BodyTextView } from './components/bodyText/BodyTextView'
