import { shouldDetectDates } from '../../config/features'
import { RegexPatternDetector } from '../../lib/detector/patternDetector'
import type { PatternDetector } from '../../lib/detector/patternDetector'
import type { DataItemKind } from '../../types/bodyText'
import { failDebug } from './diagnostics'

export type DetectorFactory = (types: DataItemKind[]) => PatternDetector

const defaultFactory: DetectorFactory = (types) => new RegexPatternDetector(types)

let factory: DetectorFactory = defaultFactory

// undefined: not built yet. null: build failed, stays failed.
let detectorWithLinks: PatternDetector | null | undefined
let detectorWithoutLinks: PatternDetector | null | undefined

export function checkingTypes(allowLinks: boolean): DataItemKind[] {
  const types: DataItemKind[] = []
  if (allowLinks) types.push('link')
  types.push('address', 'phoneNumber')
  if (shouldDetectDates) types.push('date')
  return types
}

export function buildDataDetector(allowLinks: boolean): PatternDetector | null {
  try {
    return factory(checkingTypes(allowLinks))
  } catch (error) {
    failDebug('could not build data detector', error)
    return null
  }
}

// Detectors are expensive to build, so we reuse them.
export function dataDetector(allowLinks: boolean): PatternDetector | null {
  if (allowLinks) {
    if (detectorWithLinks === undefined) detectorWithLinks = buildDataDetector(true)
    return detectorWithLinks
  }
  if (detectorWithoutLinks === undefined) detectorWithoutLinks = buildDataDetector(false)
  return detectorWithoutLinks
}

export function setDetectorFactory(next: DetectorFactory | null) {
  factory = next ?? defaultFactory
  resetDetectorCache()
}

export function resetDetectorCache() {
  detectorWithLinks = undefined
  detectorWithoutLinks = undefined
}
