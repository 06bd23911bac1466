// Appended when the displayed text was cut short of the full body.
export const TRUNCATED_TEXT_SUFFIX = '…'

export const MINIMUM_SEARCH_TEXT_LENGTH = 2

// Bodies longer than this are shown truncated until expanded.
export const TRUNCATE_TEXT_AT = 2048

// How far back from the threshold we look for a word boundary.
export const TRUNCATION_BOUNDARY_WINDOW = 32
