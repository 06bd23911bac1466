import type { TextAlignment } from '../types/bodyText'

// Hebrew, Arabic and the Arabic presentation forms
const RTL_CHAR = /[\u0590-\u05FF\uFB1D-\uFB4F\u0600-\u06FF\u0750-\u077F\uFB50-\uFDFF\uFE70-\uFEFF]/
const LTR_CHAR = /[A-Za-z\u00C0-\u024F\u0370-\u03FF\u0400-\u04FF]/

// Alignment follows the first strongly directional character.
export const naturalAlignment = (text: string): TextAlignment => {
  for (const ch of text) {
    if (RTL_CHAR.test(ch)) return 'right'
    if (LTR_CHAR.test(ch)) return 'left'
  }
  return 'left'
}
