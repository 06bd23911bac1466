export interface BodyTextFeatures {
  textFormattingReceiveSupport: boolean
}

const STORAGE_KEY = 'features.textFormattingReceive'

// Date detection is not wired into the tap handlers yet.
export const shouldDetectDates = false

function readFlag(): boolean {
  if (typeof localStorage === 'undefined') return true
  try {
    const stored = localStorage.getItem(STORAGE_KEY)
    if (stored === 'off') return false
  } catch (error) {
    console.warn('[features] could not read', STORAGE_KEY, error)
  }
  return true
}

export const features: BodyTextFeatures = {
  textFormattingReceiveSupport: readFlag(),
}

export function setTextFormattingReceiveSupport(enabled: boolean) {
  features.textFormattingReceiveSupport = enabled
  if (typeof localStorage === 'undefined') return
  try {
    localStorage.setItem(STORAGE_KEY, enabled ? 'on' : 'off')
  } catch (error) {
    console.warn('[features] could not persist', STORAGE_KEY, error)
  }
}
