export type Schedule = (fn: () => void, ms: number) => () => void

export const LONG_PRESS_MS = 450

export interface PressHandlers {
  onActivate: () => void
  onLongPress: () => void
}

// Tells a tap from a long press on touch input. Once the long press fires,
// the click that ends the touch is swallowed.
export class PressGesture {
  handlers: PressHandlers
  private cancelTimer: (() => void) | null = null
  private longPressFired = false

  constructor(handlers: PressHandlers, private readonly schedule: Schedule) {
    this.handlers = handlers
  }

  touchStart() {
    this.longPressFired = false
    this.cancel()
    this.cancelTimer = this.schedule(() => {
      this.cancelTimer = null
      this.longPressFired = true
      this.handlers.onLongPress()
    }, LONG_PRESS_MS)
  }

  touchEnd() {
    this.cancel()
  }

  click() {
    if (this.longPressFired) {
      this.longPressFired = false
      return
    }
    this.handlers.onActivate()
  }

  cancel() {
    if (this.cancelTimer) this.cancelTimer()
    this.cancelTimer = null
  }
}
