// Synchronous exclusive region. Work inside `withLock` must not yield, and
// must not re-enter the same lock.
export class ExclusiveLock {
  private held = false

  constructor(private readonly name: string) {}

  get isHeld(): boolean {
    return this.held
  }

  withLock<T>(fn: () => T): T {
    if (this.held) {
      throw new Error(`${this.name}: re-entrant use of exclusive lock`)
    }
    this.held = true
    try {
      return fn()
    } finally {
      this.held = false
    }
  }
}
