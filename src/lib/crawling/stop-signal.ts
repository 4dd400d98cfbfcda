/**
 * Set-once stop flag shared by every query loop of a run
 */
export class StopSignal {
  private setAt: number | null = null;
  private reason: string | null = null;

  /**
   * Raise the signal. Returns false when it was already set.
   */
  set(reason: string = 'stopped'): boolean {
    if (this.setAt !== null) {
      return false;
    }
    this.setAt = Date.now();
    this.reason = reason;
    return true;
  }

  get isSet(): boolean {
    return this.setAt !== null;
  }

  getReason(): string | null {
    return this.reason;
  }
}
