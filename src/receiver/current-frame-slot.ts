/**
 * Single-item, overwrite-on-arrival holder for the most recent frame.
 *
 * Writers tag each value with its arrival number and only a newer arrival
 * replaces the stored value, so a slow decode that finishes after a later
 * one never rolls the display back. The swap is one synchronous assignment;
 * readers get either the previous or the next value, never a mix.
 */
export class CurrentFrameSlot<T> {
  private _value: T | null = null;
  private _arrival = 0;
  private _version = 0;

  /**
   * Replace the stored value if `arrival` is newer than the stored one.
   * Returns whether the swap happened.
   */
  swapIfNewer(value: T, arrival: number): boolean {
    if (arrival <= this._arrival) {
      return false;
    }
    this._value = value;
    this._arrival = arrival;
    this._version++;
    return true;
  }

  read(): T | null {
    return this._value;
  }

  /** Incremented on every successful swap */
  get version(): number {
    return this._version;
  }

  /**
   * Drop the stored value. The arrival watermark is kept, so a decode that
   * started before the clear cannot repopulate the slot.
   */
  clear(): void {
    this._value = null;
    this._version = 0;
  }
}
