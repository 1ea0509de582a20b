/**
 * Single-slot, non-blocking try-lock guarding the encode/transport unit.
 * A failed acquire means the caller drops its work; nothing ever waits.
 */
export class EncodeSlot {
  private _busy = false;

  get busy(): boolean {
    return this._busy;
  }

  tryAcquire(): boolean {
    if (this._busy) return false;
    this._busy = true;
    return true;
  }

  release(): void {
    this._busy = false;
  }
}
