/** Serial-style id source: 1, 2, 3, ... */
export class IdSequence {
  private current: number;

  constructor(start = 1) {
    this.current = start - 1;
  }

  next(): number {
    this.current += 1;
    return this.current;
  }

  /** Last id handed out, or start - 1 when none has been. */
  get last(): number {
    return this.current;
  }
}
