/**
 * Append-only series with a fixed capacity. Once full, further appends are
 * dropped: the earliest samples are kept and the series stops growing.
 */
export class BoundedSeries {
  private _data: number[] = [];

  constructor(readonly capacity: number) {}

  get length(): number {
    return this._data.length;
  }

  get data(): readonly number[] {
    return this._data;
  }

  get full(): boolean {
    return this._data.length >= this.capacity;
  }

  last(): number | undefined {
    return this._data[this._data.length - 1];
  }

  push(value: number): boolean {
    if (this.full) return false;
    this._data.push(value);
    return true;
  }

  toArray(): number[] {
    return this._data.slice();
  }

  clear(): void {
    this._data = [];
  }
}

/**
 * The time, probability and impulse series, kept at equal length.
 */
export class History {
  readonly time: BoundedSeries;
  readonly prob: BoundedSeries;
  readonly impulses: BoundedSeries;

  constructor(readonly capacity: number) {
    this.time = new BoundedSeries(capacity);
    this.prob = new BoundedSeries(capacity);
    this.impulses = new BoundedSeries(capacity);
  }

  get length(): number {
    return this.time.length;
  }

  get full(): boolean {
    return this.time.full;
  }

  append(time: number, prob: number, impulse: number): boolean {
    if (this.full) return false;
    this.time.push(time);
    this.prob.push(prob);
    this.impulses.push(impulse);
    return true;
  }

  clear(): void {
    this.time.clear();
    this.prob.clear();
    this.impulses.clear();
  }
}
