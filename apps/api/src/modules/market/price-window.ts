import type { PricePoint } from "@paperbot/shared";

/**
 * Fixed-capacity ring of price samples for one asset, oldest first.
 *
 * Appends are O(1) and evict the oldest sample once the ring is full. Reads always
 * return fresh arrays, so callers can hold on to a snapshot while the feed keeps
 * writing. Timestamps must strictly increase; anything else is refused.
 */
export class PriceWindow {
  private readonly slots: Array<PricePoint | undefined>;
  private head = 0;
  private count = 0;
  private newestMs = Number.NEGATIVE_INFINITY;

  constructor(
    readonly asset: string,
    readonly capacity: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`PriceWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<PricePoint | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  append(point: PricePoint): boolean {
    const tsMs = Date.parse(point.ts);
    if (!Number.isFinite(tsMs) || tsMs <= this.newestMs) {
      return false;
    }

    const frozen: PricePoint = Object.freeze({ ts: point.ts, asset: point.asset, price: point.price });
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = frozen;
    if (this.count < this.capacity) {
      this.count += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
    this.newestMs = tsMs;
    return true;
  }

  latest(): PricePoint | null {
    if (this.count === 0) return null;
    return this.slots[(this.head + this.count - 1) % this.capacity] ?? null;
  }

  /** Most recent `limit` samples (all of them when omitted), oldest first. */
  snapshot(limit = this.count): PricePoint[] {
    const take = Math.max(0, Math.min(Math.floor(limit), this.count));
    const out: PricePoint[] = [];
    const start = this.head + this.count - take;
    for (let i = 0; i < take; i += 1) {
      const point = this.slots[(start + i) % this.capacity];
      if (point) out.push(point);
    }
    return out;
  }

  prices(limit = this.count): number[] {
    return this.snapshot(limit).map((p) => p.price);
  }
}
