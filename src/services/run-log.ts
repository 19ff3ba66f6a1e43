import { FetchRunStats } from '../types/stats';

/**
 * Fixed-size in-memory history of runs, oldest evicted first
 */
export class FetchRunLog {
  private readonly entries: FetchRunStats[] = [];

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError('Run log capacity must be at least 1');
    }
  }

  record(stats: FetchRunStats): void {
    this.entries.push(stats);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /**
   * Most recent `limit` runs, oldest first
   */
  recent(limit: number = this.capacity): FetchRunStats[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }

  get size(): number {
    return this.entries.length;
  }
}
