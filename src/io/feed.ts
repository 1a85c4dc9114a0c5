import type { InputRecord } from "./input";

/**
 * Reads at most one input record per tick. A record stamped for a later
 * tick is held, and nothing more is read until the clock reaches it.
 */
export class ArrivalFeed {
  private pending: InputRecord | undefined;
  private done = false;

  constructor(private readonly records: AsyncIterator<InputRecord | null>) {}

  get exhausted(): boolean {
    return this.done && this.pending === undefined;
  }

  async takeDue(now: number): Promise<InputRecord | undefined> {
    const record = this.pending ?? (await this.pull());
    if (record === undefined) return undefined;

    if (record.time > now) {
      this.pending = record;
      return undefined;
    }

    this.pending = undefined;
    return record;
  }

  private async pull(): Promise<InputRecord | undefined> {
    if (this.done) return undefined;

    const next = await this.records.next();
    if (next.done) {
      this.done = true;
      return undefined;
    }
    return next.value ?? undefined;
  }
}
