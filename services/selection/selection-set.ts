import type { CandidateRecord } from "./types.js";

export class SelectionInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SelectionInvariantError";
    Object.setPrototypeOf(this, SelectionInvariantError.prototype);
  }
}

/**
 * The working selection: an id → record index plus the ordered list of selected ids.
 * Members are only ever appended (while building) or swapped in place (while repairing),
 * so ids stay unique and positions stay stable.
 */
export class SelectionSet {
  private readonly byId = new Map<string, CandidateRecord>();
  private readonly order: string[] = [];

  get size(): number {
    return this.order.length;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Record at `position`; throws on an out-of-range position. */
  at(position: number): CandidateRecord {
    const id = this.order[position];
    const record = id === undefined ? undefined : this.byId.get(id);
    if (!record) {
      throw new SelectionInvariantError(`No selection member at position ${position}`);
    }
    return record;
  }

  add(record: CandidateRecord): void {
    if (this.byId.has(record.id)) {
      throw new SelectionInvariantError(`City ${record.id} is already selected`);
    }
    this.byId.set(record.id, record);
    this.order.push(record.id);
  }

  /** Swap the member at `position` for `record`. Returns the removed member. */
  replaceAt(position: number, record: CandidateRecord): CandidateRecord {
    const removed = this.at(position);
    if (record.id !== removed.id && this.byId.has(record.id)) {
      throw new SelectionInvariantError(`City ${record.id} is already selected`);
    }
    this.byId.delete(removed.id);
    this.byId.set(record.id, record);
    this.order[position] = record.id;
    return removed;
  }

  toArray(): CandidateRecord[] {
    return this.order.map((_, i) => this.at(i));
  }

  ids(): string[] {
    return [...this.order];
  }
}
