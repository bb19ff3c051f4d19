import type { VisitorRecord } from "../types";
import { byTimeDesc, evictOldest, identityKey } from "../utils";
import type { VisitorTransaction } from "./types";

export const cloneVisitor = (record: VisitorRecord): VisitorRecord => ({
  ...record,
  answers: { ...record.answers },
});

const visitTimeOf = (record: VisitorRecord) => record.visitTime;

/**
 * Whole-collection view of visitor records that the memory and file adapters
 * load, mutate and swap in. Records go in and come out as copies.
 */
export class VisitorSet implements VisitorTransaction {
  private byId: Map<string, VisitorRecord>;
  private dirty = false;

  constructor(records: VisitorRecord[] = []) {
    this.byId = new Map(records.map((record) => [record.id, cloneVisitor(record)]));
  }

  get changed(): boolean {
    return this.dirty;
  }

  get size(): number {
    return this.byId.size;
  }

  /** Stored order; an upsert of an existing id keeps its position. */
  records(): VisitorRecord[] {
    return [...this.byId.values()].map(cloneVisitor);
  }

  fork(): VisitorSet {
    return new VisitorSet([...this.byId.values()]);
  }

  /** Newest match wins when older documents hold several rows for one identity. */
  async findByIdentity(name: string, agentType: string | null): Promise<VisitorRecord | null> {
    const key = identityKey(name, agentType);
    const [newest] = [...this.byId.values()]
      .filter((record) => identityKey(record.name, record.agentType) === key)
      .sort(byTimeDesc(visitTimeOf));
    return newest ? cloneVisitor(newest) : null;
  }

  async findByNameSince(name: string, since: number): Promise<VisitorRecord[]> {
    return [...this.byId.values()]
      .filter((record) => record.name === name && record.visitTime > since)
      .map(cloneVisitor);
  }

  findById(id: string): VisitorRecord | null {
    const record = this.byId.get(id);
    return record ? cloneVisitor(record) : null;
  }

  async upsert(record: VisitorRecord): Promise<void> {
    this.byId.set(record.id, cloneVisitor(record));
    this.dirty = true;
  }

  listRecent(limit: number): VisitorRecord[] {
    return [...this.byId.values()]
      .sort(byTimeDesc(visitTimeOf))
      .slice(0, Math.max(0, limit))
      .map(cloneVisitor);
  }

  trim(maxRecords: number): number {
    const { kept, removed } = evictOldest([...this.byId.values()], maxRecords, visitTimeOf);
    if (removed > 0) {
      this.byId = new Map(kept.map((record) => [record.id, record]));
      this.dirty = true;
    }
    return removed;
  }
}
