import type { HealthRecord } from "./backend-health";
import type { HealthStore } from "./health-store";

export class InMemoryHealthStore implements HealthStore {
  private readonly records = new Map<string, HealthRecord>();

  async save(record: HealthRecord): Promise<void> {
    this.records.set(record.backendId, { ...record });
  }

  async loadAll(): Promise<HealthRecord[]> {
    return Array.from(this.records.values()).map((record) => ({ ...record }));
  }
}
