import { config } from "../config";
import { logger } from "../logger";
import type { HealthRecord } from "./backend-health";
import { InMemoryHealthStore } from "./health-store.memory";
import { PostgresHealthStore } from "./health-store.pg";

export interface HealthStore {
  save(record: HealthRecord): Promise<void>;
  loadAll(): Promise<HealthRecord[]>;
}

export class FallbackHealthStore implements HealthStore {
  constructor(
    private readonly primary: HealthStore,
    private readonly fallback: HealthStore
  ) {}

  async save(record: HealthRecord): Promise<void> {
    try {
      await this.primary.save(record);
    } catch (error) {
      logger.warn({ error, backendId: record.backendId }, "Health store write failed; keeping record in memory");
      await this.fallback.save(record);
    }
  }

  async loadAll(): Promise<HealthRecord[]> {
    try {
      return await this.primary.loadAll();
    } catch (error) {
      logger.warn({ error }, "Health store read failed; using in-memory records");
      return this.fallback.loadAll();
    }
  }
}

export function createHealthStore(): HealthStore {
  if (config.useInMemoryStore || !config.db.enabled) {
    return new InMemoryHealthStore();
  }
  return new FallbackHealthStore(new PostgresHealthStore(), new InMemoryHealthStore());
}
