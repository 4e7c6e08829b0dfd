import { getDb } from "../db";
import type { HealthRecord } from "./backend-health";
import type { HealthStore } from "./health-store";

type BackendHealthRow = {
  backend_id: string;
  rolling_success_rate: number;
  last_failure_at_millis: string | null;
};

export class PostgresHealthStore implements HealthStore {
  async save(record: HealthRecord): Promise<void> {
    await getDb().query(
      "INSERT INTO backend_health (backend_id, rolling_success_rate, last_failure_at_millis, updated_at) VALUES ($1, $2, $3, NOW()) ON CONFLICT (backend_id) DO UPDATE SET rolling_success_rate = EXCLUDED.rolling_success_rate, last_failure_at_millis = EXCLUDED.last_failure_at_millis, updated_at = NOW()",
      [record.backendId, record.rollingSuccessRate, record.lastFailureAtMillis]
    );
  }

  async loadAll(): Promise<HealthRecord[]> {
    const result = await getDb().query<BackendHealthRow>(
      "SELECT backend_id, rolling_success_rate, last_failure_at_millis FROM backend_health ORDER BY backend_id ASC"
    );
    return result.rows.map((row) => this.mapRecord(row));
  }

  // BIGINT comes back from pg as a string
  private mapRecord(row: BackendHealthRow): HealthRecord {
    return {
      backendId: row.backend_id,
      rollingSuccessRate: Number(row.rolling_success_rate),
      lastFailureAtMillis: row.last_failure_at_millis === null ? null : Number(row.last_failure_at_millis)
    };
  }
}
