import { Pool } from "pg";
import { z } from "zod";
import { env } from "../../config/env.js";
import { InMemoryQuotaStore, usageDay } from "./inMemoryQuotaStore.js";
import type { CloudProviderName, QuotaStore } from "../../types/ocr.js";

export interface QuotaQueryClient {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

const countRowSchema = z.object({ request_count: z.coerce.number().int().nonnegative() });

function poolClient(pool: Pool): QuotaQueryClient {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    }
  };
}

/**
 * Daily provider counters in Postgres. The upsert increments and returns
 * the new count in one statement, so concurrent workers cannot lose updates.
 */
export class PostgresQuotaStore implements QuotaStore {
  private schemaEnsured = false;

  constructor(
    private readonly client: QuotaQueryClient = poolClient(
      new Pool({
        connectionString: env.DATABASE_URL,
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000
      })
    ),
    private readonly clock: () => Date = () => new Date()
  ) {}

  async increment(provider: CloudProviderName): Promise<number> {
    await this.ensureSchema();
    const { rows } = await this.client.query(
      `
      INSERT INTO ocr_provider_usage (provider, usage_day, request_count, updated_at)
      VALUES ($1, $2::date, 1, NOW())
      ON CONFLICT (provider, usage_day)
      DO UPDATE SET
        request_count = ocr_provider_usage.request_count + 1,
        updated_at = NOW()
      RETURNING request_count
      `,
      [provider, usageDay(this.clock())]
    );
    return countRowSchema.parse(rows[0]).request_count;
  }

  async currentCount(provider: CloudProviderName): Promise<number> {
    await this.ensureSchema();
    const { rows } = await this.client.query(
      `
      SELECT request_count
      FROM ocr_provider_usage
      WHERE provider = $1 AND usage_day = $2::date
      `,
      [provider, usageDay(this.clock())]
    );
    return rows.length === 0 ? 0 : countRowSchema.parse(rows[0]).request_count;
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) return;
    await this.client.query(
      `
      CREATE TABLE IF NOT EXISTS ocr_provider_usage (
        provider TEXT NOT NULL,
        usage_day DATE NOT NULL,
        request_count INTEGER NOT NULL DEFAULT 0,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (provider, usage_day)
      )
      `,
      []
    );
    this.schemaEnsured = true;
  }
}

export function createQuotaStore(): QuotaStore {
  return env.QUOTA_STORE === "postgres" ? new PostgresQuotaStore() : new InMemoryQuotaStore();
}
