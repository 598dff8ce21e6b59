import { test } from "node:test";
import assert from "node:assert/strict";
import { InMemoryQuotaStore, usageDay } from "../src/services/quota/inMemoryQuotaStore.js";
import { PostgresQuotaStore, type QuotaQueryClient } from "../src/services/quota/postgresQuotaStore.js";

class RecordingClient implements QuotaQueryClient {
  readonly calls: Array<{ text: string; values: unknown[] }> = [];

  constructor(private readonly rows: (text: string) => unknown[]) {}

  async query(text: string, values: unknown[]): Promise<{ rows: unknown[] }> {
    this.calls.push({ text: text.replace(/\s+/g, " ").trim(), values });
    return { rows: this.rows(text) };
  }
}

test("usageDay is the UTC calendar day", () => {
  assert.equal(usageDay(new Date("2024-10-15T23:59:59Z")), "2024-10-15");
});

test("in-memory counters are kept per provider and per day", async () => {
  let now = new Date("2024-10-15T10:00:00Z");
  const store = new InMemoryQuotaStore(() => now);

  assert.equal(await store.increment("google_cloud_vision"), 1);
  assert.equal(await store.increment("google_cloud_vision"), 2);
  assert.equal(await store.currentCount("google_cloud_vision"), 2);
  assert.equal(await store.currentCount("azure_form_recognizer"), 0);

  now = new Date("2024-10-16T00:00:01Z");
  assert.equal(await store.currentCount("google_cloud_vision"), 0);
});

test("concurrent in-memory increments are all counted", async () => {
  const store = new InMemoryQuotaStore();
  await Promise.all(Array.from({ length: 25 }, () => store.increment("azure_form_recognizer")));
  assert.equal(await store.currentCount("azure_form_recognizer"), 25);
});

test("the postgres store upserts and returns the new count", async () => {
  const client = new RecordingClient((text) => (text.includes("RETURNING") ? [{ request_count: "3" }] : []));
  const store = new PostgresQuotaStore(client, () => new Date("2024-10-15T10:00:00Z"));

  assert.equal(await store.increment("google_cloud_vision"), 3);
  assert.equal(client.calls.length, 2);
  assert.match(client.calls[0]?.text ?? "", /^CREATE TABLE IF NOT EXISTS ocr_provider_usage/);
  assert.match(client.calls[1]?.text ?? "", /ON CONFLICT \(provider, usage_day\) DO UPDATE SET/);
  assert.deepEqual(client.calls[1]?.values, ["google_cloud_vision", "2024-10-15"]);
});

test("the postgres store creates its table once and reads zero for an unused day", async () => {
  const client = new RecordingClient(() => []);
  const store = new PostgresQuotaStore(client, () => new Date("2024-10-15T10:00:00Z"));

  assert.equal(await store.currentCount("azure_form_recognizer"), 0);
  assert.equal(await store.currentCount("azure_form_recognizer"), 0);
  assert.equal(client.calls.filter((call) => call.text.startsWith("CREATE TABLE")).length, 1);
  assert.deepEqual(client.calls[2]?.values, ["azure_form_recognizer", "2024-10-15"]);
});
