import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { describe, expect, it } from "vitest";

async function migration(): Promise<string> {
  return readFile(resolve(process.cwd(), "sql", "001_fulfillment_ledger.sql"), "utf8");
}

describe("ledger schema", () => {
  it("indexes credentials that are marked missing", async () => {
    const sql = (await migration()).replace(/\s+/g, " ");

    expect(sql).toContain(
      "CREATE INDEX IF NOT EXISTS fl_credentials_missing_since_idx ON fl_credentials (missing_since) WHERE missing_since IS NOT NULL;",
    );
  });
});
