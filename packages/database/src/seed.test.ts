import test from "node:test";
import assert from "node:assert/strict";
import { asc } from "drizzle-orm";
import { createTestDatabase } from "./testing.js";
import { functionConfigs } from "./schema/index.js";
import { seedSampleData } from "./seed.js";
import { splitStatements } from "./apply-schema.js";

test("splitStatements drops empty chunks around breakpoints", () => {
  const statements = splitStatements("CREATE A;\n--> statement-breakpoint\n\n--> statement-breakpoint\nCREATE B;\n");
  assert.deepEqual(statements, ["CREATE A;", "CREATE B;"]);
});

test("seedSampleData fills an empty table once", async () => {
  const { db, close } = await createTestDatabase();
  try {
    assert.equal(await seedSampleData(db), 3);
    assert.equal(await seedSampleData(db), 0);

    const rows = await db.select().from(functionConfigs).orderBy(asc(functionConfigs.displayOrder));
    assert.deepEqual(
      rows.map((row) => [row.name, row.httpMethod, row.isActive]),
      [
        ["JSONPlaceholder Posts", "GET", true],
        ["Create Post", "POST", true],
        ["HTTPBin Echo", "POST", true],
      ]
    );
    assert.deepEqual(rows[0]?.headers, {});
    assert.equal(rows[1]?.payload["userId"], 1);
  } finally {
    await close();
  }
});
