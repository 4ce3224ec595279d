// ──────────────────────────────────────────────
// Switchboard - Sample Function Configurations
// ──────────────────────────────────────────────

import { count } from "drizzle-orm";
import type { Database } from "./connection.js";
import { functionConfigs } from "./schema/index.js";

type SampleConfig = typeof functionConfigs.$inferInsert;

export const SAMPLE_FUNCTION_CONFIGS: readonly SampleConfig[] = [
  {
    name: "JSONPlaceholder Posts",
    description: "Fetch sample posts from JSONPlaceholder API",
    endpointUrl: "https://jsonplaceholder.typicode.com/posts",
    httpMethod: "GET",
    timeoutSeconds: 10,
    buttonColor: "primary",
    displayOrder: 1,
  },
  {
    name: "Create Post",
    description: "Create a new post via JSONPlaceholder API",
    endpointUrl: "https://jsonplaceholder.typicode.com/posts",
    httpMethod: "POST",
    headers: { "Content-Type": "application/json" },
    payload: { title: "Sample Post", body: "This is a sample post created from the dashboard", userId: 1 },
    timeoutSeconds: 15,
    buttonColor: "positive",
    displayOrder: 2,
  },
  {
    name: "HTTPBin Echo",
    description: "Test API call with HTTPBin echo service",
    endpointUrl: "https://httpbin.org/post",
    httpMethod: "POST",
    headers: { "Content-Type": "application/json" },
    payload: { message: "Hello from Switchboard!", timestamp: "2024-01-01T00:00:00Z" },
    timeoutSeconds: 20,
    buttonColor: "accent",
    displayOrder: 3,
  },
];

/** Inserts the sample configurations into an empty table. Returns how many rows were written. */
export async function seedSampleData(db: Database): Promise<number> {
  const [existing] = await db.select({ total: count() }).from(functionConfigs);
  if ((existing?.total ?? 0) > 0) {
    return 0;
  }

  const inserted = await db
    .insert(functionConfigs)
    .values([...SAMPLE_FUNCTION_CONFIGS])
    .returning({ id: functionConfigs.id });

  return inserted.length;
}
