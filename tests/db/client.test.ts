import { describe, expect, it } from "vitest";
import { toPoolConfig } from "../../src/db/client";

describe("toPoolConfig", () => {
  it("passes a connection string through", () => {
    expect(toPoolConfig({ connectionString: "postgres://localhost/dw", ssl: true })).toEqual({
      connectionString: "postgres://localhost/dw",
      ssl: { rejectUnauthorized: false },
      connectionTimeoutMillis: 10_000,
      idleTimeoutMillis: 30_000,
      max: 5,
      keepAlive: true,
    });
  });

  it("maps discrete settings without ssl", () => {
    const config = toPoolConfig({
      host: "db",
      port: 5433,
      database: "dw",
      user: "etl",
      password: "test-secret",
      ssl: false,
    });
    expect(config.ssl).toBeUndefined();
    expect(config).toMatchObject({ host: "db", port: 5433, database: "dw", user: "etl" });
  });
});
