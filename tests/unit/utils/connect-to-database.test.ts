import { describe, expect, it } from "vitest";
import { buildClientOptions, resolveUri } from "../../../src/utils/connect-to-database";

describe("resolveUri", () => {
  it("should prefer an explicit uri", () => {
    expect(resolveUri({ uri: "mongodb://db.internal:27000", host: "ignored" })).toBe(
      "mongodb://db.internal:27000",
    );
  });

  it("should fall back to host and port", () => {
    expect(resolveUri({})).toBe("mongodb://localhost:27017");
    expect(resolveUri({ host: "db", port: 27018 })).toBe("mongodb://db:27018");
  });
});

describe("buildClientOptions", () => {
  it("should add credentials and auth source", () => {
    expect(
      buildClientOptions({
        username: "app",
        password: "test-secret",
        authSource: "admin",
        clientOptions: { maxPoolSize: 5 },
      }),
    ).toEqual({
      maxPoolSize: 5,
      auth: { username: "app", password: "test-secret" },
      authSource: "admin",
    });
  });

  it("should not override the native client options", () => {
    expect(
      buildClientOptions({
        username: "app",
        authSource: "admin",
        clientOptions: { auth: { username: "other" }, authSource: "users" },
      }),
    ).toEqual({ auth: { username: "other" }, authSource: "users" });
  });
});
