import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("defaults the port to 3000", () => {
    expect(loadConfig({ DB_PATH: "rivals.db" })).toEqual({ port: 3000, dbPath: "rivals.db" });
  });

  it("reads PORT", () => {
    expect(loadConfig({ DB_PATH: "rivals.db", PORT: "8080" }).port).toBe(8080);
  });

  it("requires DB_PATH", () => {
    expect(() => loadConfig({ PORT: "8080" })).toThrow("DB_PATH environment variable is required");
  });

  it("rejects a port that is not a number", () => {
    expect(() => loadConfig({ DB_PATH: "rivals.db", PORT: "abc" })).toThrow('PORT must be a non-negative integer, got "abc"');
  });
});
