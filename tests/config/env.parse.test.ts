/**
 * Table-driven tests covering the environment parsing helpers: boolean,
 * integer, string and enum coercions.
 */
import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readOptionalBool,
  readInt,
  readOptionalInt,
  readOptionalEnum,
  readEnum,
  readOptionalString,
} from "../../src/config/env.js";

const trackedKeys = ["TEST_BOOL", "TEST_INT", "TEST_ENUM", "TEST_STRING"] as const;

/** Stores the original environment variables so each test can restore them. */
const originalEnv: Record<string, string | undefined> = {};

function setEnv(name: (typeof trackedKeys)[number], value: string | undefined): void {
  if (!(name in originalEnv)) {
    originalEnv[name] = process.env[name];
  }

  if (typeof value === "string") {
    process.env[name] = value;
  } else {
    delete process.env[name];
  }
}

describe("config/env helpers", () => {
  afterEach(() => {
    for (const key of trackedKeys) {
      if (!(key in originalEnv)) {
        continue;
      }
      const original = originalEnv[key];
      if (original === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = original;
      }
      delete originalEnv[key];
    }
  });

  it("interprets boolean flags case-insensitively", () => {
    setEnv("TEST_BOOL", "YES");
    expect(readBool("TEST_BOOL", false)).to.equal(true);

    setEnv("TEST_BOOL", "off");
    expect(readOptionalBool("TEST_BOOL")).to.equal(false);

    setEnv("TEST_BOOL", "  ");
    expect(readOptionalBool("TEST_BOOL")).to.equal(undefined);
  });

  it("falls back to defaults when booleans are ambiguous", () => {
    setEnv("TEST_BOOL", "maybe");
    expect(readBool("TEST_BOOL", true)).to.equal(true);
    expect(readOptionalBool("TEST_BOOL")).to.equal(undefined);
  });

  it("reads integers while filtering floats and out-of-range values", () => {
    setEnv("TEST_INT", "42");
    expect(readInt("TEST_INT", 0)).to.equal(42);

    setEnv("TEST_INT", "13.37");
    expect(readOptionalInt("TEST_INT")).to.equal(undefined);

    setEnv("TEST_INT", "5");
    expect(readOptionalInt("TEST_INT", { min: 10 })).to.equal(undefined);
    expect(readInt("TEST_INT", 64, { min: 10 })).to.equal(64);

    setEnv("TEST_INT", String(Number.MAX_SAFE_INTEGER + 10));
    expect(readOptionalInt("TEST_INT")).to.equal(undefined);
  });

  it("accepts enum values using case-insensitive matching", () => {
    setEnv("TEST_ENUM", "WARN");
    expect(readEnum("TEST_ENUM", ["debug", "info", "warn"] as const, "info")).to.equal("warn");

    setEnv("TEST_ENUM", "verbose");
    expect(readEnum("TEST_ENUM", ["debug", "info"] as const, "info")).to.equal("info");

    setEnv("TEST_ENUM", "  DEBUG  ");
    expect(readOptionalEnum("TEST_ENUM", ["debug", "info"] as const)).to.equal("debug");
  });

  it("trims strings and treats blanks as unset", () => {
    setEnv("TEST_STRING", "  /tmp/trace.log  ");
    expect(readOptionalString("TEST_STRING")).to.equal("/tmp/trace.log");

    setEnv("TEST_STRING", "   ");
    expect(readOptionalString("TEST_STRING")).to.equal(undefined);

    setEnv("TEST_STRING", undefined);
    expect(readOptionalString("TEST_STRING")).to.equal(undefined);
  });
});
