import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { defaultPolicy, resolveOptions } from "./config.js";
import { ValidationError } from "./errors.js";
import { IGNORE, RAISE, STRICT } from "./policy.js";

describe("config", () => {
  let originalPolicy: string | undefined;

  beforeEach(() => {
    originalPolicy = process.env.BIDIMAP_DEFAULT_POLICY;
    delete process.env.BIDIMAP_DEFAULT_POLICY;
  });

  afterEach(() => {
    if (originalPolicy !== undefined) {
      process.env.BIDIMAP_DEFAULT_POLICY = originalPolicy;
    } else {
      delete process.env.BIDIMAP_DEFAULT_POLICY;
    }
  });

  describe("defaultPolicy", () => {
    it("should fall back to strict", () => {
      expect(defaultPolicy()).toBe(STRICT);
      process.env.BIDIMAP_DEFAULT_POLICY = "";
      expect(defaultPolicy()).toBe(STRICT);
    });

    it("should read BIDIMAP_DEFAULT_POLICY", () => {
      process.env.BIDIMAP_DEFAULT_POLICY = "ignore";
      expect(defaultPolicy()).toBe(IGNORE);
    });

    it("should keep the underlying error as the cause", () => {
      process.env.BIDIMAP_DEFAULT_POLICY = "loose";

      try {
        defaultPolicy();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(ValidationError);
      }
    });
  });

  describe("resolveOptions", () => {
    it("should resolve the policy and keep the name", () => {
      expect(resolveOptions({ policy: "raise", name: "Lookup" })).toEqual({ policy: RAISE, name: "Lookup" });
      expect(resolveOptions()).toEqual({ policy: STRICT, name: undefined });
    });

    it("should let an explicit policy win over the environment", () => {
      process.env.BIDIMAP_DEFAULT_POLICY = "ignore";
      expect(resolveOptions({ policy: "raise" }).policy).toBe(RAISE);
    });

    it("should reject names that are not identifiers", () => {
      expect(() => resolveOptions({ name: "two words" })).toThrow(/^Invalid options: name: /);
    });
  });
});
