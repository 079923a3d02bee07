import { describe, it, expect } from "vitest";
import { type } from "arktype";
import { url, nonEmptyString, positiveInt } from "./common.js";

describe("@spanwise/types - Common Schemas", () => {
  describe("url", () => {
    it("should accept an http URL", () => {
      expect(url("http://localhost:4318") instanceof type.errors).toBe(false);
    });

    it("should reject a bare host", () => {
      expect(url("not a url") instanceof type.errors).toBe(true);
    });
  });

  describe("nonEmptyString", () => {
    it("should reject empty string", () => {
      expect(nonEmptyString("") instanceof type.errors).toBe(true);
    });

    it("should accept single character", () => {
      expect(nonEmptyString("a") instanceof type.errors).toBe(false);
    });
  });

  describe("positiveInt", () => {
    it("should accept 1", () => {
      expect(positiveInt(1) instanceof type.errors).toBe(false);
    });

    it("should reject 0", () => {
      expect(positiveInt(0) instanceof type.errors).toBe(true);
    });

    it("should reject float", () => {
      expect(positiveInt(1.5) instanceof type.errors).toBe(true);
    });
  });
});
