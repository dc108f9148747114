import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "./errors.js";
import { canonicalJson, computeVectorId, normalizeText } from "./vector-id.js";
import { segmentMetadata } from "./test-helpers/fakes.js";

describe("canonicalJson", () => {
  it("sorts keys at every depth and keeps array order", () => {
    expect(canonicalJson({ b: [1, { d: 1, c: 2 }], a: null })).toBe(
      '{"a":null,"b":[1,{"c":2,"d":1}]}',
    );
  });

  it("skips undefined fields", () => {
    expect(canonicalJson({ a: 1, b: undefined })).toBe('{"a":1}');
  });
});

describe("normalizeText", () => {
  it("collapses and trims whitespace", () => {
    expect(normalizeText("  a \n\t b  ")).toBe("a b");
  });
});

describe("computeVectorId", () => {
  it("is a stable sha256 hex digest", () => {
    const id = computeVectorId("Some sentence.", segmentMetadata(1));
    expect(id).toMatch(/^[0-9a-f]{64}$/);
    expect(computeVectorId("Some sentence.", segmentMetadata(1))).toBe(id);
  });

  it("does not depend on metadata key order", () => {
    expect(computeVectorId("t", { a: 1, b: 2 })).toBe(computeVectorId("t", { b: 2, a: 1 }));
  });

  it("treats whitespace variants of the same text as one entry", () => {
    expect(computeVectorId("a  b", { x: 1 })).toBe(computeVectorId(" a b ", { x: 1 }));
  });

  it("changes when any metadata field changes", () => {
    expect(computeVectorId("t", segmentMetadata(1))).not.toBe(
      computeVectorId("t", segmentMetadata(2)),
    );
  });

  it("rejects non-string text and non-object metadata", () => {
    expect(() => computeVectorId(42, {})).toThrow(InvalidArgumentError);
    expect(() => computeVectorId("x", null)).toThrow(InvalidArgumentError);
    expect(() => computeVectorId("x", ["a"])).toThrow(
      "Argument 'metadata' must be an object, received array",
    );
  });
});
