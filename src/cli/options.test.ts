import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";

import {
  buildUpdatePatch,
  collect,
  parseBoolean,
  parseId,
  parseJson,
  parseNullableNumber,
  parseNumber,
} from "./options.js";

describe("option parsers", () => {
  it("accepts positive integer ids only", () => {
    expect(parseId("12")).toBe(12);
    expect(() => parseId("0")).toThrow(InvalidArgumentError);
    expect(() => parseId("1.5")).toThrow("Expected a positive integer id.");
  });

  it("parses numbers and the none keyword", () => {
    expect(parseNumber("2.5")).toBe(2.5);
    expect(() => parseNumber(" ")).toThrow("Expected a number.");
    expect(parseNullableNumber("None")).toBeNull();
    expect(parseNullableNumber("4")).toBe(4);
  });

  it("parses booleans and JSON", () => {
    expect(parseBoolean("Yes")).toBe(true);
    expect(parseBoolean("off")).toBe(false);
    expect(() => parseBoolean("maybe")).toThrow("Expected true or false.");
    expect(parseJson('{"a":1}')).toEqual({ a: 1 });
    expect(() => parseJson("{")).toThrow("Expected valid JSON.");
  });

  it("collects repeated values", () => {
    expect(collect("b", collect("a"))).toEqual(["a", "b"]);
  });
});

describe("buildUpdatePatch", () => {
  it("lets explicit flags win and drops unset ones", () => {
    expect(
      buildUpdatePatch(
        { name: "Flag name", estimate_hours: null, order: undefined },
        { name: "Patch name", order: 4, inputs: { a: 1 } },
      ),
    ).toEqual({ name: "Flag name", estimate_hours: null, order: 4, inputs: { a: 1 } });
  });

  it("ignores a patch that is not an object", () => {
    expect(buildUpdatePatch({ name: "Only" }, [1, 2])).toEqual({ name: "Only" });
  });
});
