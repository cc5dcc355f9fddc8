import { describe, it, expect } from "vitest";
import {
  parseDecimal,
  parseInteger,
  formatDecimal,
  parseXsdBoolean,
  parseYesNo,
  formatYesNo,
  inDomain,
  isWellFormedId,
  isXmlText,
} from "./scalars.js";

describe("parseDecimal", () => {
  it("accepts plain, signed and scientific literals", () => {
    expect(parseDecimal("0")).toBe(0);
    expect(parseDecimal("-12.5")).toBe(-12.5);
    expect(parseDecimal("+3")).toBe(3);
    expect(parseDecimal(".25")).toBe(0.25);
    expect(parseDecimal("7.")).toBe(7);
    expect(parseDecimal("1.0000000000000000e+01")).toBe(10);
    expect(parseDecimal("-2.5E-3")).toBe(-0.0025);
  });

  it("rejects non-numeric text and trailing garbage", () => {
    expect(parseDecimal("")).toBeUndefined();
    expect(parseDecimal("abc")).toBeUndefined();
    expect(parseDecimal("1.5m")).toBeUndefined();
    expect(parseDecimal(" 1")).toBeUndefined();
    expect(parseDecimal("0x10")).toBeUndefined();
    expect(parseDecimal("NaN")).toBeUndefined();
    expect(parseDecimal("Infinity")).toBeUndefined();
  });

  it("rejects magnitudes that overflow to infinity", () => {
    expect(parseDecimal("1e400")).toBeUndefined();
  });
});

describe("formatDecimal", () => {
  it("writes the shortest text that parses back to the same value", () => {
    expect(formatDecimal(10)).toBe("10");
    expect(formatDecimal(0.1)).toBe("0.1");
    expect(formatDecimal(1e21)).toBe("1e+21");
    expect(formatDecimal(5e-324)).toBe("5e-324");
  });

  it("keeps the sign of negative zero", () => {
    expect(formatDecimal(-0)).toBe("-0");
    expect(Object.is(parseDecimal(formatDecimal(-0)), -0)).toBe(true);
  });

  it("round-trips awkward doubles exactly", () => {
    for (const value of [Math.PI, -1 / 3, 123456789.123456789, Number.MAX_VALUE, Number.MIN_VALUE]) {
      expect(parseDecimal(formatDecimal(value))).toBe(value);
    }
  });
});

describe("parseInteger", () => {
  it("accepts signed digit strings only", () => {
    expect(parseInteger("-3")).toBe(-3);
    expect(parseInteger("+4")).toBe(4);
    expect(parseInteger("1.0")).toBeUndefined();
    expect(parseInteger("1e2")).toBeUndefined();
    expect(parseInteger("99999999999999999999")).toBeUndefined();
  });
});

describe("booleans", () => {
  it("reads the xs:boolean lexical forms", () => {
    expect(parseXsdBoolean("true")).toBe(true);
    expect(parseXsdBoolean("1")).toBe(true);
    expect(parseXsdBoolean("false")).toBe(false);
    expect(parseXsdBoolean("0")).toBe(false);
    expect(parseXsdBoolean("True")).toBeUndefined();
  });

  it("reads and writes yes/no", () => {
    expect(parseYesNo("yes")).toBe(true);
    expect(parseYesNo("no")).toBe(false);
    expect(parseYesNo("true")).toBeUndefined();
    expect(formatYesNo(true)).toBe("yes");
    expect(formatYesNo(false)).toBe("no");
  });
});

describe("inDomain", () => {
  it("checks each numeric domain", () => {
    expect(inDomain(-1, "any")).toBe(true);
    expect(inDomain(0, "nonNegative")).toBe(true);
    expect(inDomain(-0.001, "nonNegative")).toBe(false);
    expect(inDomain(0, "positive")).toBe(false);
    expect(inDomain(1, "unitInterval")).toBe(true);
    expect(inDomain(1.5, "unitInterval")).toBe(false);
  });
});

describe("identifiers and text", () => {
  it("requires ids to be non-empty without whitespace", () => {
    expect(isWellFormedId("road-7")).toBe(true);
    expect(isWellFormedId("-1")).toBe(true);
    expect(isWellFormedId("")).toBe(false);
    expect(isWellFormedId(" 7")).toBe(false);
    expect(isWellFormedId("a b")).toBe(false);
  });

  it("flags characters XML 1.0 cannot carry", () => {
    expect(isXmlText("Main Street & 5th <ave>")).toBe(true);
    expect(isXmlText("tab\tok")).toBe(true);
    expect(isXmlText("bell\u0007")).toBe(false);
    expect(isXmlText("lone \uD800 surrogate")).toBe(false);
    expect(isXmlText("pair 🚗")).toBe(true);
  });
});
