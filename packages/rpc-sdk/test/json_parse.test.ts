import { describe, expect, it } from "vitest";
import { utf8ToBytes } from "@noble/hashes/utils";
import { JsonParseError, at, getAs, parseJson, sizeOf } from "../src/json.js";

function parseError(text: string): JsonParseError {
  try {
    parseJson(text);
  } catch (e) {
    if (e instanceof JsonParseError) return e;
    throw e;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

describe("parseJson", () => {
  it("keeps the int/float distinction of the source text", () => {
    expect(parseJson("10")).toEqual({ kind: "int", value: 10n });
    expect(parseJson("-0")).toEqual({ kind: "int", value: 0n });
    expect(parseJson("1.0")).toEqual({ kind: "float", value: 1 });
    expect(parseJson("1e3")).toEqual({ kind: "float", value: 1000 });
    expect(parseJson("-2.5E-1")).toEqual({ kind: "float", value: -0.25 });
  });

  it("accepts the full int64 range", () => {
    expect(getAs(parseJson("9223372036854775807"), "bigint")).toBe(9223372036854775807n);
    expect(getAs(parseJson("-9223372036854775808"), "bigint")).toBe(-9223372036854775808n);
  });

  it("rejects integers outside int64", () => {
    const e = parseError("9223372036854775808");
    expect(e.message).toBe("Integer out of int64 range at offset 0");
    expect(e.offset).toBe(0);
  });

  it("parses nested documents with surrounding whitespace", () => {
    const v = parseJson(' \n{"chain": "main", "blocks": 840000, "warnings": [], "flags": [true, false, null]}\t');
    expect(sizeOf(v)).toBe(4);
    expect(getAs(at(v, "chain"), "string")).toBe("main");
    expect(getAs(at(v, "blocks"), "number")).toBe(840000);
    expect(sizeOf(at(v, "warnings"))).toBe(0);
    expect(at(at(v, "flags"), 2).kind).toBe("null");
  });

  it("lets the last duplicate key win", () => {
    expect(getAs(at(parseJson('{"a":1,"a":2}'), "a"), "number")).toBe(2);
  });

  it("decodes escapes", () => {
    expect(getAs(parseJson('"a\\"b\\\\c\\/d\\n\\t"'), "string")).toBe('a"b\\c/d\n\t');
    const accented = getAs(parseJson('"\\u00e9"'), "string");
    expect(Array.from(utf8ToBytes(accented))).toEqual([0xc3, 0xa9]);
  });

  it("combines surrogate pair escapes into one code point", () => {
    const s = getAs(parseJson('"\\ud83d\\ude00"'), "string");
    expect(s.codePointAt(0)).toBe(0x1f600);
    expect(Array.from(utf8ToBytes(s))).toEqual([0xf0, 0x9f, 0x98, 0x80]);
  });

  it("reports malformed input with its offset", () => {
    expect(parseError("").message).toBe("Unexpected end of input at offset 0");
    expect(parseError("[1,2").message).toBe("Unexpected end of input in array at offset 4");
    expect(parseError('{"a":1]').message).toBe("Expected ',' or '}' at offset 6");
    expect(parseError("[1}").message).toBe("Expected ',' or ']' at offset 2");
    expect(parseError("tru").message).toBe("Invalid literal, expected 'true' at offset 0");
    expect(parseError('"\\x"').message).toBe("Invalid escape '\\x' at offset 2");
    expect(parseError('"\\u12"').message).toBe("Truncated \\u escape at offset 3");
    expect(parseError('"\\u12zz"').message).toBe("Bad hex in \\u escape at offset 3");
    expect(parseError('"abc').message).toBe("Unterminated string at offset 4");
    expect(parseError("1.").message).toBe("Expected digit after '.' at offset 2");
    expect(parseError("-").message).toBe("Expected digit at offset 1");
    expect(parseError("1 2").message).toBe("Trailing content after JSON value at offset 2");
    expect(parseError("{1:2}").message).toBe("Expected string key at offset 1");
  });
});
