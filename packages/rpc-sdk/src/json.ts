/**
 * JSON value engine used as the RPC wire format.
 *
 * Unlike `JSON.parse`, values keep the int/float distinction of their source text (ints are
 * `bigint` in the int64 range) and objects serialize with their keys in lexicographic order,
 * so two equal objects always produce the same bytes.
 */

export type JsonNull = { readonly kind: "null" };
export type JsonBool = { readonly kind: "bool"; readonly value: boolean };
export type JsonInt = { readonly kind: "int"; readonly value: bigint };
export type JsonFloat = { readonly kind: "float"; readonly value: number };
export type JsonString = { readonly kind: "string"; readonly value: string };
export type JsonArray = { readonly kind: "array"; readonly items: JsonValue[] };
export type JsonObject = { readonly kind: "object"; readonly entries: Map<string, JsonValue> };

export type JsonValue = JsonNull | JsonBool | JsonInt | JsonFloat | JsonString | JsonArray | JsonObject;
export type JsonKind = JsonValue["kind"];

/** Plain JS data accepted by {@link toJsonValue}. */
export type PlainJson =
  | null
  | boolean
  | number
  | bigint
  | string
  | readonly PlainJson[]
  | { readonly [key: string]: PlainJson };

export class JsonParseError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "JsonParseError";
  }
}

export class JsonTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonTypeError";
  }
}

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

export const JSON_NULL: JsonNull = Object.freeze({ kind: "null" });

export function jsonBool(value: boolean): JsonBool {
  return { kind: "bool", value };
}

export function jsonInt(value: bigint | number): JsonInt {
  if (typeof value === "number") {
    if (!Number.isInteger(value)) throw new JsonTypeError(`not an integer: ${value}`);
    value = BigInt(value);
  }
  if (value < INT64_MIN || value > INT64_MAX) throw new JsonTypeError("integer outside int64 range");
  return { kind: "int", value };
}

export function jsonFloat(value: number): JsonFloat {
  return { kind: "float", value };
}

export function jsonString(value: string): JsonString {
  return { kind: "string", value };
}

export function jsonArray(items: JsonValue[] = []): JsonArray {
  return { kind: "array", items };
}

export function jsonObject(entries: Iterable<readonly [string, JsonValue]> = []): JsonObject {
  const map = new Map<string, JsonValue>();
  for (const [k, v] of entries) map.set(k, v);
  return { kind: "object", entries: map };
}

/**
 * Converts plain JS data. Integral numbers become ints; use {@link jsonFloat} for a float
 * whose value happens to be integral.
 */
export function toJsonValue(plain: PlainJson): JsonValue {
  if (plain === null) return JSON_NULL;
  switch (typeof plain) {
    case "boolean":
      return jsonBool(plain);
    case "bigint":
      return jsonInt(plain);
    case "number":
      return Number.isSafeInteger(plain) ? jsonInt(plain) : jsonFloat(plain);
    case "string":
      return jsonString(plain);
  }
  if (isPlainArray(plain)) return jsonArray(plain.map(toJsonValue));
  return jsonObject(Object.entries(plain).map(([k, v]) => [k, toJsonValue(v)] as const));
}

function isPlainArray(v: PlainJson): v is readonly PlainJson[] {
  return Array.isArray(v);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

class Parser {
  pos = 0;

  constructor(private readonly src: string) {}

  fail(message: string): never {
    throw new JsonParseError(`${message} at offset ${this.pos}`, this.pos);
  }

  skipWs(): void {
    while (this.pos < this.src.length) {
      const c = this.src[this.pos];
      if (c === " " || c === "\t" || c === "\r" || c === "\n") this.pos++;
      else break;
    }
  }

  peek(): string | undefined {
    this.skipWs();
    return this.src[this.pos];
  }

  expect(ch: string): void {
    const got = this.peek();
    if (got === undefined) this.fail(`Unexpected end of input, expected '${ch}'`);
    if (got !== ch) this.fail(`Expected '${ch}', got '${got}'`);
    this.pos++;
  }

  parseValue(): JsonValue {
    const c = this.peek();
    if (c === undefined) this.fail("Unexpected end of input");
    if (c === "{") return this.parseObject();
    if (c === "[") return this.parseArray();
    if (c === '"') return jsonString(this.parseString());
    if (c === "t") return this.parseKeyword("true", jsonBool(true));
    if (c === "f") return this.parseKeyword("false", jsonBool(false));
    if (c === "n") return this.parseKeyword("null", JSON_NULL);
    if (c === "-" || (c >= "0" && c <= "9")) return this.parseNumber();
    this.fail(`Unexpected character '${c}'`);
  }

  parseKeyword(word: string, value: JsonValue): JsonValue {
    if (this.src.startsWith(word, this.pos)) {
      this.pos += word.length;
      return value;
    }
    this.fail(`Invalid literal, expected '${word}'`);
  }

  parseObject(): JsonObject {
    this.expect("{");
    const out = jsonObject();
    if (this.peek() === "}") {
      this.pos++;
      return out;
    }
    for (;;) {
      if (this.peek() !== '"') this.fail("Expected string key");
      const key = this.parseString();
      this.expect(":");
      out.entries.set(key, this.parseValue());
      const sep = this.peek();
      if (sep === undefined) this.fail("Unexpected end of input in object");
      if (sep !== "," && sep !== "}") this.fail("Expected ',' or '}'");
      this.pos++;
      if (sep === "}") return out;
    }
  }

  parseArray(): JsonArray {
    this.expect("[");
    const out = jsonArray();
    if (this.peek() === "]") {
      this.pos++;
      return out;
    }
    for (;;) {
      out.items.push(this.parseValue());
      const sep = this.peek();
      if (sep === undefined) this.fail("Unexpected end of input in array");
      if (sep !== "," && sep !== "]") this.fail("Expected ',' or ']'");
      this.pos++;
      if (sep === "]") return out;
    }
  }

  parseString(): string {
    this.expect('"');
    let out = "";
    while (this.pos < this.src.length) {
      const c = this.src[this.pos++]!;
      if (c === '"') return out;
      if (c !== "\\") {
        out += c;
        continue;
      }
      const e = this.src[this.pos++];
      if (e === undefined) this.fail("Unterminated string");
      switch (e) {
        case '"':
        case "\\":
        case "/":
          out += e;
          break;
        case "b":
          out += "\b";
          break;
        case "f":
          out += "\f";
          break;
        case "n":
          out += "\n";
          break;
        case "r":
          out += "\r";
          break;
        case "t":
          out += "\t";
          break;
        case "u":
          out += String.fromCharCode(this.parseHex4());
          break;
        default:
          this.pos--;
          this.fail(`Invalid escape '\\${e}'`);
      }
    }
    this.fail("Unterminated string");
  }

  parseHex4(): number {
    if (this.pos + 4 > this.src.length) this.fail("Truncated \\u escape");
    const hex = this.src.slice(this.pos, this.pos + 4);
    if (!/^[0-9a-fA-F]{4}$/.test(hex)) this.fail("Bad hex in \\u escape");
    this.pos += 4;
    return Number.parseInt(hex, 16);
  }

  parseNumber(): JsonInt | JsonFloat {
    const start = this.pos;
    let isFloat = false;
    if (this.src[this.pos] === "-") this.pos++;
    if (!this.skipDigits()) this.fail("Expected digit");
    if (this.src[this.pos] === ".") {
      isFloat = true;
      this.pos++;
      if (!this.skipDigits()) this.fail("Expected digit after '.'");
    }
    const e = this.src[this.pos];
    if (e === "e" || e === "E") {
      isFloat = true;
      this.pos++;
      const sign = this.src[this.pos];
      if (sign === "+" || sign === "-") this.pos++;
      if (!this.skipDigits()) this.fail("Expected digit in exponent");
    }
    const text = this.src.slice(start, this.pos);
    if (isFloat) return jsonFloat(Number(text));
    const n = BigInt(text);
    if (n < INT64_MIN || n > INT64_MAX) {
      this.pos = start;
      this.fail("Integer out of int64 range");
    }
    return { kind: "int", value: n };
  }

  skipDigits(): boolean {
    const start = this.pos;
    while (this.pos < this.src.length) {
      const c = this.src[this.pos]!;
      if (c < "0" || c > "9") break;
      this.pos++;
    }
    return this.pos > start;
  }
}

export function parseJson(text: string): JsonValue {
  const p = new Parser(text);
  const value = p.parseValue();
  p.skipWs();
  if (p.pos !== text.length) p.fail("Trailing content after JSON value");
  return value;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function quote(s: string): string {
  let out = '"';
  for (const ch of s) {
    switch (ch) {
      case '"':
        out += '\\"';
        break;
      case "\\":
        out += "\\\\";
        break;
      case "\b":
        out += "\\b";
        break;
      case "\f":
        out += "\\f";
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      default: {
        const code = ch.charCodeAt(0);
        out += code < 0x20 ? `\\u${code.toString(16).padStart(4, "0")}` : ch;
      }
    }
  }
  return out + '"';
}

function trimFraction(s: string): string {
  if (!s.includes(".")) return s;
  return s.replace(/0+$/, "").replace(/\.$/, "");
}

/** `%.17g`, plus a `.0` suffix when the text would otherwise read back as an int. */
export function formatFloat(x: number): string {
  if (!Number.isFinite(x)) return "null";
  if (x === 0) return Object.is(x, -0) ? "-0.0" : "0.0";
  const [mantissa = "", expText = "0"] = x.toExponential(16).split("e");
  const exp = Number(expText);
  let out: string;
  if (exp < -4 || exp >= 17) {
    const sign = exp < 0 ? "-" : "+";
    out = `${trimFraction(mantissa)}e${sign}${String(Math.abs(exp)).padStart(2, "0")}`;
  } else {
    out = trimFraction(x.toFixed(16 - exp));
  }
  return /[.e]/.test(out) ? out : `${out}.0`;
}

/** Orders by code point, which matches the order of the keys' UTF-8 bytes. */
export function compareKeys(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }
  return a.length - i - (b.length - j);
}

export function sortedKeys(obj: JsonObject): string[] {
  return [...obj.entries.keys()].sort(compareKeys);
}

function dump(value: JsonValue, indent: number | undefined, depth: number): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return value.value.toString();
    case "float":
      return formatFloat(value.value);
    case "string":
      return quote(value.value);
    case "array": {
      if (value.items.length === 0) return "[]";
      const parts = value.items.map((item) => dump(item, indent, depth + 1));
      return wrap("[", "]", parts, indent, depth);
    }
    case "object": {
      if (value.entries.size === 0) return "{}";
      const sep = indent === undefined ? ":" : ": ";
      const parts = sortedKeys(value).map(
        (k) => `${quote(k)}${sep}${dump(value.entries.get(k) ?? JSON_NULL, indent, depth + 1)}`,
      );
      return wrap("{", "}", parts, indent, depth);
    }
  }
}

function wrap(open: string, close: string, parts: string[], indent: number | undefined, depth: number): string {
  if (indent === undefined) return open + parts.join(",") + close;
  const inner = " ".repeat((depth + 1) * indent);
  const outer = " ".repeat(depth * indent);
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${outer}${close}`;
}

/** Compact when `indent` is omitted, otherwise pretty-printed with `indent` spaces per level. */
export function serializeJson(value: JsonValue, indent?: number): string {
  if (indent !== undefined && (!Number.isInteger(indent) || indent < 0)) {
    throw new RangeError("indent must be a non-negative integer");
  }
  return dump(value, indent, 0);
}

// ---------------------------------------------------------------------------
// Access
// ---------------------------------------------------------------------------

export type JsonTarget = "bool" | "number" | "bigint" | "string";

export function getAs(value: JsonValue, target: "bool"): boolean;
export function getAs(value: JsonValue, target: "number"): number;
export function getAs(value: JsonValue, target: "bigint"): bigint;
export function getAs(value: JsonValue, target: "string"): string;
export function getAs(value: JsonValue, target: JsonTarget): boolean | number | bigint | string {
  switch (target) {
    case "bool":
      if (value.kind === "bool") return value.value;
      break;
    case "number":
      if (value.kind === "int") return Number(value.value);
      if (value.kind === "float") return value.value;
      break;
    case "bigint":
      if (value.kind === "int") return value.value;
      if (value.kind === "float" && Number.isFinite(value.value)) return BigInt(Math.trunc(value.value));
      break;
    case "string":
      if (value.kind === "string") return value.value;
      break;
  }
  throw new JsonTypeError(`cannot read ${value.kind} as ${target}`);
}

/**
 * Reads `key` of an object, falling back to `fallback` when the receiver is not an object, the
 * key is absent or null, or the stored value does not convert to the fallback's type.
 */
export function valueOr(value: JsonValue, key: string, fallback: boolean): boolean;
export function valueOr(value: JsonValue, key: string, fallback: number): number;
export function valueOr(value: JsonValue, key: string, fallback: bigint): bigint;
export function valueOr(value: JsonValue, key: string, fallback: string): string;
export function valueOr(
  value: JsonValue,
  key: string,
  fallback: boolean | number | bigint | string,
): boolean | number | bigint | string {
  if (value.kind !== "object") return fallback;
  const v = value.entries.get(key);
  if (v === undefined || v.kind === "null") return fallback;
  try {
    switch (typeof fallback) {
      case "boolean":
        return getAs(v, "bool");
      case "number":
        return getAs(v, "number");
      case "bigint":
        return getAs(v, "bigint");
      case "string":
        return getAs(v, "string");
    }
  } catch (e) {
    if (e instanceof JsonTypeError) return fallback;
    throw e;
  }
}

/** Read access that never fails: a missing key, bad index or wrong kind yields `JSON_NULL`. */
export function at(value: JsonValue, key: string | number): JsonValue {
  if (typeof key === "number") {
    if (value.kind !== "array") return JSON_NULL;
    return value.items[key] ?? JSON_NULL;
  }
  if (value.kind !== "object") return JSON_NULL;
  return value.entries.get(key) ?? JSON_NULL;
}

export function setKey(value: JsonValue, key: string, item: JsonValue): void {
  if (value.kind !== "object") throw new JsonTypeError(`cannot set key '${key}' on ${value.kind}`);
  value.entries.set(key, item);
}

export function pushItem(value: JsonValue, item: JsonValue): void {
  if (value.kind !== "array") throw new JsonTypeError(`cannot append to ${value.kind}`);
  value.items.push(item);
}

export function hasKey(value: JsonValue, key: string): boolean {
  return value.kind === "object" && value.entries.has(key);
}

export function sizeOf(value: JsonValue): number {
  if (value.kind === "array") return value.items.length;
  if (value.kind === "object") return value.entries.size;
  return 0;
}

export function itemsOf(value: JsonValue): readonly JsonValue[] {
  return value.kind === "array" ? value.items : [];
}

export function keysOf(value: JsonValue): string[] {
  return value.kind === "object" ? sortedKeys(value) : [];
}

export function isNumber(value: JsonValue): value is JsonInt | JsonFloat {
  return value.kind === "int" || value.kind === "float";
}
