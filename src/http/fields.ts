import { WireError } from "../utils/errors.js";

const TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const BAD_VALUE_RE = /[\r\n\0]/;

export type Field = Readonly<{ name: string; value: string }>;

// validateFieldName rejects names that are not HTTP tokens.
export function validateFieldName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: `invalid field name ${JSON.stringify(name)}` });
  }
}

// validateFieldValue rejects values that would break the line framing.
export function validateFieldValue(value: string): void {
  if (BAD_VALUE_RE.test(value)) {
    throw new WireError({ code: "invalid_input", stage: "validate", message: "field value contains CR, LF or NUL" });
  }
}

// Fields is an ordered header field list with case-insensitive lookup.
export class Fields implements Iterable<Field> {
  private list: Field[] = [];

  constructor(init?: Iterable<readonly [string, string]> | Readonly<Record<string, string>>) {
    if (init == null) return;
    const entries: Iterable<readonly [string, string]> = isIterable(init) ? init : Object.entries(init);
    for (const [name, value] of entries) this.add(name, value);
  }

  get size(): number {
    return this.list.length;
  }

  // get returns the first value for name.
  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.list.find((f) => f.name.toLowerCase() === key)?.value;
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.list.filter((f) => f.name.toLowerCase() === key).map((f) => f.value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  // add appends a field, keeping any existing fields with the same name.
  add(name: string, value: string | number): this {
    const v = String(value);
    validateFieldName(name);
    validateFieldValue(v);
    this.list.push({ name, value: v });
    return this;
  }

  // set replaces every field with the same name; the new field takes the first one's position.
  set(name: string, value: string | number): this {
    const v = String(value);
    validateFieldName(name);
    validateFieldValue(v);
    const key = name.toLowerCase();
    const idx = this.list.findIndex((f) => f.name.toLowerCase() === key);
    if (idx < 0) {
      this.list.push({ name, value: v });
      return this;
    }
    this.list = this.list.filter((f, i) => i === idx || f.name.toLowerCase() !== key);
    this.list[idx] = { name, value: v };
    return this;
  }

  delete(name: string): boolean {
    const key = name.toLowerCase();
    const before = this.list.length;
    this.list = this.list.filter((f) => f.name.toLowerCase() !== key);
    return this.list.length !== before;
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.list[Symbol.iterator]();
  }
}

// tokenList splits a comma-separated token list (Connection, Transfer-Encoding) into lowercase tokens.
export function tokenList(value: string | undefined): string[] {
  if (value == null) return [];
  return value
    .split(",")
    .map((t) => t.trim().toLowerCase())
    .filter((t) => t !== "");
}

function isIterable(v: unknown): v is Iterable<readonly [string, string]> {
  return typeof v === "object" && v !== null && Symbol.iterator in v;
}
