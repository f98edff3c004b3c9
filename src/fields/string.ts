import type { SomeJTDSchemaType } from "ajv/dist/jtd";
import { Field } from "./shared.ts";
import type { FieldConstructor, FieldJsonSchema, PayloadLocation } from "./shared.ts";

// Discriminated union type constant
export const TYPE = "string";

// JTD schema without the type property
export const schema = {
  properties: {
    location: { ref: "location" },
    name: { type: "string" },
    size: { type: "uint8" }, // Number of bytes, NUL padded
  },
} as const satisfies SomeJTDSchemaType;

// JSON type including the type property
export type StringFieldJson = FieldJsonSchema<typeof TYPE, typeof schema>;

/**
 * Converts a null terminated array of bytes into a string
 */
export function decodeStringField(bytes: Uint8Array): string {
  const lastNonNull = bytes.findLastIndex((byte) => byte !== 0);
  bytes = bytes.subarray(0, lastNonNull + 1);
  return new TextDecoder("utf-8").decode(bytes).trim();
}

export class StringField extends Field<string> {
  readonly type = TYPE;
  readonly size: number;

  constructor(location: PayloadLocation, name: string, size: number) {
    super(location, name);
    this.size = size;
  }

  get byteSize(): number {
    return this.size;
  }

  parse(bytes: Uint8Array): string {
    return decodeStringField(bytes);
  }

  /** Inverse of parse, used when simulating a device. Truncates to size. */
  encode(value: string): Uint8Array {
    const bytes = new Uint8Array(this.size);
    bytes.set(new TextEncoder().encode(value).subarray(0, this.size));
    return bytes;
  }

  static fromFieldJson(json: StringFieldJson): StringField {
    return new StringField(json.location, json.name, json.size);
  }
}
StringField satisfies FieldConstructor<string, StringFieldJson>;
