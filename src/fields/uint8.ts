import type { SomeJTDSchemaType } from "ajv/dist/jtd";
import { Field } from "./shared.ts";
import type { FieldConstructor, FieldJsonSchema } from "./shared.ts";

// Discriminated union type constant
export const TYPE = "uint8";

// JTD schema without the type property
export const schema = {
  properties: {
    location: { ref: "location" },
    name: { type: "string" },
  },
} as const satisfies SomeJTDSchemaType;

// JSON type including the type property
export type Uint8FieldJson = FieldJsonSchema<typeof TYPE, typeof schema>;

export class Uint8Field extends Field<number> {
  readonly type = TYPE;

  get byteSize(): number {
    return 1;
  }

  parse(bytes: Uint8Array): number {
    return bytes[0]!;
  }

  encode(value: number): Uint8Array {
    return Uint8Array.of(value);
  }

  static fromFieldJson(json: Uint8FieldJson): Uint8Field {
    return new Uint8Field(json.location, json.name);
  }
}
Uint8Field satisfies FieldConstructor<number, Uint8FieldJson>;
