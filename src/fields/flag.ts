import type { SomeJTDSchemaType } from "ajv/dist/jtd";
import { Field } from "./shared.ts";
import type { FieldConstructor, FieldJsonSchema } from "./shared.ts";

// Discriminated union type constant
export const TYPE = "flag";

// JTD schema without the type property
export const schema = {
  properties: {
    location: { ref: "location" },
    name: { type: "string" },
  },
} as const satisfies SomeJTDSchemaType;

// JSON type including the type property
export type FlagFieldJson = FieldJsonSchema<typeof TYPE, typeof schema>;

/** A single byte that is on when non-zero */
export class FlagField extends Field<boolean> {
  readonly type = TYPE;

  get byteSize(): number {
    return 1;
  }

  parse(bytes: Uint8Array): boolean {
    return bytes[0] !== 0;
  }

  encode(on: boolean): Uint8Array {
    return Uint8Array.of(on ? 1 : 0);
  }

  static fromFieldJson(json: FlagFieldJson): FlagField {
    return new FlagField(json.location, json.name);
  }
}
FlagField satisfies FieldConstructor<boolean, FlagFieldJson>;
