import type { SomeJTDSchemaType } from "ajv/dist/jtd";
import Decimal from "decimal.js";
import { Field } from "./shared.ts";
import type { FieldConstructor, FieldJsonSchema } from "./shared.ts";

// Discriminated union type constant
export const TYPE = "version";

// JTD schema without the type property
export const schema = {
  properties: {
    location: { ref: "location" },
    name: { type: "string" },
  },
} as const satisfies SomeJTDSchemaType;

// JSON type including the type property
export type VersionFieldJson = FieldJsonSchema<typeof TYPE, typeof schema>;

/** Firmware version as a big-endian uint16 in hundredths, 123 => "1.23" */
export class VersionField extends Field<string> {
  readonly type = TYPE;

  get byteSize(): number {
    return 2;
  }

  parse(bytes: Uint8Array): string {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return new Decimal(view.getUint16(0)).div(100).toFixed(2);
  }

  /** Inverse of parse, used when simulating a device */
  encode(version: string): Uint8Array {
    const bytes = new Uint8Array(2);
    new DataView(bytes.buffer).setUint16(0, new Decimal(version).mul(100).round().toNumber());
    return bytes;
  }

  static fromFieldJson(json: VersionFieldJson): VersionField {
    return new VersionField(json.location, json.name);
  }
}
VersionField satisfies FieldConstructor<string, VersionFieldJson>;
