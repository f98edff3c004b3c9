import type { SomeJTDSchemaType } from "ajv/dist/jtd";
import Decimal from "decimal.js";
import { Field } from "./shared.ts";
import type { FieldConstructor, FieldJsonSchema, PayloadLocation } from "./shared.ts";

// Discriminated union type constant
export const TYPE = "decimal";

// JTD schema without the type property
export const schema = {
  properties: {
    location: { ref: "location" },
    name: { type: "string" },
    scale: { type: "uint8" }, // Divisor (e.g., 2 means divide raw value by 10 ** 2)
    signed: { type: "boolean" },
  },
} as const satisfies SomeJTDSchemaType;

// JSON type including the type property
export type DecimalFieldJson = FieldJsonSchema<typeof TYPE, typeof schema>;

/** A big-endian 16-bit fixed-point value, e.g. temperatures in tenths */
export class DecimalField extends Field<Decimal> {
  readonly type = TYPE;
  readonly scale: number;
  readonly signed: boolean;

  constructor(location: PayloadLocation, name: string, scale: number, signed: boolean) {
    super(location, name);
    this.scale = scale;
    this.signed = signed;
  }

  get byteSize(): number {
    return 2;
  }

  parse(bytes: Uint8Array): Decimal {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const raw = this.signed ? view.getInt16(0) : view.getUint16(0);
    return new Decimal(raw).div(10 ** this.scale);
  }

  /** Inverse of parse, used when simulating a device */
  encode(value: Decimal.Value): Uint8Array {
    const bytes = new Uint8Array(2);
    const raw = new Decimal(value).mul(10 ** this.scale).round().toNumber();
    const view = new DataView(bytes.buffer);
    if (this.signed) view.setInt16(0, raw);
    else view.setUint16(0, raw);
    return bytes;
  }

  static fromFieldJson(json: DecimalFieldJson): DecimalField {
    return new DecimalField(json.location, json.name, json.scale, json.signed);
  }
}
DecimalField satisfies FieldConstructor<Decimal, DecimalFieldJson>;
