import type { SomeJTDSchemaType } from "ajv/dist/jtd";
import { Field } from "./shared.ts";
import type { FieldConstructor, FieldJsonSchema, PayloadLocation } from "./shared.ts";

// Discriminated union type constant
export const TYPE = "level";

// JTD schema without the type property
export const schema = {
  properties: {
    location: { ref: "location" },
    name: { type: "string" },
    divisor: { type: "uint8" }, // Raw byte is divided by this and rounded down
  },
} as const satisfies SomeJTDSchemaType;

// JSON type including the type property
export type LevelFieldJson = FieldJsonSchema<typeof TYPE, typeof schema>;

/**
 * A stepped setting stored as one byte. The firmware reports fan speeds as
 * multiples of ten, so speed 3 arrives as 30.
 */
export class LevelField extends Field<number> {
  readonly type = TYPE;
  readonly divisor: number;

  constructor(location: PayloadLocation, name: string, divisor: number) {
    super(location, name);
    if (divisor < 1) throw new RangeError(`Level divisor must be positive, got ${divisor}`);
    this.divisor = divisor;
  }

  get byteSize(): number {
    return 1;
  }

  parse(bytes: Uint8Array): number {
    return Math.floor(bytes[0]! / this.divisor);
  }

  /** Inverse of parse, used when simulating a device */
  encode(level: number): Uint8Array {
    return Uint8Array.of(level * this.divisor);
  }

  static fromFieldJson(json: LevelFieldJson): LevelField {
    return new LevelField(json.location, json.name, json.divisor);
  }
}
LevelField satisfies FieldConstructor<number, LevelFieldJson>;
