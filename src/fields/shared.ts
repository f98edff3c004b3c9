import type { JTDDataType, SomeJTDSchemaType } from "ajv/dist/core";

/** Define any shared schema definitions here */
export const definitions = {
  location: {
    properties: {
      offset: { type: "uint8" },
    },
  } satisfies SomeJTDSchemaType,
} as const;

/** Position of a field inside a response payload */
export type PayloadLocation = JTDDataType<typeof definitions.location>;

/** Helper to create full field JSON schema type with type discriminator */
export type FieldJsonSchema<
  T extends string,
  S extends { readonly properties: Record<string, SomeJTDSchemaType> },
> = JTDDataType<{
  readonly properties: { readonly type: { readonly enum: readonly [T] } } & S["properties"];
  readonly definitions: typeof definitions;
}>;

/**
 * Base class for fields
 */
export abstract class Field<ParseType> {
  abstract readonly type: string;
  readonly location: PayloadLocation;
  readonly name: string;

  constructor(location: PayloadLocation, name: string) {
    this.location = location;
    this.name = name;
  }

  /** Returns the number of bytes this field occupies */
  abstract get byteSize(): number;

  /** Parse raw bytes into a typed value */
  abstract parse(bytes: Uint8Array): ParseType;

  /**
   * Reads this field out of a payload, or returns undefined when the payload
   * ends before the field does.
   */
  read(payload: Uint8Array): ParseType | undefined {
    const end = this.location.offset + this.byteSize;
    if (payload.length < end) return undefined;
    return this.parse(payload.subarray(this.location.offset, end));
  }
}

export interface FieldConstructor<ParseType, JsonType> {
  fromFieldJson(json: JsonType): Field<ParseType>;
}
