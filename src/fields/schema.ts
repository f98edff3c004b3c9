import type { JTDDataType, SomeJTDSchemaType } from "ajv/dist/jtd";
import { definitions } from "./shared.ts";
import { schema as decimalSchema, TYPE as decimalType } from "./decimal.ts";
import { schema as flagSchema, TYPE as flagType } from "./flag.ts";
import { schema as levelSchema, TYPE as levelType } from "./level.ts";
import { schema as stringSchema, TYPE as stringType } from "./string.ts";
import { schema as uint8Schema, TYPE as uint8Type } from "./uint8.ts";
import { schema as versionSchema, TYPE as versionType } from "./version.ts";

export const fieldSchema = {
  discriminator: "type",
  mapping: {
    [decimalType]: decimalSchema,
    [flagType]: flagSchema,
    [levelType]: levelSchema,
    [stringType]: stringSchema,
    [uint8Type]: uint8Schema,
    [versionType]: versionSchema,
  },
  definitions,
} as const satisfies SomeJTDSchemaType;

export type FieldJson = JTDDataType<typeof fieldSchema>;
