import type { FieldJson } from "./schema.ts";
import { DecimalField } from "./decimal.ts";
import { FlagField } from "./flag.ts";
import { LevelField } from "./level.ts";
import { StringField } from "./string.ts";
import { Uint8Field } from "./uint8.ts";
import { VersionField } from "./version.ts";

export type { PayloadLocation } from "./shared.ts";
export type { FieldJson } from "./schema.ts";
export { fieldSchema } from "./schema.ts";
export { DecimalField, FlagField, LevelField, StringField, Uint8Field, VersionField };

export type AnyField = DecimalField | FlagField | LevelField | StringField | Uint8Field | VersionField;

export function fromFieldJson(json: FieldJson): AnyField {
  switch (json.type) {
    case "decimal":
      return DecimalField.fromFieldJson(json);
    case "flag":
      return FlagField.fromFieldJson(json);
    case "level":
      return LevelField.fromFieldJson(json);
    case "string":
      return StringField.fromFieldJson(json);
    case "uint8":
      return Uint8Field.fromFieldJson(json);
    case "version":
      return VersionField.fromFieldJson(json);
  }
}
