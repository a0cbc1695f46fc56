import { FieldSchemaError } from "../errors.js";
import { isRecord, readString } from "../utils/records.js";

export type FieldKind = "array" | "string" | "enum" | "none";

export type RawField = Record<string, unknown>;

export function classifyField(raw: RawField): FieldKind {
  const schema = isRecord(raw.schema) ? raw.schema : undefined;
  return classifyTypeMarker(schema?.type, raw);
}

/** Same decision order as {@link classifyField}, applied to `schema.items`. */
export function classifyFieldItems(raw: RawField): FieldKind {
  const schema = isRecord(raw.schema) ? raw.schema : undefined;
  if (!schema || !("items" in schema)) {
    return "none";
  }
  return classifyTypeMarker(schema.items, raw);
}

function classifyTypeMarker(marker: unknown, raw: RawField): FieldKind {
  if (marker === "array") {
    return "array";
  }
  if (marker === "string") {
    return "string";
  }
  if ("allowedValues" in raw) {
    return "enum";
  }
  return "none";
}

export class AllowedValueInformation {
  constructor(private readonly information: Record<string, unknown>) {}

  getRaw(): Record<string, unknown> {
    return this.information;
  }

  getValue(): string {
    if ("value" in this.information) {
      return String(this.information.value);
    }
    if ("name" in this.information) {
      return String(this.information.name);
    }
    throw new FieldSchemaError(
      `No value or name fields in allowed values information: ${JSON.stringify(this.information)}`
    );
  }

  getId(): string {
    const id = readString(this.information, ["id"]);
    if (id === undefined) {
      throw new FieldSchemaError(`No id in allowed values information: ${JSON.stringify(this.information)}`);
    }
    return id;
  }
}

export class FieldInformation {
  constructor(private readonly information: RawField) {}

  getRaw(): RawField {
    return this.information;
  }

  getName(): string {
    return readString(this.information, ["name", "key", "id"]) ?? "(unnamed)";
  }

  getKey(): string {
    return readString(this.information, ["key", "id"]) ?? this.getName();
  }

  getKind(): FieldKind {
    return classifyField(this.information);
  }

  getItemsKind(): FieldKind {
    return classifyFieldItems(this.information);
  }

  /** Display value -> option, or `undefined` unless the field or its items are enumerated. */
  getAllowedValues(): Map<string, AllowedValueInformation> | undefined {
    if (this.getKind() !== "enum" && this.getItemsKind() !== "enum") {
      return undefined;
    }

    const allowedValues = new Map<string, AllowedValueInformation>();
    const rawValues = Array.isArray(this.information.allowedValues) ? this.information.allowedValues : [];
    for (const rawValue of rawValues) {
      if (!isRecord(rawValue)) {
        throw new FieldSchemaError(`Malformed allowed value in field ${this.getName()}: ${JSON.stringify(rawValue)}`);
      }
      const allowedValue = new AllowedValueInformation(rawValue);
      allowedValues.set(allowedValue.getValue(), allowedValue);
    }
    return allowedValues;
  }
}
