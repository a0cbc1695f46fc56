import { FieldSchemaError } from "../errors.js";
import { isRecord, readString } from "../utils/records.js";
import { FieldInformation, RawField } from "./info.js";

/**
 * Field metadata for one run: global fields from `GET /field`, optionally
 * overlaid with the edit metadata of an existing issue of the same type.
 */
export class FieldCatalog {
  private constructor(
    private readonly fields: ReadonlyMap<string, FieldInformation>,
    private readonly idToName: ReadonlyMap<string, string>,
    private readonly nameToId: ReadonlyMap<string, string>
  ) {}

  static fromGlobalFields(rawFields: readonly RawField[]): FieldCatalog {
    const fields = new Map<string, FieldInformation>();
    const idToName = new Map<string, string>();
    const nameToId = new Map<string, string>();

    for (const rawField of rawFields) {
      const field = new FieldInformation(rawField);
      fields.set(field.getKey(), field);

      const id = readString(rawField, ["id"]);
      const name = readString(rawField, ["name"]);
      if (id !== undefined && name !== undefined) {
        idToName.set(id, name);
        nameToId.set(name, id);
      }
    }

    return new FieldCatalog(fields, idToName, nameToId);
  }

  /** Edit metadata entries replace global ones with the same id. */
  withEditMeta(editMeta: Readonly<Record<string, RawField>>): FieldCatalog {
    const fields = new Map(this.fields);
    for (const [id, rawField] of Object.entries(editMeta)) {
      if (isRecord(rawField)) {
        fields.set(id, new FieldInformation(rawField));
      }
    }
    return new FieldCatalog(fields, this.idToName, this.nameToId);
  }

  /** Accepts a field name or id; names take precedence. */
  resolveFieldId(idOrName: string): string {
    const byName = this.nameToId.get(idOrName);
    if (byName !== undefined) {
      return byName;
    }
    if (this.idToName.has(idOrName)) {
      return idOrName;
    }
    throw new FieldSchemaError(`Not found field: ${idOrName}`);
  }

  getFieldName(id: string): string | undefined {
    return this.idToName.get(id);
  }

  get(id: string): FieldInformation | undefined {
    return this.fields.get(id);
  }

  require(id: string): FieldInformation {
    const field = this.fields.get(id);
    if (!field) {
      throw new FieldSchemaError(`Information not found for field: ${id}`);
    }
    return field;
  }

  /**
   * Maps `--set` tokens to field ids. Tokens naming the same field (for
   * example its name and its id) have their values concatenated.
   */
  resolveAssignments(assignments: ReadonlyMap<string, readonly string[]>): Map<string, string[]> {
    const resolved = new Map<string, string[]>();
    for (const [token, values] of assignments) {
      const id = this.resolveFieldId(token);
      const existing = resolved.get(id) ?? [];
      resolved.set(id, [...existing, ...values]);
    }
    return resolved;
  }
}
