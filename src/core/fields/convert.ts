import type { IssueTracker } from "../api/tracker.js";
import { FieldSchemaError } from "../errors.js";
import { lookupProject, lookupUser } from "../issue/lookup.js";
import type { Logger } from "../output/logger.js";
import { FieldInformation, FieldKind } from "./info.js";

export type FieldValue = string | number | FieldValue[] | { [key: string]: FieldValue };

export type ConversionContext = {
  tracker: IssueTracker;
  logger: Logger;
  /** Field ids whose value is sent as an integer. */
  integerFields: ReadonlySet<string>;
};

export type Converter = (
  values: readonly string[],
  field: FieldInformation,
  context: ConversionContext
) => FieldValue | Promise<FieldValue>;

export type ConversionRule =
  | { match: "key"; key: string; convert: Converter }
  | { match: "integer-field"; convert: Converter }
  | { match: "kind"; kind: FieldKind; convert: Converter };

const toProject: Converter = async (values, _field, context) => {
  const project = await lookupProject(context.tracker, context.logger, firstValue(values));
  if (!project) {
    throw new FieldSchemaError(`Project not found: ${firstValue(values)}`);
  }
  return { key: project.key };
};

const toIssueType: Converter = (values) => ({ name: firstValue(values) });

const toAssignee: Converter = async (values, _field, context) => {
  const user = await lookupUser(context.tracker, context.logger, firstValue(values));
  if (!user) {
    throw new FieldSchemaError(`User not found: ${firstValue(values)}`);
  }
  return { accountId: user.accountId };
};

const toInteger: Converter = (values, field) => {
  const raw = firstValue(values).trim();
  if (!/^[-+]?\d+$/.test(raw)) {
    throw new FieldSchemaError(`Field ${field.getName()} expects an integer, got: ${firstValue(values)}`);
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new FieldSchemaError(`Field ${field.getName()} is out of the supported integer range: ${firstValue(values)}`);
  }
  return parsed;
};

const toTimeTracking: Converter = (values) => ({ originalEstimate: firstValue(values) });

const toComponents: Converter = (values) => values.map((value) => ({ name: value }));

const toLabels: Converter = (values) => [...values];

const toEnum: Converter = (values, field) => convertEnumValue(firstValue(values), field);

const toArray: Converter = (values, field) => {
  if (field.getItemsKind() !== "enum") {
    return [...values];
  }
  return values.map((value) => convertEnumValue(value, field));
};

function convertEnumValue(value: string, field: FieldInformation): FieldValue {
  const allowedValues = field.getAllowedValues();
  const allowedValue = allowedValues?.get(value);
  if (!allowedValue) {
    const known = allowedValues ? Array.from(allowedValues.keys()).join(", ") : "(none)";
    throw new FieldSchemaError(`No value: ${value} in field: ${field.getName()}. Allowed values: ${known}`);
  }
  return { id: allowedValue.getId() };
}

/** Tried top to bottom; the first matching rule converts the field. */
export const CONVERSION_RULES: readonly ConversionRule[] = [
  { match: "key", key: "project", convert: toProject },
  { match: "key", key: "issuetype", convert: toIssueType },
  { match: "key", key: "assignee", convert: toAssignee },
  { match: "integer-field", convert: toInteger },
  { match: "key", key: "timetracking", convert: toTimeTracking },
  { match: "key", key: "components", convert: toComponents },
  { match: "key", key: "labels", convert: toLabels },
  { match: "kind", kind: "enum", convert: toEnum },
  { match: "kind", kind: "array", convert: toArray },
];

export function findConversionRule(
  key: string,
  field: FieldInformation,
  context: ConversionContext,
  rules: readonly ConversionRule[] = CONVERSION_RULES
): ConversionRule | undefined {
  return rules.find((rule) => {
    switch (rule.match) {
      case "key":
        return rule.key === key;
      case "integer-field":
        return context.integerFields.has(key);
      case "kind":
        return field.getKind() === rule.kind;
    }
  });
}

/** Falls back to the first raw value when no rule matches. */
export async function convertFieldValues(
  key: string,
  values: readonly string[],
  field: FieldInformation,
  context: ConversionContext
): Promise<FieldValue> {
  const rule = findConversionRule(key, field, context);
  if (!rule) {
    return firstValue(values);
  }
  return rule.convert(values, field, context);
}

function firstValue(values: readonly string[]): string {
  const [value] = values;
  if (value === undefined) {
    throw new FieldSchemaError("No value given for field.");
  }
  return value;
}
