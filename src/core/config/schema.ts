import { z } from "zod";

export const DEFAULT_INTEGER_FIELDS = ["customfield_10113"];

export const ApiConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
});

export const FieldsConfigSchema = z.object({
  integer: z.array(z.string().min(1)).default(DEFAULT_INTEGER_FIELDS),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LogConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  color: z.boolean().optional(),
});

export const JiraIssueConfigSchema = z.object({
  version: z.literal(1).default(1),
  api: ApiConfigSchema.default({ timeoutMs: 30000 }),
  fields: FieldsConfigSchema.default({}),
  log: LogConfigSchema.default({}),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type JiraIssueConfig = z.infer<typeof JiraIssueConfigSchema>;
