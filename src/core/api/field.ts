import { z } from "zod";
import { JiraApiClient, parseResponse } from "./client.js";

const RawFieldListSchema = z.array(z.record(z.string(), z.unknown()));

const EditMetaSchema = z.object({
  fields: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
});

/** GET /field: every field known to the instance, system and custom. */
export async function listFields(client: JiraApiClient): Promise<Record<string, unknown>[]> {
  const response = await client.get("/field");
  return parseResponse(RawFieldListSchema, response, "field list");
}

/** GET /issue/{key}/editmeta: fields editable on one issue, keyed by field id. */
export async function getEditMeta(client: JiraApiClient, issueKey: string): Promise<Record<string, Record<string, unknown>>> {
  const response = await client.get(`/issue/${encodeURIComponent(issueKey)}/editmeta`);
  return parseResponse(EditMetaSchema, response, "edit metadata").fields;
}
