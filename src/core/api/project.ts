import { z } from "zod";
import { JiraApiClient, parseResponse } from "./client.js";

export const TrackerProjectSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String).optional(),
    key: z.string(),
    name: z.string().default(""),
  })
  .passthrough();

export type TrackerProject = z.infer<typeof TrackerProjectSchema>;

export async function getProject(client: JiraApiClient, projectKey: string): Promise<TrackerProject> {
  const response = await client.get(`/project/${encodeURIComponent(projectKey)}`);
  return parseResponse(TrackerProjectSchema, response, "project");
}
