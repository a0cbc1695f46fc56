import { z } from "zod";
import { JiraApiClient, parseResponse } from "./client.js";

export const TrackerUserSchema = z
  .object({
    accountId: z.string(),
    displayName: z.string().optional(),
    emailAddress: z.string().optional(),
  })
  .passthrough();

export type TrackerUser = z.infer<typeof TrackerUserSchema>;

const UserListSchema = z.array(TrackerUserSchema);

export async function searchUsers(client: JiraApiClient, input: {
  query: string;
  startAt?: number;
  maxResults?: number;
}): Promise<TrackerUser[]> {
  const response = await client.get("/user/search", {
    query: input.query,
    startAt: input.startAt,
    maxResults: input.maxResults,
  });
  return parseResponse(UserListSchema, response, "user search");
}
