import { z } from "zod";

import { SlackTimestampSchema } from "@interfaces/http/messages/schema";

export const UserParamsSchema = z.object({
  userId: z.string().min(1).max(100),
});

export const UpdateProfileSchema = z
  .object({
    communicationStyle: z.string().nullable().optional(),
    topicsOfInterest: z.array(z.string().min(1)).optional(),
  })
  .strict()
  .refine(
    (u) => u.communicationStyle !== undefined || u.topicsOfInterest !== undefined,
    { message: "Nothing to update" }
  );

export const ThreadParamsSchema = z.object({
  threadTs: SlackTimestampSchema,
});

export const ThreadSummarySchema = z.object({
  summary: z.string().nullable(),
});
