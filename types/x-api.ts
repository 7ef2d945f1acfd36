/**
 * X API v2 recent search payloads
 *
 * Only the fields requested by XApiClient are described; unknown keys are
 * ignored by the schemas.
 */

import { z } from 'zod';

const nonNegativeInt = z.number().int().nonnegative();

export const publicMetricsSchema = z.object({
  like_count: nonNegativeInt.default(0),
  retweet_count: nonNegativeInt.default(0),
  reply_count: nonNegativeInt.default(0),
  quote_count: nonNegativeInt.default(0),
});

export const urlEntitySchema = z.object({
  url: z.string().optional(),
  expanded_url: z.string().optional(),
});

export const tweetSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  created_at: z.string().min(1),
  author_id: z.string().optional(),
  lang: z.string().optional(),
  public_metrics: publicMetricsSchema.optional(),
  entities: z
    .object({
      urls: z.array(urlEntitySchema).optional(),
    })
    .nullish(),
});

export const userSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  username: z.string().optional(),
});

export const searchMetaSchema = z.object({
  result_count: nonNegativeInt.optional(),
  next_token: z.string().min(1).optional(),
  newest_id: z.string().optional(),
  oldest_id: z.string().optional(),
});

export const apiProblemSchema = z.object({
  title: z.string().optional(),
  detail: z.string().optional(),
  type: z.string().optional(),
  message: z.string().optional(),
});

export const searchResponseSchema = z.object({
  data: z.array(tweetSchema).optional(),
  includes: z
    .object({
      users: z.array(userSchema).optional(),
    })
    .optional(),
  meta: searchMetaSchema.optional(),
  errors: z.array(apiProblemSchema).optional(),
});

export type XTweet = z.infer<typeof tweetSchema>;
export type XUser = z.infer<typeof userSchema>;
