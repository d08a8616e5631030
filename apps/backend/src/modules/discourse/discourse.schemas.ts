import { z } from 'zod';

// Forum payloads carry many more fields than the service reads. Only the
// fields listed here are checked, the rest pass through untouched.

export const DiscourseCategorySchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    slug: z.string(),
    color: z.string().optional(),
    text_color: z.string().optional(),
    topic_count: z.number().int().optional(),
    post_count: z.number().int().optional(),
    description: z.string().nullable().optional(),
    topic_url: z.string().nullable().optional(),
    read_restricted: z.boolean().optional(),
  })
  .passthrough();

export const DiscoursePosterSchema = z
  .object({
    user_id: z.number().int(),
    description: z.string().default(''),
  })
  .passthrough();

export const DiscourseTopicSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    fancy_title: z.string(),
    slug: z.string(),
    posts_count: z.number().int(),
    reply_count: z.number().int().optional(),
    created_at: z.string(),
    category_id: z.number().int(),
    visible: z.boolean().optional(),
    closed: z.boolean().optional(),
    archived: z.boolean().optional(),
    last_poster_username: z.string().nullable().optional(),
    posters: z.array(DiscoursePosterSchema).default([]),
  })
  .passthrough();

export const DiscoursePostSchema = z
  .object({
    id: z.number().int(),
    name: z.string().nullable().default(null),
    username: z.string(),
    display_username: z.string().nullable().default(null),
    user_id: z.number().int(),
    avatar_template: z.string(),
    created_at: z.string(),
    cooked: z.string(),
    topic_id: z.number().int(),
    post_number: z.number().int().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export const CategoryEnvelopeSchema = z.object({
  category: DiscourseCategorySchema,
});

export const TopicListSchema = z.object({
  users: z
    .array(z.object({ id: z.number().int(), username: z.string() }).passthrough())
    .default([]),
  topic_list: z.object({
    topics: z.array(DiscourseTopicSchema),
  }),
});

export const TopicDetailSchema = DiscourseTopicSchema.extend({
  details: z
    .object({
      created_by: z
        .object({ username: z.string().nullable().optional() })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
});

export const TopicWithPostsSchema = TopicDetailSchema.extend({
  post_stream: z.object({
    posts: z.array(DiscoursePostSchema),
  }),
});

export const PostEnvelopeSchema = z.object({
  post: DiscoursePostSchema,
});

const ErrorListSchema = z.object({
  errors: z.union([z.array(z.string()), z.string()]).optional(),
  error: z.union([z.array(z.string()), z.string()]).optional(),
});

/**
 * Error messages the forum embeds in a payload, under `errors` or `error`,
 * or null when the payload carries none.
 */
export function extractErrors(payload: unknown): string[] | null {
  const parsed = ErrorListSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const raw = parsed.data.errors ?? parsed.data.error;
  if (raw === undefined) {
    return null;
  }
  return Array.isArray(raw) ? raw : [raw];
}

export type DiscourseCategory = z.infer<typeof DiscourseCategorySchema>;
export type DiscoursePost = z.infer<typeof DiscoursePostSchema>;
export type DiscourseTopicRecord = z.infer<typeof DiscourseTopicSchema>;

/** A topic with its creator resolved. */
export type DiscourseTopic = DiscourseTopicRecord & {
  username: string | null;
};
