import { z } from 'zod';

// Shapes returned to the front end by the discussion API

export const DiscussionPostResponseSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable(),
  username: z.string(),
  display_username: z.string().nullable(),
  user_id: z.number().int(),
  avatar_template: z.string(),
  created_at: z.string(),
  cooked: z.string(),
  topic_id: z.number().int(),
});

export const DiscussionTopicResponseSchema = z.object({
  posts: z.array(DiscussionPostResponseSchema),
  id: z.number().int(),
  title: z.string(),
  fancy_title: z.string(),
  posts_count: z.number().int(),
  created_at: z.string(),
  slug: z.string(),
  category_id: z.number().int(),
  username: z.string().nullable(),
});

export const DiscussionResponseSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  topics: z.array(DiscussionTopicResponseSchema),
});

export const TopicsResponseSchema = z.object({
  topics: z.array(DiscussionTopicResponseSchema),
});

export const MessageResponseSchema = z.object({
  message: z.string(),
});

// Envelopes

export const DataEnvelopeSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    data: dataSchema,
  });

export const ErrorEnvelopeSchema = z.object({
  data: z.record(z.unknown()),
  error: z.string(),
  http_status: z.number().int(),
  code: z.number().int().optional(),
});

// Type exports
export type DiscussionPostResponse = z.infer<typeof DiscussionPostResponseSchema>;
export type DiscussionTopicResponse = z.infer<
  typeof DiscussionTopicResponseSchema
>;
export type DiscussionResponse = z.infer<typeof DiscussionResponseSchema>;
export type TopicsResponse = z.infer<typeof TopicsResponseSchema>;
export type MessageResponse = z.infer<typeof MessageResponseSchema>;
export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

export interface DataEnvelope<T> {
  data: T;
}
