import { z } from 'zod';

export const ProfileResponseSchema = z.object({
  data: z.object({
    profile: z.object({ email: z.string().min(1) }).passthrough(),
  }),
});

export const CurrentProfileResponseSchema = z.object({
  data: z.object({
    roles: z.array(z.string()).default([]),
  }),
});

export const AssetResponseSchema = z.object({
  data: z.object({
    public: z
      .object({
        // Identity-service id of the owner
        despUserId: z.string().min(1),
        name: z.string(),
      })
      .passthrough(),
  }),
});

export interface AssetSummary {
  ownerId: string;
  name: string;
}
