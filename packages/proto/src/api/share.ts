import { z } from 'zod';

export const GrantableLevelSchema = z.enum(['editor', 'viewer'], {
  errorMap: () => ({ message: "Permission level must be 'editor' or 'viewer'" }),
});

export const CreateShareRequestSchema = z.object({
  userId: z.string().uuid('Invalid user id'),
  level: GrantableLevelSchema,
});

export const UpdateShareRequestSchema = z.object({
  level: GrantableLevelSchema,
});

export const ShareParamsSchema = z.object({
  accountId: z.string().uuid('Invalid account id'),
  shareId: z.string().uuid('Invalid share id'),
});

export const ShareResponseSchema = z.object({
  id: z.string(),
  accountId: z.string(),
  userId: z.string(),
  level: z.enum(['editor', 'viewer']),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type CreateShareRequest = z.infer<typeof CreateShareRequestSchema>;
export type UpdateShareRequest = z.infer<typeof UpdateShareRequestSchema>;
export type ShareResponse = z.infer<typeof ShareResponseSchema>;
