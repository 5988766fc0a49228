import { z } from 'zod';
import { EmailSchema, UsernameSchema } from './auth';

export const UpdateProfileRequestSchema = z
  .object({
    email: EmailSchema.optional(),
    username: UsernameSchema.optional(),
    fullName: z.string().trim().min(1).max(100).nullable().optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export const UserParamsSchema = z.object({
  userId: z.string().uuid('Invalid user id'),
});

export type UpdateProfileRequest = z.infer<typeof UpdateProfileRequestSchema>;
