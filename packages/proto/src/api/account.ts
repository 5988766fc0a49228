import { z } from 'zod';

export const CurrencySchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter ISO 4217 code');

const AccountNameSchema = z
  .string()
  .trim()
  .min(1, 'Account name is required')
  .max(100, 'Account name must be at most 100 characters');

const NotesSchema = z.string().trim().max(500, 'Notes must be at most 500 characters');

export const CreateAccountRequestSchema = z.object({
  name: AccountNameSchema,
  currency: CurrencySchema,
  notes: NotesSchema.nullable().optional(),
});

export const UpdateAccountRequestSchema = z
  .object({
    name: AccountNameSchema.optional(),
    currency: CurrencySchema.optional(),
    notes: NotesSchema.nullable().optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided',
  });

export const AccountParamsSchema = z.object({
  accountId: z.string().uuid('Invalid account id'),
});

export const AccountResponseSchema = z.object({
  id: z.string(),
  ownerId: z.string(),
  name: z.string(),
  currency: z.string(),
  notes: z.string().nullable(),
  permissionLevel: z.enum(['owner', 'editor', 'viewer']),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type CreateAccountRequest = z.infer<typeof CreateAccountRequestSchema>;
export type UpdateAccountRequest = z.infer<typeof UpdateAccountRequestSchema>;
export type AccountResponse = z.infer<typeof AccountResponseSchema>;
