import { z } from 'zod';

const USERNAME_REGEX = /^[A-Za-z0-9_-]+$/;
const SPECIAL_CHARACTER_REGEX = /[!@#$%^&*()_+\-=[\]{}|;:,.<>?]/;

export const EmailSchema = z.string().trim().toLowerCase().email('Invalid email address').max(255);

export const UsernameSchema = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(50, 'Username must be at most 50 characters')
  .regex(USERNAME_REGEX, 'Username can only contain letters, numbers, underscores, and hyphens');

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters long')
  .max(128, 'Password must be at most 128 characters')
  .regex(/[A-Z]/, 'Password must contain at least one uppercase letter')
  .regex(/[a-z]/, 'Password must contain at least one lowercase letter')
  .regex(/\d/, 'Password must contain at least one digit')
  .regex(SPECIAL_CHARACTER_REGEX, 'Password must contain at least one special character');

export const RegisterRequestSchema = z.object({
  email: EmailSchema,
  username: UsernameSchema,
  password: PasswordSchema,
  fullName: z.string().trim().min(1).max(100).optional(),
});

// Existing passwords predate any strength rule change, so login only checks presence.
export const LoginRequestSchema = z.object({
  email: EmailSchema,
  password: z.string().min(1, 'Password is required'),
});

export const RefreshRequestSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token is required'),
});

export const LogoutRequestSchema = RefreshRequestSchema;

export const ChangePasswordRequestSchema = z
  .object({
    currentPassword: z.string().min(1, 'Current password is required'),
    newPassword: PasswordSchema,
  })
  .refine((body) => body.currentPassword !== body.newPassword, {
    message: 'New password must differ from the current password',
    path: ['newPassword'],
  });

export const UserResponseSchema = z.object({
  id: z.string(),
  email: z.string(),
  username: z.string(),
  fullName: z.string().nullable(),
  isAdmin: z.boolean(),
});

export const TokenResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.literal('bearer'),
  expiresAt: z.string().datetime(),
  expiresIn: z.number().int(),
});

export const AuthResponseSchema = z.object({
  user: UserResponseSchema,
  tokens: TokenResponseSchema,
});

export const SessionResponseSchema = z.object({
  id: z.string(),
  familyId: z.string(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type RefreshRequest = z.infer<typeof RefreshRequestSchema>;
export type ChangePasswordRequest = z.infer<typeof ChangePasswordRequestSchema>;
export type UserResponse = z.infer<typeof UserResponseSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type AuthResponse = z.infer<typeof AuthResponseSchema>;
export type SessionResponse = z.infer<typeof SessionResponseSchema>;
