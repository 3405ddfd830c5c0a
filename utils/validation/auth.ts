import { z } from 'zod';

const emailSchema = z
  .string()
  .trim()
  .min(1, 'Email is required')
  .email('Invalid email address');

const passwordSchema = z
  .string()
  .min(1, 'Password is required');

export const signInSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
});

/**
 * Identity provider sign-in response
 */
export const signInResponseSchema = z.object({
  idToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresIn: z.coerce.number().int().positive().optional(),
  email: z.string().optional(),
});

/**
 * Secure token refresh response; some deployments return access_token, others id_token
 */
export const refreshResponseSchema = z
  .object({
    id_token: z.string().min(1).optional(),
    access_token: z.string().min(1).optional(),
    refresh_token: z.string().min(1).optional(),
    expires_in: z.coerce.number().int().positive().optional(),
  })
  .refine((data) => Boolean(data.id_token || data.access_token), {
    message: 'Refresh response carries no token',
  });

export const tokenPayloadSchema = z
  .object({
    exp: z.number().int().positive(),
    iat: z.number().int().optional(),
    email: z.string().optional(),
    role: z.string().optional(),
    tier: z.string().optional(),
  })
  .passthrough();

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function firstIssueMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid input';
}
