import { z } from 'zod';

export interface UserProfile {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
}

export interface AuthResult {
  user: UserProfile;
  token: string;
}

const REQUIRED = 'This field is required.';

const requiredText = z.string({ required_error: REQUIRED }).trim().min(1, REQUIRED);

const optionalName = z.string().trim().max(150, 'Ensure this value has at most 150 characters.').default('');

export const joinRequestSchema = z.object({
  firstName: optionalName,
  lastName: optionalName,
  username: requiredText.pipe(
    z
      .string()
      .max(150, 'Ensure this value has at most 150 characters.')
      .regex(/^[\w.@+-]+$/, 'Enter a valid username. Use letters, numbers and @/./+/-/_ only.')
  ),
  email: requiredText.pipe(z.string().email('Enter a valid email address.')),
  password: z
    .string({ required_error: REQUIRED })
    .min(8, 'This password is too short. It must contain at least 8 characters.')
});

export type JoinRequest = z.infer<typeof joinRequestSchema>;

export const loginRequestSchema = z.object({
  username: requiredText,
  password: z.string({ required_error: REQUIRED }).min(1, REQUIRED)
});

export type LoginRequest = z.infer<typeof loginRequestSchema>;

export type FieldErrors<T> = { [K in keyof T]?: string[] };

export type FormParseResult<T> = { ok: true; data: T } | { ok: false; fieldErrors: FieldErrors<T> };

export function parseJoinRequest(input: unknown): FormParseResult<JoinRequest> {
  const result = joinRequestSchema.safeParse(input);
  return result.success
    ? { ok: true, data: result.data }
    : { ok: false, fieldErrors: result.error.flatten().fieldErrors };
}

export function parseLoginRequest(input: unknown): FormParseResult<LoginRequest> {
  const result = loginRequestSchema.safeParse(input);
  return result.success
    ? { ok: true, data: result.data }
    : { ok: false, fieldErrors: result.error.flatten().fieldErrors };
}
