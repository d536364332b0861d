import { z } from 'zod';
import type { FieldErrors } from '../types/errors.js';

export const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function registrationSchema(passwordMinLength: number) {
  return z.object({
    username: z
      .string({ required_error: 'Username is required' })
      .trim()
      .min(2, 'Username must be at least 2 characters')
      .max(32, 'Username must be at most 32 characters')
      .regex(USERNAME_PATTERN, 'Username may contain only letters, digits, "_", "." and "-"'),
    email: z
      .string({ required_error: 'Email is required' })
      .trim()
      .min(1, 'Email is required')
      .email('Email must be a valid address'),
    password: z
      .string({ required_error: 'Password is required' })
      .min(passwordMinLength, `Password must be at least ${passwordMinLength} characters`),
  });
}

export type RegistrationInput = z.infer<ReturnType<typeof registrationSchema>>;

export const loginSchema = z.object({
  email: z.string({ required_error: 'Email is required' }).trim().min(1, 'Email is required'),
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
  remember: z.boolean().optional().default(true),
});

export type LoginInput = z.infer<typeof loginSchema>;

/** Groups zod issues by their top-level field. */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? String(issue.path[0]) : 'root';
    (fields[key] ??= []).push(issue.message);
  }
  return fields;
}
