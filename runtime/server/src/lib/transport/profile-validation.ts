import { z } from 'zod';
import type { RemoteProfile, RemoteProfileRef } from '@termfocus/shared-types';

const profileSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    host: z.string().trim().min(1, 'Host is required'),
    port: z
      .number()
      .int('Port must be between 1 and 65535')
      .min(1, 'Port must be between 1 and 65535')
      .max(65535, 'Port must be between 1 and 65535'),
    username: z.string().trim().min(1, 'Username is required'),
    authType: z.enum(['password', 'key']),
    password: z.string().optional(),
    privateKey: z.string().optional(),
    passphrase: z.string().optional(),
  })
  .superRefine((profile, ctx) => {
    if (profile.authType === 'password' && !profile.password) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['password'],
        message: 'Password is required for password authentication',
      });
    }

    if (profile.authType === 'key') {
      if (!profile.privateKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['privateKey'],
          message: 'Private key is required for key authentication',
        });
      } else if (!looksLikePrivateKey(profile.privateKey)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['privateKey'],
          message: 'Invalid private key format',
        });
      }
    }
  });

/**
 * PEM-style private key container (PKCS#1, PKCS#8, SEC1, OpenSSH)
 */
export function looksLikePrivateKey(value: string): boolean {
  return value.includes('BEGIN') && value.includes('PRIVATE KEY');
}

/**
 * Validate a remote profile before connecting.
 *
 * @returns the first problem found, or undefined when the profile is usable
 */
export function validateProfile(profile: RemoteProfile): string | undefined {
  const result = profileSchema.safeParse(profile);
  if (result.success) {
    return undefined;
  }
  return result.error.issues[0]?.message ?? 'Invalid profile';
}

/**
 * Strip credential material, keeping what a session may hold on to
 */
export function toProfileRef(profile: RemoteProfile): RemoteProfileRef {
  return {
    id: profile.id,
    name: profile.name ?? null,
    host: profile.host,
    port: profile.port,
    username: profile.username,
    authType: profile.authType,
  };
}
