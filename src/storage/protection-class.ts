import { z } from 'zod';

/**
 * When a file's content may be read.
 *
 * - `complete`: only while the device/session is unlocked
 * - `complete-unless-open`: as `complete`, but handles opened while unlocked stay usable
 * - `complete-until-first-auth`: readable from the first unlock after boot onwards
 * - `none`: always readable
 */
export const PROTECTION_CLASSES = [
  'complete',
  'complete-unless-open',
  'complete-until-first-auth',
  'none',
] as const;

export type ProtectionClass = (typeof PROTECTION_CLASSES)[number];

export const ProtectionClassSchema = z.enum(PROTECTION_CLASSES);

export function isProtectionClass(value: string): value is ProtectionClass {
  return (PROTECTION_CLASSES as readonly string[]).includes(value);
}

/**
 * Every class except `none` restricts access.
 */
export function isRestrictive(protection: ProtectionClass): boolean {
  return protection !== 'none';
}
