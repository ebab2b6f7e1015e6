/**
 * Password hashing with bcryptjs. Plaintext passwords never leave this module
 * in any stored form.
 */

import bcrypt from 'bcryptjs';
import { randomBytes } from 'node:crypto';

/** Cost factor for new hashes. */
export const DEFAULT_HASH_ROUNDS = 10;

export async function hashPassword(password: string, rounds: number = DEFAULT_HASH_ROUNDS): Promise<string> {
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(password, salt);
}

export function verifyPassword(candidate: string, hashedPassword: string): Promise<boolean> {
  return bcrypt.compare(candidate, hashedPassword);
}

/** Random password for accounts created without one (CLI login-or-create). */
export function generatePassword(): string {
  return randomBytes(18).toString('base64url');
}
