/**
 * Salted password hashing.
 *
 * hash = hex SHA-256 of (password + salt). Verification compares the
 * digests in constant time.
 */

import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

export interface PasswordHash {
  readonly hash: string;
  readonly salt: string;
}

export function generateSalt(): string {
  return randomBytes(16).toString("hex");
}

export function hashPassword(password: string, salt: string = generateSalt()): PasswordHash {
  const hash = createHash("sha256").update(password + salt, "utf8").digest("hex");
  return { hash, salt };
}

export function verifyPassword(password: string, stored: PasswordHash): boolean {
  const candidate = Buffer.from(hashPassword(password, stored.salt).hash, "hex");
  const expected = Buffer.from(stored.hash, "hex");
  return candidate.length === expected.length && timingSafeEqual(candidate, expected);
}
