/**
 * User Store — registration and authentication.
 *
 * Rules:
 * - Usernames are unique (case-sensitive)
 * - Ids are sequential: max existing id + 1, starting at 1
 * - Every change is persisted before it becomes visible
 */

import type { UserProfile, UserRecord, WalletPersistence } from "@fxwallet/types";
import { WalletError } from "./errors.js";
import { hashPassword, verifyPassword } from "./password.js";

const USERNAME = /^[A-Za-z0-9_]{3,}$/;
export const MIN_PASSWORD_LENGTH = 4;

export interface UserStoreOptions {
  readonly now?: (() => Date) | undefined;
}

export function toProfile(record: UserRecord): UserProfile {
  return {
    id: record.id,
    username: record.username,
    registeredAt: record.registeredAt,
  };
}

export function validateUsername(username: string): string {
  const trimmed = username.trim();
  if (!USERNAME.test(trimmed)) {
    throw new WalletError(
      "INVALID_INPUT",
      "Username must be at least 3 characters of letters, digits or underscore",
      { field: "username" },
    );
  }
  return trimmed;
}

export function validatePassword(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new WalletError(
      "INVALID_INPUT",
      `Password must be at least ${String(MIN_PASSWORD_LENGTH)} characters`,
      { field: "password" },
    );
  }
}

// =============================================================================
// User Store
// =============================================================================

export class UserStore {
  private readonly persistence: WalletPersistence;
  private readonly now: () => Date;
  private users: readonly UserRecord[];

  constructor(persistence: WalletPersistence, options: UserStoreOptions = {}) {
    this.persistence = persistence;
    this.now = options.now ?? (() => new Date());
    this.users = [...persistence.loadUsers()];
  }

  register(username: string, password: string): UserProfile {
    const name = validateUsername(username);
    validatePassword(password);

    if (this.findRecord(name) !== undefined) {
      throw new WalletError("DUPLICATE_USER", `Username '${name}' is already taken`, {
        username: name,
      });
    }

    const { hash, salt } = hashPassword(password);
    const record: UserRecord = {
      id: this.users.reduce((max, u) => Math.max(max, u.id), 0) + 1,
      username: name,
      passwordHash: hash,
      salt,
      registeredAt: this.now().toISOString(),
    };

    this.commit([...this.users, record]);
    return toProfile(record);
  }

  /**
   * Unknown usernames and wrong passwords fail the same way.
   */
  authenticate(username: string, password: string): UserProfile {
    const record = this.findRecord(username.trim());
    if (
      record === undefined ||
      !verifyPassword(password, { hash: record.passwordHash, salt: record.salt })
    ) {
      throw new WalletError("INVALID_CREDENTIALS", "Invalid username or password");
    }
    return toProfile(record);
  }

  changePassword(userId: number, oldPassword: string, newPassword: string): UserProfile {
    const record = this.users.find((u) => u.id === userId);
    if (record === undefined) {
      throw new WalletError("NOT_AUTHENTICATED", `User ${String(userId)} does not exist`);
    }
    if (!verifyPassword(oldPassword, { hash: record.passwordHash, salt: record.salt })) {
      throw new WalletError("INVALID_CREDENTIALS", "Current password is incorrect");
    }
    validatePassword(newPassword);

    const { hash, salt } = hashPassword(newPassword);
    const updated: UserRecord = { ...record, passwordHash: hash, salt };
    this.commit(this.users.map((u) => (u.id === userId ? updated : u)));
    return toProfile(updated);
  }

  findById(id: number): UserProfile | undefined {
    const record = this.users.find((u) => u.id === id);
    return record === undefined ? undefined : toProfile(record);
  }

  findByUsername(username: string): UserProfile | undefined {
    const record = this.findRecord(username);
    return record === undefined ? undefined : toProfile(record);
  }

  get size(): number {
    return this.users.length;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Private
  // ─────────────────────────────────────────────────────────────────────

  private findRecord(username: string): UserRecord | undefined {
    return this.users.find((u) => u.username === username);
  }

  private commit(next: readonly UserRecord[]): void {
    this.persistence.saveUsers(next);
    this.users = next;
  }
}
