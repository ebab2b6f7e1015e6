/**
 * User business logic: registration, authentication, profile updates and
 * the per-user category and tag lists.
 */

import { guardStorage, StmError } from '../errors.js';
import { getLogger } from '../logger.js';
import {
  categorySchema,
  credentialsSchema,
  parseInput,
  tagSchema,
  userRegisterSchema,
  userUpdateSchema,
  type UserRegisterInput,
  type UserUpdateInput,
} from '../validation.js';
import { DEFAULT_HASH_ROUNDS, generatePassword, hashPassword, verifyPassword } from './password.js';
import { ExitCode } from '../../types/exit-codes.js';
import {
  DEFAULT_CATEGORY,
  type Identity,
  type Label,
  type LabelKind,
  type PublicUser,
  type UserRecord,
} from '../../types/user.js';
import { labelExists } from '../../store/records.js';
import type { StorageBackend } from '../../store/storage-backend.js';

export interface UserServiceOptions {
  /** bcrypt cost factor for new password hashes. */
  hashRounds?: number;
}

/** Strip the password hash. */
export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.fullName,
    disabled: user.disabled,
    categories: user.categories,
    tags: user.tags,
  };
}

/** Throw on the first name that appears twice in a list. */
function assertUniqueNames(kind: LabelKind, labels: Label[]): void {
  const seen = new Set<string>();
  for (const label of labels) {
    if (seen.has(label.name)) throw labelExists(kind, label.name);
    seen.add(label.name);
  }
}

function invalidCredentials(): StmError {
  return new StmError(ExitCode.UNAUTHORIZED, 'Incorrect username or password');
}

export class UserService {
  private readonly log = getLogger('user-service');
  private readonly hashRounds: number;

  constructor(
    private readonly storage: StorageBackend,
    options: UserServiceOptions = {},
  ) {
    this.hashRounds = options.hashRounds ?? DEFAULT_HASH_ROUNDS;
  }

  /**
   * Register a user. Stores only the bcrypt hash of the password.
   * New users get the General category unless their own list is supplied.
   */
  async register(input: UserRegisterInput): Promise<PublicUser> {
    const parsed = parseInput(userRegisterSchema, input);
    const categories = parsed.categories ?? [{ ...DEFAULT_CATEGORY }];
    const tags = parsed.tags ?? [];
    assertUniqueNames('category', categories);
    assertUniqueNames('tag', tags);

    const hashedPassword = await hashPassword(parsed.password, this.hashRounds);
    const user = await guardStorage(this.log, 'Failed to create user', () =>
      this.storage.createUser({
        username: parsed.username,
        email: parsed.email,
        hashedPassword,
        fullName: parsed.fullName,
        disabled: false,
        categories,
        tags,
      }),
    );
    this.log.info({ userId: user.id, username: user.username }, 'user registered');
    return toPublicUser(user);
  }

  /**
   * Check credentials. Unknown username, wrong password and disabled
   * accounts all fail in the Unauthorized category.
   */
  async authenticate(username: string, password: string): Promise<Identity> {
    const credentials = parseInput(credentialsSchema, { username, password });
    const user = await guardStorage(this.log, 'Failed to read user', () =>
      this.storage.findUser({ username: credentials.username }),
    );
    if (!user) throw invalidCredentials();
    if (!(await verifyPassword(credentials.password, user.hashedPassword))) {
      throw invalidCredentials();
    }
    if (user.disabled) {
      throw new StmError(ExitCode.USER_DISABLED, `User is disabled: ${user.username}`);
    }
    return { userId: user.id, username: user.username };
  }

  /**
   * Look a user up by username, registering it with a random password when
   * absent. Disabled users are refused.
   */
  async ensureUser(username: string): Promise<PublicUser> {
    const existing = await guardStorage(this.log, 'Failed to read user', () =>
      this.storage.findUser({ username: username.trim() }),
    );
    if (!existing) {
      return this.register({ username, password: generatePassword() });
    }
    if (existing.disabled) {
      throw new StmError(ExitCode.USER_DISABLED, `User is disabled: ${existing.username}`);
    }
    return toPublicUser(existing);
  }

  async getUser(userId: number): Promise<PublicUser> {
    return toPublicUser(await this.load(userId));
  }

  async getUserByUsername(username: string): Promise<PublicUser> {
    const user = await guardStorage(this.log, 'Failed to read user', () =>
      this.storage.getUser({ username: username.trim() }),
    );
    return toPublicUser(user);
  }

  async listUsers(): Promise<PublicUser[]> {
    const users = await guardStorage(this.log, 'Failed to list users', () => this.storage.listUsers());
    return users.map(toPublicUser);
  }

  /** Update profile fields. A new username must not belong to another user. */
  async updateUser(userId: number, input: UserUpdateInput): Promise<PublicUser> {
    const patch = parseInput(userUpdateSchema, input);
    const user = await guardStorage(this.log, 'Failed to update user', () =>
      this.storage.updateUser(userId, patch),
    );
    this.log.info({ userId, fields: Object.keys(patch) }, 'user updated');
    return toPublicUser(user);
  }

  // ---- Categories and tags ----

  addCategory(userId: number, name: string, color: string): Promise<Label> {
    return this.addLabel('category', userId, name, color);
  }

  addTag(userId: number, name: string, color: string): Promise<Label> {
    return this.addLabel('tag', userId, name, color);
  }

  removeCategory(userId: number, name: string): Promise<Label> {
    return this.removeLabel('category', userId, name);
  }

  removeTag(userId: number, name: string): Promise<Label> {
    return this.removeLabel('tag', userId, name);
  }

  async listCategories(userId: number): Promise<Label[]> {
    return (await this.load(userId)).categories;
  }

  async listTags(userId: number): Promise<Label[]> {
    return (await this.load(userId)).tags;
  }

  /** Duplicate check and write happen in one backend step. */
  private async addLabel(kind: LabelKind, userId: number, name: string, color: string): Promise<Label> {
    const label = parseInput(kind === 'category' ? categorySchema : tagSchema, { name, color });
    const added = await guardStorage(this.log, `Failed to add ${kind}`, () =>
      this.storage.addLabel(userId, kind, label),
    );
    this.log.info({ userId, kind, name: added.name }, 'label added');
    return added;
  }

  private async removeLabel(kind: LabelKind, userId: number, name: string): Promise<Label> {
    const removed = await guardStorage(this.log, `Failed to remove ${kind}`, () =>
      this.storage.removeLabel(userId, kind, name.trim()),
    );
    this.log.info({ userId, kind, name: removed.name }, 'label removed');
    return removed;
  }

  private load(userId: number): Promise<UserRecord> {
    return guardStorage(this.log, 'Failed to read user', () => this.storage.getUser({ id: userId }));
  }
}
