/**
 * User, Category and Tag type definitions.
 *
 * Categories and tags are embedded on the user that owns them; names are
 * unique within one user's list.
 */

/** A named, colored label. Categories and tags share this shape. */
export interface Label {
  name: string;
  /** Hex color code, `#RGB` or `#RRGGBB`. */
  color: string;
}

export type Category = Label;
export type Tag = Label;

/** Which embedded label list an operation targets. */
export type LabelKind = 'category' | 'tag';

/** Category every new user starts with unless registration supplies its own. */
export const DEFAULT_CATEGORY: Category = { name: 'General', color: '#5dafb0' };

/** A stored user, including the password hash. Never leaves the core. */
export interface UserRecord {
  id: number;
  username: string;
  email: string;
  hashedPassword: string;
  fullName: string;
  disabled: boolean;
  categories: Category[];
  tags: Tag[];
}

/** A user as handed to a backend for insertion (the backend assigns the id). */
export type NewUserRecord = Omit<UserRecord, 'id'>;

/** Fields a user update may change. */
export type UserPatch = Partial<Omit<UserRecord, 'id'>>;

/** The view of a user returned to front-ends. */
export type PublicUser = Omit<UserRecord, 'hashedPassword'>;

/** How a backend lookup addresses a user. */
export type UserRef = { id: number } | { username: string };

/** Result of a successful credential check, used by the API to mint tokens. */
export interface Identity {
  userId: number;
  username: string;
}
