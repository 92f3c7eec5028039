/**
 * Account domain model.
 *
 * A registered user identity. Accounts are never physically deleted;
 * deactivation blocks authentication but keeps ownership intact.
 */

export enum AccountStatus {
  Active = 'active',
  Deactivated = 'deactivated',
}

export interface Profile {
  bio?: string;
  /** Must point at github.com. */
  githubUrl?: string;
  photoUrl?: string;
}

export interface Account {
  id: string;
  /** Lower-cased, unique. */
  email: string;
  /** Unique; derived from the email local part when not chosen. */
  username: string;
  fullName: string;
  profile: Profile;
  status: AccountStatus;
  createdAt: string;
  updatedAt: string;
}

/** Stored credential, kept apart from the account record. */
export interface Credential {
  accountId: string;
  passwordHash: string;
  updatedAt: string;
}

/** Revoked session token id, kept until the token would have expired anyway. */
export interface RevokedSession {
  tokenId: string;
  accountId: string;
  expiresAt: string;
}

/** Shape of an account as returned to other accounts (search results, member lists). */
export interface AccountSummary {
  id: string;
  email: string;
  username: string;
  fullName: string;
}

export function toAccountSummary(account: Account): AccountSummary {
  return {
    id: account.id,
    email: account.email,
    username: account.username,
    fullName: account.fullName,
  };
}

/** Normalize an email for storage and comparison. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Username candidate from an email local part: "Jane.Doe+x@host" → "jane.doe". */
export function usernameFromEmail(email: string): string {
  const local = normalizeEmail(email).split('@')[0] ?? '';
  const base = local.split('+')[0].replace(/[^a-z0-9._-]/g, '');
  return base || 'user';
}
