/**
 * Account Service.
 *
 * Registration, authentication, sessions and profiles. Raw passwords are
 * hashed before they reach the store and are never logged or returned.
 */

import { v4 as uuid } from 'uuid';
import {
  Account,
  AccountStatus,
  AccountSummary,
  normalizeEmail,
  toAccountSummary,
  usernameFromEmail,
} from '../domain/account';
import { RequestContext } from '../domain/context';
import {
  ServiceError,
  authError,
  authorizationError,
  conflictError,
  notFoundError,
  validationError,
} from '../domain/errors';
import {
  changePasswordSchema,
  loginSchema,
  parseInput,
  passwordWeaknesses,
  profileUpdateSchema,
  registerSchema,
} from '../domain/validation';
import { PasswordHasher } from '../auth/password';
import { SessionClaims, SessionTokenError, SessionTokens } from '../auth/session-tokens';
import { AuditService } from '../audit/audit-service';
import { Store } from '../storage/store';
import { Logger } from '../logger';

export interface RegisterInput {
  email: string;
  password: string;
  fullName: string;
  username?: string;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface ProfileUpdate {
  fullName?: string;
  email?: string;
  bio?: string | null;
  githubUrl?: string | null;
  photoUrl?: string | null;
}

export interface Session {
  token: string;
  expiresAt: string;
  account: Account;
}

/** Identity established from a verified session token. */
export interface SessionIdentity {
  accountId: string;
  tokenId: string;
  expiresAt: Date;
}

export interface AccountServiceOptions {
  /** Floor on authenticate() duration, success or failure. */
  authMinDurationMs: number;
}

const SEARCH_MIN_QUERY_LENGTH = 2;
const SEARCH_MAX_RESULTS = 10;
const USERNAME_SUFFIX_ATTEMPTS = 1000;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class AccountService {
  /** Verified against when the account does not exist, so misses cost the same. */
  private dummyHash: Promise<string>;

  constructor(
    private readonly store: Store,
    private readonly hasher: PasswordHasher,
    private readonly tokens: SessionTokens,
    private readonly auditService: AuditService,
    private readonly logger: Logger,
    private readonly options: AccountServiceOptions,
  ) {
    this.dummyHash = hasher.hash(uuid());
  }

  /** Register a new account. Fails on duplicates and weak passwords. */
  async register(input: RegisterInput): Promise<Account> {
    const parsed = parseInput(registerSchema, input);
    const email = normalizeEmail(parsed.email);

    const weaknesses = passwordWeaknesses(parsed.password, email);
    if (weaknesses.length > 0) {
      throw new ServiceError(validationError(weaknesses.join('; '), { field: 'password', reasons: weaknesses }));
    }

    const hash = await this.hasher.hash(parsed.password);

    // Uniqueness is checked and claimed under one lock so concurrent
    // registrations cannot both pass the check.
    const account = await this.store.transaction('accounts:identity', async () => {
      if (await this.store.accounts.getByEmail(email)) {
        throw new ServiceError(conflictError('This email is already in use', { field: 'email' }));
      }

      let username: string;
      if (parsed.username) {
        if (await this.store.accounts.getByUsername(parsed.username)) {
          throw new ServiceError(conflictError('This username is already in use', { field: 'username' }));
        }
        username = parsed.username;
      } else {
        username = await this.availableUsername(usernameFromEmail(email));
      }

      const now = new Date().toISOString();
      const created: Account = {
        id: `acct_${uuid()}`,
        email,
        username,
        fullName: parsed.fullName,
        profile: {},
        status: AccountStatus.Active,
        createdAt: now,
        updatedAt: now,
      };
      await this.store.accounts.create(created);
      await this.store.credentials.set({ accountId: created.id, passwordHash: hash, updatedAt: now });
      return created;
    });

    await this.auditService.tryRecord(
      { actorId: account.id, action: 'account.registered', resourceType: 'account', resourceId: account.id },
      this.logger,
    );
    this.logger.info('Account registered', { accountId: account.id });
    return account;
  }

  /**
   * Exchange credentials for a session token.
   *
   * Every path runs one key derivation and then waits out the configured
   * minimum, so timing does not reveal whether the email exists.
   */
  async authenticate(credentials: Credentials): Promise<Session> {
    const startedAt = Date.now();
    try {
      return await this.authenticateInner(credentials);
    } finally {
      const remaining = this.options.authMinDurationMs - (Date.now() - startedAt);
      if (remaining > 0) await delay(remaining);
    }
  }

  private async authenticateInner(credentials: Credentials): Promise<Session> {
    const parsed = loginSchema.safeParse(credentials);
    if (!parsed.success) {
      await this.hasher.verify('', await this.dummyHash);
      throw new ServiceError(authError());
    }

    const account = await this.store.accounts.getByEmail(normalizeEmail(parsed.data.email));
    const credential = account ? await this.store.credentials.get(account.id) : null;
    const valid = await this.hasher.verify(parsed.data.password, credential?.passwordHash ?? (await this.dummyHash));

    if (!account || !credential || !valid || account.status !== AccountStatus.Active) {
      this.logger.warn('Authentication failed', { accountId: account?.id });
      if (account) {
        await this.auditService.tryRecord(
          {
            actorId: account.id,
            action: 'session.created',
            resourceType: 'session',
            resourceId: account.id,
            outcome: 'failure',
          },
          this.logger,
        );
      }
      throw new ServiceError(authError());
    }

    const issued = this.tokens.issue(account.id);
    await this.auditService.tryRecord(
      {
        actorId: account.id,
        action: 'session.created',
        resourceType: 'session',
        resourceId: issued.tokenId,
      },
      this.logger,
    );
    return { token: issued.token, expiresAt: issued.expiresAt.toISOString(), account };
  }

  /** Resolve a bearer token to the account it was issued to. */
  async verifySession(token: string): Promise<SessionIdentity> {
    let claims: SessionClaims;
    try {
      claims = this.tokens.verify(token);
    } catch (err) {
      if (err instanceof SessionTokenError) throw new ServiceError(authError(err.message));
      throw err;
    }

    if (await this.store.sessions.isRevoked(claims.tokenId)) {
      throw new ServiceError(authError('Session revoked'));
    }

    const account = await this.store.accounts.getById(claims.accountId);
    if (!account || account.status !== AccountStatus.Active) {
      throw new ServiceError(authError('Account is not active'));
    }

    return claims;
  }

  /** Revoke the session behind a token. */
  async logout(ctx: RequestContext, session: SessionIdentity): Promise<void> {
    await this.store.sessions.revoke({
      tokenId: session.tokenId,
      accountId: session.accountId,
      expiresAt: session.expiresAt.toISOString(),
    });
    await this.store.sessions.purgeExpired(new Date());
    await this.auditService.tryRecord(
      { actorId: ctx.actorId, action: 'session.revoked', resourceType: 'session', resourceId: session.tokenId },
      ctx.logger,
    );
  }

  async getAccount(ctx: RequestContext, accountId: string): Promise<Account> {
    const account = await this.store.accounts.getById(accountId);
    if (!account) throw new ServiceError(notFoundError('Account', accountId));
    return account;
  }

  /** Update the actor's own profile fields; null clears an optional field. */
  async updateProfile(ctx: RequestContext, accountId: string, fields: ProfileUpdate): Promise<Account> {
    const parsed = parseInput(profileUpdateSchema, fields);
    this.requireSelf(ctx, accountId);

    const updated = await this.store.transaction('accounts:identity', async () => {
      const account = await this.store.accounts.getById(accountId);
      if (!account) throw new ServiceError(notFoundError('Account', accountId));

      const updates: Partial<Account> = {};
      if (parsed.email !== undefined) {
        const email = normalizeEmail(parsed.email);
        const holder = await this.store.accounts.getByEmail(email);
        if (holder && holder.id !== accountId) {
          throw new ServiceError(conflictError('This email is already in use', { field: 'email' }));
        }
        updates.email = email;
      }
      if (parsed.fullName !== undefined) updates.fullName = parsed.fullName;

      const profile = { ...account.profile };
      if (parsed.bio !== undefined) profile.bio = parsed.bio ?? undefined;
      if (parsed.githubUrl !== undefined) profile.githubUrl = parsed.githubUrl ?? undefined;
      if (parsed.photoUrl !== undefined) profile.photoUrl = parsed.photoUrl ?? undefined;
      updates.profile = profile;

      const result = await this.store.accounts.update(accountId, updates);
      if (!result) throw new ServiceError(notFoundError('Account', accountId));
      return result;
    });

    await this.auditService.tryRecord(
      {
        actorId: ctx.actorId,
        action: 'account.updated',
        resourceType: 'account',
        resourceId: accountId,
        details: { fields: Object.keys(parsed) },
      },
      ctx.logger,
    );
    return updated;
  }

  async changePassword(ctx: RequestContext, currentPassword: string, newPassword: string): Promise<void> {
    const parsed = parseInput(changePasswordSchema, { currentPassword, newPassword });
    const account = await this.getAccount(ctx, ctx.actorId);

    const weaknesses = passwordWeaknesses(parsed.newPassword, account.email);
    if (weaknesses.length > 0) {
      throw new ServiceError(validationError(weaknesses.join('; '), { field: 'newPassword', reasons: weaknesses }));
    }

    const credential = await this.store.credentials.get(account.id);
    if (!credential || !(await this.hasher.verify(parsed.currentPassword, credential.passwordHash))) {
      throw new ServiceError(authError('Current password is incorrect'));
    }

    await this.store.credentials.set({
      accountId: account.id,
      passwordHash: await this.hasher.hash(parsed.newPassword),
      updatedAt: new Date().toISOString(),
    });
    await this.auditService.tryRecord(
      { actorId: ctx.actorId, action: 'account.password_changed', resourceType: 'account', resourceId: account.id },
      ctx.logger,
    );
  }

  /** Soft-deactivate the actor's own account. */
  async deactivate(ctx: RequestContext, accountId: string): Promise<Account> {
    this.requireSelf(ctx, accountId);
    const updated = await this.store.accounts.update(accountId, { status: AccountStatus.Deactivated });
    if (!updated) throw new ServiceError(notFoundError('Account', accountId));
    await this.auditService.tryRecord(
      { actorId: ctx.actorId, action: 'account.deactivated', resourceType: 'account', resourceId: accountId },
      ctx.logger,
    );
    ctx.logger.info('Account deactivated', { accountId });
    return updated;
  }

  /** Find other active accounts by email or name, for invitations. */
  async searchAccounts(ctx: RequestContext, query: string): Promise<AccountSummary[]> {
    const needle = query.trim();
    if (needle.length < SEARCH_MIN_QUERY_LENGTH) return [];
    const matches = await this.store.accounts.search(needle, { limit: 100 });
    return matches
      .filter((a) => a.id !== ctx.actorId && a.status === AccountStatus.Active)
      .slice(0, SEARCH_MAX_RESULTS)
      .map(toAccountSummary);
  }

  private requireSelf(ctx: RequestContext, accountId: string): void {
    if (ctx.actorId !== accountId) {
      throw new ServiceError(authorizationError('Accounts can only be changed by their holder'));
    }
  }

  private async availableUsername(base: string): Promise<string> {
    if (!(await this.store.accounts.getByUsername(base))) return base;
    for (let n = 2; n < USERNAME_SUFFIX_ATTEMPTS; n++) {
      const candidate = `${base}${n}`;
      if (!(await this.store.accounts.getByUsername(candidate))) return candidate;
    }
    return `${base}-${uuid().slice(0, 8)}`;
  }
}
