/**
 * Storage layer interfaces.
 *
 * Defines the contract for persistence with pluggable backends. Every
 * service goes through a Store; status transitions run inside
 * `transaction()` so the re-read and the write see no interleaved writer.
 */

import { Account, Credential, RevokedSession } from '../domain/account';
import { AuditRecord } from '../domain/audit';
import { Collaborator, Invitation, InvitationStatus } from '../domain/collaboration';
import { DeploymentRecord, Project, ProjectStatus } from '../domain/project';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for accounts. */
export interface AccountStore {
  create(account: Account): Promise<Account>;
  getById(id: string): Promise<Account | null>;
  getByEmail(email: string): Promise<Account | null>;
  getByUsername(username: string): Promise<Account | null>;
  update(id: string, updates: Partial<Account>): Promise<Account | null>;
  /** Case-insensitive substring match on email or full name. */
  search(query: string, options?: ListOptions): Promise<Account[]>;
}

/** Store interface for credentials (account → password hash). */
export interface CredentialStore {
  set(credential: Credential): Promise<void>;
  get(accountId: string): Promise<Credential | null>;
}

/** Store interface for revoked session tokens. */
export interface SessionStore {
  revoke(session: RevokedSession): Promise<void>;
  isRevoked(tokenId: string): Promise<boolean>;
  /** Forget revocations whose tokens have expired; returns how many were dropped. */
  purgeExpired(now: Date): Promise<number>;
}

/** Project query: projects owned by, or shared with, one account. */
export interface ProjectQuery extends ListOptions {
  ownerId?: string;
  /** Also include these project ids (projects the account collaborates on). */
  projectIds?: string[];
  status?: ProjectStatus;
  includeArchived?: boolean;
}

/** Store interface for projects. Listing is newest first. */
export interface ProjectStore {
  create(project: Project): Promise<Project>;
  getById(id: string): Promise<Project | null>;
  update(id: string, updates: Partial<Project>): Promise<Project | null>;
  list(query: ProjectQuery): Promise<Project[]>;
  /** Non-archived project of this owner with this name, case-insensitive. */
  findByOwnerAndName(ownerId: string, name: string): Promise<Project | null>;
}

/** Store interface for the append-only deployment log. */
export interface DeploymentStore {
  append(record: DeploymentRecord): Promise<DeploymentRecord>;
  /** Oldest first. */
  listByProject(projectId: string, options?: ListOptions): Promise<DeploymentRecord[]>;
  countByProject(projectId: string): Promise<number>;
}

/** Store interface for collaborators. */
export interface CollaboratorStore {
  create(collaborator: Collaborator): Promise<Collaborator>;
  getById(id: string): Promise<Collaborator | null>;
  find(projectId: string, accountId: string): Promise<Collaborator | null>;
  listByProject(projectId: string): Promise<Collaborator[]>;
  listByAccount(accountId: string): Promise<Collaborator[]>;
  update(id: string, updates: Partial<Collaborator>): Promise<Collaborator | null>;
  delete(id: string): Promise<boolean>;
}

/** Store interface for invitations. Listing is newest first. */
export interface InvitationStore {
  create(invitation: Invitation): Promise<Invitation>;
  getById(id: string): Promise<Invitation | null>;
  getByToken(token: string): Promise<Invitation | null>;
  update(id: string, updates: Partial<Invitation>): Promise<Invitation | null>;
  listByProject(projectId: string, options?: ListOptions & { status?: InvitationStatus }): Promise<Invitation[]>;
  /** Invitations addressed to an account id or to its email address. */
  listForRecipient(accountId: string, email: string, status?: InvitationStatus): Promise<Invitation[]>;
}

/** Store interface for audit records. */
export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  list(options?: ListOptions & { actorId?: string; projectId?: string }): Promise<AuditRecord[]>;
}

/** Composite store interface. */
export interface Store {
  accounts: AccountStore;
  credentials: CredentialStore;
  sessions: SessionStore;
  projects: ProjectStore;
  deployments: DeploymentStore;
  collaborators: CollaboratorStore;
  invitations: InvitationStore;
  audit: AuditStore;

  /**
   * Run `fn` with exclusive access to `key`. Work on the same key is
   * serialized in arrival order; different keys proceed independently.
   */
  transaction<T>(key: string, fn: () => Promise<T>): Promise<T>;

  /** Resolve when the backing store is reachable, reject otherwise. */
  ping(): Promise<void>;
}
