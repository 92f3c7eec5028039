/**
 * In-memory storage implementation.
 *
 * Reference backend for development and tests. Records are deep-copied on
 * the way in and out so callers never hold references into store state.
 * `transaction()` serializes work per key with a promise chain.
 */

import { Account, Credential, RevokedSession } from '../domain/account';
import { AuditRecord } from '../domain/audit';
import { Collaborator, Invitation, InvitationStatus } from '../domain/collaboration';
import { DeploymentRecord, Project, ProjectStatus } from '../domain/project';
import {
  Store,
  AccountStore,
  CredentialStore,
  SessionStore,
  ProjectStore,
  ProjectQuery,
  DeploymentStore,
  CollaboratorStore,
  InvitationStore,
  AuditStore,
  ListOptions,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Newest first; ties keep the later insertion first. */
function newestFirst<T extends { createdAt: string }>(items: Iterable<T>): T[] {
  return Array.from(items)
    .reverse()
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

class MemoryAccountStore implements AccountStore {
  private data = new Map<string, Account>();

  async create(account: Account): Promise<Account> {
    this.data.set(account.id, deepCopy(account));
    return deepCopy(account);
  }

  async getById(id: string): Promise<Account | null> {
    const account = this.data.get(id);
    return account ? deepCopy(account) : null;
  }

  async getByEmail(email: string): Promise<Account | null> {
    const needle = email.toLowerCase();
    for (const account of this.data.values()) {
      if (account.email.toLowerCase() === needle) return deepCopy(account);
    }
    return null;
  }

  async getByUsername(username: string): Promise<Account | null> {
    const needle = username.toLowerCase();
    for (const account of this.data.values()) {
      if (account.username.toLowerCase() === needle) return deepCopy(account);
    }
    return null;
  }

  async update(id: string, updates: Partial<Account>): Promise<Account | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id, updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async search(query: string, options?: ListOptions): Promise<Account[]> {
    const needle = query.toLowerCase();
    const matches = Array.from(this.data.values()).filter(
      (a) => a.email.toLowerCase().includes(needle) || a.fullName.toLowerCase().includes(needle),
    );
    return applyListOptions(matches, options).map(deepCopy);
  }
}

class MemoryCredentialStore implements CredentialStore {
  private data = new Map<string, Credential>();

  async set(credential: Credential): Promise<void> {
    this.data.set(credential.accountId, deepCopy(credential));
  }

  async get(accountId: string): Promise<Credential | null> {
    const credential = this.data.get(accountId);
    return credential ? deepCopy(credential) : null;
  }
}

class MemorySessionStore implements SessionStore {
  private revoked = new Map<string, RevokedSession>();

  async revoke(session: RevokedSession): Promise<void> {
    this.revoked.set(session.tokenId, deepCopy(session));
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    return this.revoked.has(tokenId);
  }

  async purgeExpired(now: Date): Promise<number> {
    let dropped = 0;
    for (const [tokenId, session] of this.revoked) {
      if (new Date(session.expiresAt).getTime() <= now.getTime()) {
        this.revoked.delete(tokenId);
        dropped++;
      }
    }
    return dropped;
  }
}

class MemoryProjectStore implements ProjectStore {
  private data = new Map<string, Project>();

  async create(project: Project): Promise<Project> {
    this.data.set(project.id, deepCopy(project));
    return deepCopy(project);
  }

  async getById(id: string): Promise<Project | null> {
    const project = this.data.get(id);
    return project ? deepCopy(project) : null;
  }

  async update(id: string, updates: Partial<Project>): Promise<Project | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = {
      ...deepCopy(existing),
      ...deepCopy(updates),
      id,
      ownerId: existing.ownerId,
      updatedAt: new Date().toISOString(),
    };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(query: ProjectQuery): Promise<Project[]> {
    const shared = new Set(query.projectIds ?? []);
    const matches = newestFirst(this.data.values()).filter((p) => {
      if (query.ownerId !== undefined || query.projectIds !== undefined) {
        const owned = query.ownerId !== undefined && p.ownerId === query.ownerId;
        if (!owned && !shared.has(p.id)) return false;
      }
      if (query.status && p.status !== query.status) return false;
      if (!query.includeArchived && query.status !== ProjectStatus.Archived && p.status === ProjectStatus.Archived) {
        return false;
      }
      return true;
    });
    return applyListOptions(matches, query).map(deepCopy);
  }

  async findByOwnerAndName(ownerId: string, name: string): Promise<Project | null> {
    const needle = name.toLowerCase();
    for (const project of this.data.values()) {
      if (
        project.ownerId === ownerId &&
        project.status !== ProjectStatus.Archived &&
        project.name.toLowerCase() === needle
      ) {
        return deepCopy(project);
      }
    }
    return null;
  }
}

class MemoryDeploymentStore implements DeploymentStore {
  private data = new Map<string, DeploymentRecord[]>();

  async append(record: DeploymentRecord): Promise<DeploymentRecord> {
    const history = this.data.get(record.projectId) ?? [];
    history.push(deepCopy(record));
    this.data.set(record.projectId, history);
    return deepCopy(record);
  }

  async listByProject(projectId: string, options?: ListOptions): Promise<DeploymentRecord[]> {
    const history = this.data.get(projectId) ?? [];
    return applyListOptions(history, options).map(deepCopy);
  }

  async countByProject(projectId: string): Promise<number> {
    return this.data.get(projectId)?.length ?? 0;
  }
}

class MemoryCollaboratorStore implements CollaboratorStore {
  private data = new Map<string, Collaborator>();

  async create(collaborator: Collaborator): Promise<Collaborator> {
    this.data.set(collaborator.id, deepCopy(collaborator));
    return deepCopy(collaborator);
  }

  async getById(id: string): Promise<Collaborator | null> {
    const collaborator = this.data.get(id);
    return collaborator ? deepCopy(collaborator) : null;
  }

  async find(projectId: string, accountId: string): Promise<Collaborator | null> {
    for (const c of this.data.values()) {
      if (c.projectId === projectId && c.accountId === accountId) return deepCopy(c);
    }
    return null;
  }

  async listByProject(projectId: string): Promise<Collaborator[]> {
    return Array.from(this.data.values())
      .filter((c) => c.projectId === projectId)
      .reverse()
      .sort((a, b) => b.addedAt.localeCompare(a.addedAt))
      .map(deepCopy);
  }

  async listByAccount(accountId: string): Promise<Collaborator[]> {
    return Array.from(this.data.values())
      .filter((c) => c.accountId === accountId)
      .reverse()
      .sort((a, b) => b.addedAt.localeCompare(a.addedAt))
      .map(deepCopy);
  }

  async update(id: string, updates: Partial<Collaborator>): Promise<Collaborator | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

class MemoryInvitationStore implements InvitationStore {
  private data = new Map<string, Invitation>();

  async create(invitation: Invitation): Promise<Invitation> {
    this.data.set(invitation.id, deepCopy(invitation));
    return deepCopy(invitation);
  }

  async getById(id: string): Promise<Invitation | null> {
    const invitation = this.data.get(id);
    return invitation ? deepCopy(invitation) : null;
  }

  async getByToken(token: string): Promise<Invitation | null> {
    for (const invitation of this.data.values()) {
      if (invitation.token === token) return deepCopy(invitation);
    }
    return null;
  }

  async update(id: string, updates: Partial<Invitation>): Promise<Invitation | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id, token: existing.token };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async listByProject(
    projectId: string,
    options?: ListOptions & { status?: InvitationStatus },
  ): Promise<Invitation[]> {
    const matches = newestFirst(this.data.values()).filter(
      (i) => i.projectId === projectId && (!options?.status || i.status === options.status),
    );
    return applyListOptions(matches, options).map(deepCopy);
  }

  async listForRecipient(accountId: string, email: string, status?: InvitationStatus): Promise<Invitation[]> {
    const needle = email.toLowerCase();
    return newestFirst(this.data.values())
      .filter((i) => i.inviteeId === accountId || (i.email !== undefined && i.email.toLowerCase() === needle))
      .filter((i) => !status || i.status === status)
      .map(deepCopy);
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async list(options?: ListOptions & { actorId?: string; projectId?: string }): Promise<AuditRecord[]> {
    let filtered = this.data;
    if (options?.actorId) filtered = filtered.filter((r) => r.actorId === options.actorId);
    if (options?.projectId) filtered = filtered.filter((r) => r.projectId === options.projectId);
    return applyListOptions(filtered, options).map(deepCopy);
  }
}

/** Per-key FIFO lock built from promise chains. */
class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

/** Options for the in-memory store. */
export interface MemoryStoreOptions {
  /** Replace the reachability probe (tests simulate outages with this). */
  ping?: () => Promise<void>;
}

/** Create a new in-memory store instance. */
export function createMemoryStore(options: MemoryStoreOptions = {}): Store {
  const lock = new KeyedLock();
  return {
    accounts: new MemoryAccountStore(),
    credentials: new MemoryCredentialStore(),
    sessions: new MemorySessionStore(),
    projects: new MemoryProjectStore(),
    deployments: new MemoryDeploymentStore(),
    collaborators: new MemoryCollaboratorStore(),
    invitations: new MemoryInvitationStore(),
    audit: new MemoryAuditStore(),
    transaction: (key, fn) => lock.run(key, fn),
    ping: options.ping ?? (async () => undefined),
  };
}
