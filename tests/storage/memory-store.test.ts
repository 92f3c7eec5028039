/**
 * Memory store: copy isolation, listing order and per-key transactions.
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { Account, AccountStatus } from '../../src/domain/account';
import { DeploymentOutcome, Project, ProjectStatus } from '../../src/domain/project';
import { CollaboratorRole, Invitation, InvitationStatus } from '../../src/domain/collaboration';

function account(id: string, email: string, fullName = 'Test User'): Account {
  return {
    id,
    email,
    username: id,
    fullName,
    profile: { bio: 'hello' },
    status: AccountStatus.Active,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
  };
}

function project(id: string, ownerId: string, createdAt: string, status = ProjectStatus.Planned): Project {
  return { id, ownerId, name: id, status, createdAt, updatedAt: createdAt };
}

describe('MemoryStore deep copy isolation', () => {
  test('mutating a returned account does not touch the store', async () => {
    const store = createMemoryStore();
    await store.accounts.create(account('acct_1', 'a@example.com'));

    const loaded = await store.accounts.getById('acct_1');
    if (!loaded) throw new Error('missing account');
    loaded.profile.bio = 'changed';
    loaded.fullName = 'Changed';

    const again = await store.accounts.getById('acct_1');
    expect(again?.profile.bio).toBe('hello');
    expect(again?.fullName).toBe('Test User');
  });

  test('mutating the input after create does not touch the store', async () => {
    const store = createMemoryStore();
    const input = account('acct_1', 'a@example.com');
    await store.accounts.create(input);
    input.profile.bio = 'changed';
    expect((await store.accounts.getById('acct_1'))?.profile.bio).toBe('hello');
  });
});

describe('MemoryAccountStore', () => {
  test('email and username lookups are case-insensitive', async () => {
    const store = createMemoryStore();
    await store.accounts.create(account('acct_1', 'jane@example.com'));
    expect((await store.accounts.getByEmail('JANE@example.com'))?.id).toBe('acct_1');
    expect((await store.accounts.getByUsername('ACCT_1'))?.id).toBe('acct_1');
    expect(await store.accounts.getByEmail('nobody@example.com')).toBeNull();
  });

  test('search matches email or full name', async () => {
    const store = createMemoryStore();
    await store.accounts.create(account('acct_1', 'jane@example.com', 'Jane Doe'));
    await store.accounts.create(account('acct_2', 'john@example.com', 'John Roe'));
    expect((await store.accounts.search('doe')).map((a) => a.id)).toEqual(['acct_1']);
    expect((await store.accounts.search('example')).map((a) => a.id)).toEqual(['acct_1', 'acct_2']);
  });
});

describe('MemoryProjectStore', () => {
  test('lists owned and shared projects newest first, hiding archived', async () => {
    const store = createMemoryStore();
    await store.projects.create(project('proj_a', 'acct_1', '2024-01-01T00:00:00Z'));
    await store.projects.create(project('proj_b', 'acct_2', '2024-01-02T00:00:00Z'));
    await store.projects.create(project('proj_c', 'acct_1', '2024-01-03T00:00:00Z', ProjectStatus.Archived));
    await store.projects.create(project('proj_d', 'acct_1', '2024-01-04T00:00:00Z'));
    await store.projects.create(project('proj_e', 'acct_3', '2024-01-05T00:00:00Z'));

    const visible = await store.projects.list({ ownerId: 'acct_1', projectIds: ['proj_b'] });
    expect(visible.map((p) => p.id)).toEqual(['proj_d', 'proj_b', 'proj_a']);

    const all = await store.projects.list({ ownerId: 'acct_1', includeArchived: true });
    expect(all.map((p) => p.id)).toEqual(['proj_d', 'proj_c', 'proj_a']);

    const archived = await store.projects.list({ ownerId: 'acct_1', status: ProjectStatus.Archived });
    expect(archived.map((p) => p.id)).toEqual(['proj_c']);

    const page = await store.projects.list({ ownerId: 'acct_1', projectIds: ['proj_b'], limit: 2, offset: 1 });
    expect(page.map((p) => p.id)).toEqual(['proj_b', 'proj_a']);
  });

  test('update never changes id or owner', async () => {
    const store = createMemoryStore();
    await store.projects.create(project('proj_a', 'acct_1', '2024-01-01T00:00:00Z'));
    const updated = await store.projects.update('proj_a', { id: 'proj_x', ownerId: 'acct_2', name: 'Renamed' });
    expect(updated?.id).toBe('proj_a');
    expect(updated?.ownerId).toBe('acct_1');
    expect(updated?.name).toBe('Renamed');
  });

  test('findByOwnerAndName ignores case and archived projects', async () => {
    const store = createMemoryStore();
    await store.projects.create({ ...project('proj_a', 'acct_1', '2024-01-01T00:00:00Z'), name: 'Demo' });
    await store.projects.create({
      ...project('proj_b', 'acct_1', '2024-01-02T00:00:00Z', ProjectStatus.Archived),
      name: 'Old',
    });
    expect((await store.projects.findByOwnerAndName('acct_1', 'demo'))?.id).toBe('proj_a');
    expect(await store.projects.findByOwnerAndName('acct_1', 'old')).toBeNull();
    expect(await store.projects.findByOwnerAndName('acct_2', 'demo')).toBeNull();
  });
});

describe('MemoryDeploymentStore', () => {
  test('appends keep earlier records intact and in order', async () => {
    const store = createMemoryStore();
    for (let sequence = 1; sequence <= 3; sequence++) {
      await store.deployments.append({
        id: `dep_${sequence}`,
        projectId: 'proj_a',
        sequence,
        outcome: DeploymentOutcome.Succeeded,
        projectStatus: ProjectStatus.Deployed,
        triggeredBy: 'acct_1',
        createdAt: '2024-01-01T00:00:00Z',
      });
    }
    const history = await store.deployments.listByProject('proj_a');
    expect(history.map((d) => d.id)).toEqual(['dep_1', 'dep_2', 'dep_3']);
    expect(await store.deployments.countByProject('proj_a')).toBe(3);
    expect(await store.deployments.countByProject('proj_b')).toBe(0);
  });
});

describe('MemoryInvitationStore', () => {
  const invitation: Invitation = {
    id: 'inv_1',
    token: 'tok_1',
    projectId: 'proj_a',
    inviterId: 'acct_1',
    email: 'Guest@Example.com',
    role: CollaboratorRole.Viewer,
    status: InvitationStatus.Pending,
    createdAt: '2024-01-01T00:00:00Z',
    expiresAt: '2024-01-31T00:00:00Z',
  };

  test('tokens are immutable and recipients match by email case-insensitively', async () => {
    const store = createMemoryStore();
    await store.invitations.create(invitation);
    const updated = await store.invitations.update('inv_1', { token: 'tok_2', status: InvitationStatus.Declined });
    expect(updated?.token).toBe('tok_1');
    expect((await store.invitations.getByToken('tok_1'))?.status).toBe(InvitationStatus.Declined);

    expect(await store.invitations.listForRecipient('acct_9', 'guest@example.com')).toHaveLength(1);
    expect(
      await store.invitations.listForRecipient('acct_9', 'guest@example.com', InvitationStatus.Pending),
    ).toHaveLength(0);
  });
});

describe('MemorySessionStore', () => {
  test('purgeExpired drops only expired revocations', async () => {
    const store = createMemoryStore();
    await store.sessions.revoke({ tokenId: 'old', accountId: 'acct_1', expiresAt: '2024-01-01T00:00:00Z' });
    await store.sessions.revoke({ tokenId: 'new', accountId: 'acct_1', expiresAt: '2099-01-01T00:00:00Z' });
    expect(await store.sessions.purgeExpired(new Date('2024-06-01T00:00:00Z'))).toBe(1);
    expect(await store.sessions.isRevoked('old')).toBe(false);
    expect(await store.sessions.isRevoked('new')).toBe(true);
  });
});

describe('transaction', () => {
  test('serializes work on the same key in arrival order', async () => {
    const store = createMemoryStore();
    const events: string[] = [];
    const step = (name: string, ms: number) =>
      store.transaction('key', async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, ms));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([step('a', 20), step('b', 0), step('c', 5)]);
    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  test('different keys do not wait for each other', async () => {
    const store = createMemoryStore();
    const events: string[] = [];
    let releaseSlow: () => void = () => undefined;
    const slow = store.transaction('one', async () => {
      events.push('slow:start');
      await new Promise<void>((resolve) => {
        releaseSlow = resolve;
      });
      events.push('slow:end');
    });
    await store.transaction('two', async () => {
      events.push('fast');
    });
    releaseSlow();
    await slow;
    expect(events).toEqual(['slow:start', 'fast', 'slow:end']);
  });

  test('a failing transaction releases the key', async () => {
    const store = createMemoryStore();
    await expect(
      store.transaction('key', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(store.transaction('key', async () => 'next')).resolves.toBe('next');
  });

  test('ping can simulate an outage', async () => {
    const store = createMemoryStore({ ping: async () => Promise.reject(new Error('connection refused')) });
    await expect(store.ping()).rejects.toThrow('connection refused');
    await expect(createMemoryStore().ping()).resolves.toBeUndefined();
  });
});
