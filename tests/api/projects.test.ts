import express from 'express';
import { createApp, createAppContext } from '../../src/server';
import { RecordingNotifier, bearer, captureLogs, request, signUp, testConfig } from '../helpers';

describe('Project API', () => {
  let app: express.Application;
  let owner: { id: string; token: string };

  beforeAll(() => {
    captureLogs();
  });

  beforeEach(async () => {
    app = createApp(createAppContext(testConfig(), { notifier: new RecordingNotifier() }));
    owner = await signUp(app, 'owner@example.com', 'Olivia Owner');
  });

  async function createProject(name: string): Promise<string> {
    const res = await request(app, 'POST', '/projects', { name }, bearer(owner.token));
    expect(res.status).toBe(201);
    return res.body.project.id;
  }

  test('every project route requires a session', async () => {
    const res = await request(app, 'GET', '/projects');
    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe('AUTH.UNAUTHENTICATED');
  });

  test('POST /projects creates a planned project owned by the caller', async () => {
    const res = await request(
      app,
      'POST',
      '/projects',
      { name: 'Demo', githubUsername: 'olivia', repositoryUrl: 'https://github.com/olivia/demo' },
      bearer(owner.token),
    );
    expect(res.status).toBe(201);
    expect(res.body.project).toMatchObject({
      name: 'Demo',
      status: 'planned',
      ownerId: owner.id,
      repositoryUrl: 'https://github.com/olivia/demo',
    });
    expect(res.body.project.id).toMatch(/^proj_/);
  });

  test('invalid project input answers 400 and duplicates 409', async () => {
    const empty = await request(app, 'POST', '/projects', { name: '' }, bearer(owner.token));
    expect(empty.status).toBe(400);
    expect(empty.body.error.code).toBe('VALIDATION.SCHEMA');

    await createProject('Demo');
    const dup = await request(app, 'POST', '/projects', { name: 'demo' }, bearer(owner.token));
    expect(dup.status).toBe(409);
  });

  test('GET /projects lists newest first and honours filters', async () => {
    const first = await createProject('first');
    const second = await createProject('second');
    await request(app, 'POST', `/projects/${first}/status`, { status: 'active' }, bearer(owner.token));

    const all = await request(app, 'GET', '/projects?pageSize=1', undefined, bearer(owner.token));
    expect(all.status).toBe(200);
    expect(all.body.projects.map((p: { id: string }) => p.id)).toEqual([second, first]);

    const active = await request(app, 'GET', '/projects?status=active', undefined, bearer(owner.token));
    expect(active.body.projects.map((p: { id: string }) => p.id)).toEqual([first]);

    const unknown = await request(app, 'GET', '/projects?status=launched', undefined, bearer(owner.token));
    expect(unknown.status).toBe(400);
    expect(unknown.body.error.message).toBe('Unknown project status: launched');

    const badPage = await request(app, 'GET', '/projects?pageSize=0', undefined, bearer(owner.token));
    expect(badPage.status).toBe(400);
  });

  test('status changes follow the lifecycle', async () => {
    const id = await createProject('demo');

    const skip = await request(app, 'POST', `/projects/${id}/status`, { status: 'deployed' }, bearer(owner.token));
    expect(skip.status).toBe(409);
    expect(skip.body.error.code).toBe('STATE.INVALID_TRANSITION');

    const bogus = await request(app, 'POST', `/projects/${id}/status`, { status: 'launched' }, bearer(owner.token));
    expect(bogus.status).toBe(400);
    expect(bogus.body.error.details.validStatuses).toEqual(['planned', 'active', 'deployed', 'archived']);

    const ok = await request(app, 'POST', `/projects/${id}/status`, { status: 'active' }, bearer(owner.token));
    expect(ok.status).toBe(200);
    expect(ok.body.project.status).toBe('active');
  });

  test('deployments append and move the status', async () => {
    const id = await createProject('demo');
    await request(app, 'POST', `/projects/${id}/status`, { status: 'active' }, bearer(owner.token));

    const recorded = await request(
      app,
      'POST',
      `/projects/${id}/deployments`,
      { outcome: 'succeeded', notes: 'v1' },
      bearer(owner.token),
    );
    expect(recorded.status).toBe(201);
    expect(recorded.body.deployment).toMatchObject({ sequence: 1, outcome: 'succeeded', projectStatus: 'deployed' });

    const history = await request(app, 'GET', `/projects/${id}/deployments`, undefined, bearer(owner.token));
    expect(history.body.deployments).toHaveLength(1);

    const project = await request(app, 'GET', `/projects/${id}`, undefined, bearer(owner.token));
    expect(project.body.project.status).toBe('deployed');
  });

  test('GET /projects/:projectId carries the deployment URL and repository name', async () => {
    const created = await request(
      app,
      'POST',
      '/projects',
      {
        name: 'site',
        githubUsername: 'jane',
        repositoryUrl: 'https://github.com/jane/demo-app',
        domainName: 'demo.example.com',
      },
      bearer(owner.token),
    );
    const res = await request(app, 'GET', `/projects/${created.body.project.id}`, undefined, bearer(owner.token));
    expect(res.body.deploymentUrl).toBe('https://demo.example.com');
    expect(res.body.repositoryName).toBe('demo-app');

    const bare = await request(app, 'GET', `/projects/${await createProject('bare')}`, undefined, bearer(owner.token));
    expect(bare.body.deploymentUrl).toBeNull();
    expect(bare.body.repositoryName).toBeNull();
  });

  test('archiving hides a project from the default list', async () => {
    const id = await createProject('old');
    const archived = await request(app, 'POST', `/projects/${id}/archive`, undefined, bearer(owner.token));
    expect(archived.body.project.status).toBe('archived');

    const list = await request(app, 'GET', '/projects', undefined, bearer(owner.token));
    expect(list.body.projects).toEqual([]);
    const withArchived = await request(app, 'GET', '/projects?includeArchived=true', undefined, bearer(owner.token));
    expect(withArchived.body.projects).toHaveLength(1);
  });

  test('outsiders get 404 on reads and 403 on writes', async () => {
    const id = await createProject('private');
    const outsider = await signUp(app, 'outsider@example.com');

    const read = await request(app, 'GET', `/projects/${id}`, undefined, bearer(outsider.token));
    expect(read.status).toBe(404);
    const write = await request(app, 'PATCH', `/projects/${id}`, { description: 'x' }, bearer(outsider.token));
    expect(write.status).toBe(403);
  });

  test('GET /projects/dashboard counts live projects', async () => {
    await createProject('a');
    const b = await createProject('b');
    await request(app, 'POST', `/projects/${b}/status`, { status: 'active' }, bearer(owner.token));

    const res = await request(app, 'GET', '/projects/dashboard', undefined, bearer(owner.token));
    expect(res.status).toBe(200);
    expect(res.body.total).toBe(2);
    expect(res.body.byStatus).toEqual({ planned: 1, active: 1, deployed: 0 });
  });
});
