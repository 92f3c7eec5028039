/**
 * Shared fixtures: fast configuration, a capturing log handler, a recording
 * notifier and an HTTP helper that runs the app on an ephemeral port.
 */

import express from 'express';
import { AppConfig, loadConfig } from '../src/config';
import { RequestContext } from '../src/domain/context';
import { InvitationMessage, InvitationNotifier, DeliveryResult } from '../src/notifications/invitation-notifier';
import { LogEntry, LogLevel, createLogger, setLogHandler, setLogLevel } from '../src/logger';

export const TEST_SECRET = 'test-secret-value-1234';
export const TEST_PASSWORD = 'correct-horse-42';

/** Configuration with cheap hashing and no authentication floor. */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    SESSION_SECRET: TEST_SECRET,
    PASSWORD_HASH_ITERATIONS: '1000',
    AUTH_MIN_DURATION_MS: '0',
    PUBLIC_BASE_URL: 'http://devtrack.test',
    ...overrides,
  });
}

/** Route log output into an array for the duration of a test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogLevel(LogLevel.Debug);
  setLogHandler((entry) => entries.push(entry));
  return entries;
}

export function contextFor(actorId: string): RequestContext {
  return { actorId, requestId: `req_${actorId}`, logger: createLogger({ actorId }) };
}

export class RecordingNotifier implements InvitationNotifier {
  readonly sent: InvitationMessage[] = [];
  failWith: Error | null = null;

  async sendInvitation(message: InvitationMessage): Promise<DeliveryResult> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
    return { messageId: `msg_${this.sent.length}` };
  }
}

export interface TestResponse {
  status: number;
  headers: Headers;
  body: any;
}

// Simple test helper for HTTP requests without external dependencies
export async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: unknown,
  headers?: Record<string, string>,
): Promise<TestResponse> {
  const server = app.listen(0);
  try {
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const addr = server.address();
    if (addr === null || typeof addr === 'string') throw new Error('Server has no TCP address');
    const options: RequestInit = {
      method,
      headers: { 'Content-Type': 'application/json', ...headers },
    };
    if (body !== undefined) options.body = typeof body === 'string' ? body : JSON.stringify(body);

    const res = await fetch(`http://127.0.0.1:${addr.port}${path}`, options);
    const text = await res.text();
    return { status: res.status, headers: res.headers, body: text ? JSON.parse(text) : null };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/** Register an account over HTTP and sign it in. */
export async function signUp(
  app: express.Application,
  email: string,
  fullName = 'Test User',
): Promise<{ id: string; token: string }> {
  const registered = await request(app, 'POST', '/auth/register', { email, password: TEST_PASSWORD, fullName });
  if (registered.status !== 201) throw new Error(`register failed with ${registered.status}`);
  const session = await request(app, 'POST', '/auth/login', { email, password: TEST_PASSWORD });
  if (session.status !== 200) throw new Error(`login failed with ${session.status}`);
  return { id: registered.body.account.id, token: session.body.token };
}
