import {
  createProjectSchema,
  inviteSchema,
  parseInput,
  passwordWeaknesses,
  profileUpdateSchema,
  repositoryOwnerMismatch,
} from '../../src/domain/validation';
import { ServiceError } from '../../src/domain/errors';

function captureError(fn: () => unknown): ServiceError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ServiceError) return err;
    throw err;
  }
  throw new Error('Expected a ServiceError');
}

describe('passwordWeaknesses', () => {
  test('accepts a reasonable password', () => {
    expect(passwordWeaknesses('correct-horse-42', 'jane@example.com')).toEqual([]);
  });

  test('rejects short and all-numeric passwords', () => {
    expect(passwordWeaknesses('1234567')).toEqual([
      'Password must be at least 8 characters',
      'Password cannot be entirely numeric',
    ]);
  });

  test('rejects passwords containing the email local part', () => {
    expect(passwordWeaknesses('JaneDoe-rocks', 'janedoe@example.com')).toEqual([
      'Password is too similar to the email address',
    ]);
  });

  test('ignores local parts shorter than three characters', () => {
    expect(passwordWeaknesses('jo-is-here-now', 'jo@example.com')).toEqual([]);
  });
});

describe('parseInput', () => {
  test('returns parsed and trimmed data', () => {
    expect(parseInput(createProjectSchema, { name: '  demo  ' })).toEqual({ name: 'demo' });
  });

  test('throws VALIDATION.SCHEMA listing each issue by path', () => {
    const err = captureError(() => parseInput(createProjectSchema, { name: '', databaseName: '1db' }));
    expect(err.code).toBe('VALIDATION.SCHEMA');
    expect(err.message).toBe(
      'name: Project name is required; databaseName: Database name must start with a letter and contain only letters, numbers, and underscores',
    );
    expect(err.typedError.details?.issues).toEqual([
      { path: 'name', message: 'Project name is required' },
      {
        path: 'databaseName',
        message: 'Database name must start with a letter and contain only letters, numbers, and underscores',
      },
    ]);
  });

  test('rejects unknown project fields', () => {
    const err = captureError(() => parseInput(createProjectSchema, { name: 'demo', ownerId: 'acct_x' }));
    expect(err.code).toBe('VALIDATION.SCHEMA');
  });

  test('invite requires exactly one recipient', () => {
    expect(captureError(() => parseInput(inviteSchema, {})).message).toBe(
      'Exactly one of inviteeId or email must be provided',
    );
    expect(
      captureError(() => parseInput(inviteSchema, { inviteeId: 'acct_1', email: 'a@example.com' })).message,
    ).toBe('Exactly one of inviteeId or email must be provided');
    expect(parseInput(inviteSchema, { email: 'a@example.com' })).toEqual({ email: 'a@example.com' });
  });

  test('profile GitHub URL must be on github.com', () => {
    const err = captureError(() => parseInput(profileUpdateSchema, { githubUrl: 'https://gitlab.com/jane' }));
    expect(err.message).toBe('githubUrl: Please enter a valid GitHub URL (https://github.com/username)');
    expect(parseInput(profileUpdateSchema, { githubUrl: null })).toEqual({ githubUrl: null });
  });
});

describe('repositoryOwnerMismatch', () => {
  test('passes when either side is missing', () => {
    expect(repositoryOwnerMismatch(undefined, 'https://github.com/jane/app')).toBeNull();
    expect(repositoryOwnerMismatch('jane', undefined)).toBeNull();
  });

  test('requires the repository to sit under the user', () => {
    expect(repositoryOwnerMismatch('jane', 'https://github.com/jane/app')).toBeNull();
    expect(repositoryOwnerMismatch('jane', 'https://github.com/john/app')).toBe(
      'Repository URL must belong to GitHub user jane',
    );
  });
});
