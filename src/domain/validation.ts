/**
 * Input schemas for service operations.
 *
 * Every service parses its input through one of these before touching the
 * store, so HTTP bodies and programmatic callers get the same checks.
 */

import { z } from 'zod';
import { ServiceError, validationError } from './errors';
import { CollaboratorRole } from './collaboration';
import { DeploymentOutcome, ProjectStatus } from './project';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

const GITHUB_USERNAME = /^[a-zA-Z0-9][a-zA-Z0-9-]{0,38}$/;
const DOMAIN_NAME = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const DATABASE_NAME = /^[a-zA-Z][a-zA-Z0-9_]*$/;
const USERNAME = /^[a-zA-Z0-9._-]{2,64}$/;

const email = z.string().trim().min(1, 'Email is required').email('Invalid email format').max(254);
const password = z.string().min(1, 'Password is required').max(PASSWORD_MAX_LENGTH);
const githubUrl = z
  .string()
  .url()
  .refine((v) => v.startsWith('https://github.com/'), 'Please enter a valid GitHub URL (https://github.com/username)');

export const registerSchema = z.object({
  email,
  password,
  fullName: z.string().trim().min(1, 'Full name is required').max(255),
  username: z.string().trim().regex(USERNAME, 'Invalid username').optional(),
});

export const loginSchema = z.object({
  email,
  password,
});

export const profileUpdateSchema = z
  .object({
    fullName: z.string().trim().min(1).max(255),
    email,
    bio: z.string().max(2000).nullable(),
    githubUrl: githubUrl.nullable(),
    photoUrl: z.string().url().nullable(),
  })
  .partial()
  .strict();

export const changePasswordSchema = z.object({
  currentPassword: password,
  newPassword: password,
});

const deploymentTargetShape = {
  githubUsername: z.string().regex(GITHUB_USERNAME, 'Invalid GitHub username format'),
  repositoryUrl: z.string().url().max(500),
  domainName: z.string().max(253).regex(DOMAIN_NAME, 'Invalid domain name format'),
  databaseName: z
    .string()
    .max(63)
    .regex(DATABASE_NAME, 'Database name must start with a letter and contain only letters, numbers, and underscores'),
};

const projectName = z.string().trim().min(1, 'Project name is required').max(100);

export const createProjectSchema = z
  .object({
    name: projectName,
    description: z.string().max(5000).optional(),
    githubUsername: deploymentTargetShape.githubUsername.optional(),
    repositoryUrl: deploymentTargetShape.repositoryUrl.optional(),
    domainName: deploymentTargetShape.domainName.optional(),
    databaseName: deploymentTargetShape.databaseName.optional(),
  })
  .strict();

export const updateProjectSchema = createProjectSchema.partial().strict();

export const projectStatusSchema = z.nativeEnum(ProjectStatus);

export const projectFiltersSchema = z.object({
  status: projectStatusSchema.optional(),
  includeArchived: z.boolean().optional(),
  pageSize: z.number().int().min(1).max(100).optional(),
});

export const recordDeploymentSchema = z.object({
  outcome: z.nativeEnum(DeploymentOutcome),
  notes: z.string().max(2000).optional(),
});

export const collaboratorRoleSchema = z.nativeEnum(CollaboratorRole);

export const inviteSchema = z
  .object({
    inviteeId: z.string().min(1).optional(),
    email: email.optional(),
    role: collaboratorRoleSchema.optional(),
  })
  .strict()
  .refine((v) => Boolean(v.inviteeId) !== Boolean(v.email), {
    message: 'Exactly one of inviteeId or email must be provided',
  });

/** Repository URL must belong to the stated GitHub user when both are set. */
export function repositoryOwnerMismatch(githubUsername?: string, repositoryUrl?: string): string | null {
  if (!githubUsername || !repositoryUrl) return null;
  const expected = `https://github.com/${githubUsername}/`;
  return repositoryUrl.startsWith(expected) ? null : `Repository URL must belong to GitHub user ${githubUsername}`;
}

/** Reasons a password is too weak, empty when acceptable. */
export function passwordWeaknesses(candidate: string, emailAddress?: string): string[] {
  const reasons: string[] = [];
  if (candidate.length < PASSWORD_MIN_LENGTH) reasons.push(`Password must be at least ${PASSWORD_MIN_LENGTH} characters`);
  if (candidate.length > PASSWORD_MAX_LENGTH) reasons.push(`Password must be at most ${PASSWORD_MAX_LENGTH} characters`);
  if (/^\d+$/.test(candidate)) reasons.push('Password cannot be entirely numeric');
  const local = emailAddress?.split('@')[0]?.toLowerCase();
  if (local && local.length >= 3 && candidate.toLowerCase().includes(local)) {
    reasons.push('Password is too similar to the email address');
  }
  return reasons;
}

/** Parse input or throw a VALIDATION.SCHEMA ServiceError listing the issues. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    throw new ServiceError(validationError(summary || 'Invalid input', { issues }));
  }
  return result.data;
}
