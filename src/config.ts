/**
 * Application configuration.
 *
 * Environment variables are parsed once through a zod schema into a typed
 * AppConfig. Services take the fields they need from this structure and
 * never read process.env themselves.
 */

import { z } from 'zod';
import { LogLevel } from './logger';

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true');

/** Comma-separated `name=url` pairs, e.g. `registry=https://registry.example.com/ping`. */
const dependencyList = z
  .string()
  .default('')
  .transform((raw, ctx) => {
    const deps: HttpDependency[] = [];
    for (const part of raw.split(',').map((p) => p.trim()).filter(Boolean)) {
      const eq = part.indexOf('=');
      const name = eq > 0 ? part.slice(0, eq).trim() : '';
      const url = eq > 0 ? part.slice(eq + 1).trim() : '';
      if (!name || !z.string().url().safeParse(url).success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid dependency entry: ${part}` });
        return z.NEVER;
      }
      deps.push({ name, url });
    }
    return deps;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.Info),

  SESSION_SECRET: z.string().min(16).optional(),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 12),
  PASSWORD_HASH_ITERATIONS: z.coerce.number().int().min(1000).default(100_000),
  AUTH_MIN_DURATION_MS: z.coerce.number().int().min(0).default(250),
  LOGIN_RATE_LIMIT: z.coerce.number().int().positive().default(10),
  LOGIN_RATE_WINDOW_MS: z.coerce.number().int().positive().default(60_000),

  INVITATION_TTL_DAYS: z.coerce.number().positive().default(30),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:5000'),

  HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  HEALTH_DEPENDENCIES: dependencyList,

  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_SECURE: booleanFlag.default('false'),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  MAIL_FROM: z.string().default('DevTrack <noreply@devtrack.local>'),
});

export interface HttpDependency {
  name: string;
  url: string;
}

export interface MailConfig {
  host?: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: LogLevel;
  session: {
    secret: string;
    ttlSeconds: number;
  };
  auth: {
    passwordHashIterations: number;
    minDurationMs: number;
    loginRateLimit: number;
    loginRateWindowMs: number;
  };
  collaboration: {
    invitationTtlDays: number;
    publicBaseUrl: string;
  };
  health: {
    timeoutMs: number;
    dependencies: HttpDependency[];
  };
  mail: MailConfig;
}

/** Secret used outside production when SESSION_SECRET is unset. */
const DEVELOPMENT_SESSION_SECRET = 'devtrack-development-secret';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[]>,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Parse and validate configuration from an environment map. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [key, messages] of Object.entries(result.error.flatten().fieldErrors)) {
      if (messages) fieldErrors[key] = messages;
    }
    throw new ConfigError(`Invalid configuration: ${Object.keys(fieldErrors).join(', ')}`, fieldErrors);
  }

  const e = result.data;
  if (!e.SESSION_SECRET && e.NODE_ENV === 'production') {
    throw new ConfigError('Invalid configuration: SESSION_SECRET', {
      SESSION_SECRET: ['Required in production'],
    });
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    session: {
      secret: e.SESSION_SECRET ?? DEVELOPMENT_SESSION_SECRET,
      ttlSeconds: e.SESSION_TTL_SECONDS,
    },
    auth: {
      passwordHashIterations: e.PASSWORD_HASH_ITERATIONS,
      minDurationMs: e.AUTH_MIN_DURATION_MS,
      loginRateLimit: e.LOGIN_RATE_LIMIT,
      loginRateWindowMs: e.LOGIN_RATE_WINDOW_MS,
    },
    collaboration: {
      invitationTtlDays: e.INVITATION_TTL_DAYS,
      publicBaseUrl: e.PUBLIC_BASE_URL,
    },
    health: {
      timeoutMs: e.HEALTH_TIMEOUT_MS,
      dependencies: e.HEALTH_DEPENDENCIES,
    },
    mail: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      secure: e.SMTP_SECURE,
      user: e.SMTP_USER,
      pass: e.SMTP_PASS,
      from: e.MAIL_FROM,
    },
  };
}
