import { v4 as uuidv4 } from 'uuid';
import { MemoryLogger } from '../logging/logger';
import type { Logger } from '../logging/logger';
import type { TemporaryCredentials } from '../types';
import { ApplyError } from './errors';

/**
 * Everything a stage may read about the current run. Replaces ambient
 * working directory and environment state: stages receive it explicitly.
 */
export interface OrchestrationContext {
  readonly runId: string;
  readonly region: string;
  readonly clusterName: string;
  readonly profile?: string;
  credentials?: TemporaryCredentials;
  /** Values published by earlier stages (terraform outputs, hostnames, ARNs). */
  readonly outputs: Map<string, string>;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
  readonly now: () => Date;
}

export interface ContextOptions {
  region: string;
  clusterName: string;
  profile?: string;
  logger?: Logger;
  signal?: AbortSignal;
  runId?: string;
  credentials?: TemporaryCredentials;
  outputs?: Record<string, string>;
  now?: () => Date;
}

export function createContext(options: ContextOptions): OrchestrationContext {
  return {
    runId: options.runId ?? uuidv4(),
    region: options.region,
    clusterName: options.clusterName,
    profile: options.profile,
    credentials: options.credentials,
    outputs: new Map(Object.entries(options.outputs ?? {})),
    logger: options.logger ?? new MemoryLogger(),
    signal: options.signal,
    now: options.now ?? (() => new Date())
  };
}

/** True when the credentials expire within `marginMs` of `now`. */
export function credentialsExpired(credentials: TemporaryCredentials, now: Date, marginMs = 0): boolean {
  return credentials.expiresAt.getTime() <= now.getTime() + marginMs;
}

/**
 * Credentials usable right now, or undefined once they have expired.
 */
export function activeCredentials(ctx: OrchestrationContext): TemporaryCredentials | undefined {
  const { credentials } = ctx;
  if (!credentials || credentialsExpired(credentials, ctx.now())) {
    return undefined;
  }
  return credentials;
}

export function credentialsToEnv(credentials: TemporaryCredentials): Record<string, string> {
  return {
    AWS_ACCESS_KEY_ID: credentials.accessKeyId,
    AWS_SECRET_ACCESS_KEY: credentials.secretAccessKey,
    AWS_SESSION_TOKEN: credentials.sessionToken
  };
}

/** `export KEY=value` lines, ready for eval. */
export function credentialsToExports(credentials: TemporaryCredentials): string[] {
  return Object.entries(credentialsToEnv(credentials)).map(([key, value]) => `export ${key}=${value}`);
}

/**
 * Environment handed to subprocesses (terraform, kubectl, helm, eksctl, aws).
 */
export function contextEnv(ctx: OrchestrationContext): Record<string, string> {
  const env: Record<string, string> = {
    AWS_REGION: ctx.region,
    AWS_DEFAULT_REGION: ctx.region
  };

  const credentials = activeCredentials(ctx);
  if (credentials) {
    return { ...env, ...credentialsToEnv(credentials) };
  }
  if (ctx.profile) {
    env.AWS_PROFILE = ctx.profile;
  }
  return env;
}

export function requireOutput(ctx: OrchestrationContext, key: string): string {
  const value = ctx.outputs.get(key);
  if (value === undefined || value === '') {
    throw new ApplyError(`Required value "${key}" was not produced by an earlier stage`, {
      remediation: `Run the stage that publishes "${key}" first`
    });
  }
  return value;
}
