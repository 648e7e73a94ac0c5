import JSON5 from "json5";
import { randomInt } from "node:crypto";
import { readFileSync } from "node:fs";
import path from "node:path";
import { resolveCredentialsDir } from "../config/paths.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { Department } from "../workforce/activity-rates.js";
import { ConfigurationError, ProvisioningError } from "../workforce/errors.js";
import { deriveDisplayName, deriveWorkerId } from "../workforce/timeline.js";
import type { WorkerIdentity } from "../workforce/types.js";

const log = createSubsystemLogger("infra/directory");

export const DEFAULT_DIRECTORY_DOMAIN = "contoso.onmicrosoft.com";
export const DIRECTORY_CREDENTIAL_KEYS = ["KW_TENANT_ID", "KW_APP_ID", "KW_CLIENT_SECRET"] as const;

const PASSWORD_LENGTH = 16;
const PASSWORD_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*";

export type DirectoryCredentials = {
  tenantId: string;
  appId: string;
  clientSecret: string;
};

type DirectoryCredentialsFile = {
  tenantId?: unknown;
  appId?: unknown;
  clientSecret?: unknown;
  domain?: unknown;
};

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function readDirectoryCredentialsFile(env: NodeJS.ProcessEnv): DirectoryCredentialsFile | null {
  const override = normalizeString(env.KWSIM_DIRECTORY_CREDENTIALS_PATH);
  const credentialsPath = override
    ? path.resolve(override)
    : path.join(resolveCredentialsDir(env), "directory.json");
  let raw: string;
  try {
    raw = readFileSync(credentialsPath, "utf8");
  } catch (err) {
    if ((err as { code?: unknown })?.code === "ENOENT") {
      return null;
    }
    throw err;
  }
  if (!raw.trim()) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse directory credentials at ${credentialsPath}: ${String(err)}`,
      [],
      { credentialsPath },
    );
  }
  if (!isRecord(parsed)) {
    return null;
  }
  return {
    tenantId: parsed.tenantId,
    appId: parsed.appId,
    clientSecret: parsed.clientSecret,
    domain: parsed.domain,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export type DirectoryEnv = {
  credentials: DirectoryCredentials | null;
  missing: string[];
  domain: string;
};

/** Environment variables win over the credentials file, key by key. */
export function resolveDirectoryEnv(env: NodeJS.ProcessEnv = process.env): DirectoryEnv {
  const file = readDirectoryCredentialsFile(env);
  const tenantId = normalizeString(env.KW_TENANT_ID) ?? normalizeString(file?.tenantId);
  const appId = normalizeString(env.KW_APP_ID) ?? normalizeString(file?.appId);
  const clientSecret =
    normalizeString(env.KW_CLIENT_SECRET) ?? normalizeString(file?.clientSecret);
  const domain =
    normalizeString(env.KW_DIRECTORY_DOMAIN) ??
    normalizeString(file?.domain) ??
    DEFAULT_DIRECTORY_DOMAIN;
  const missing: string[] = [];
  if (!tenantId) {
    missing.push("KW_TENANT_ID");
  }
  if (!appId) {
    missing.push("KW_APP_ID");
  }
  if (!clientSecret) {
    missing.push("KW_CLIENT_SECRET");
  }
  return {
    credentials: tenantId && appId && clientSecret ? { tenantId, appId, clientSecret } : null,
    missing,
    domain,
  };
}

export function generatePassword(length = PASSWORD_LENGTH): string {
  let password = "";
  for (let i = 0; i < length; i += 1) {
    password += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return password;
}

export type WorkerProvisionRequest = {
  deploymentId: string;
  index: number;
  department: Department;
  displayNamePrefix?: string;
};

/**
 * Creates and deletes the directory accounts that simulated workers act as. One
 * provider instance tracks the identities of one deployment.
 */
export interface IdentityProvider {
  /** Throws `ConfigurationError` when credentials are missing. */
  ensureReady(): Promise<void>;
  createWorker(request: WorkerProvisionRequest): Promise<WorkerIdentity>;
  /** Returns false when the worker is not tracked. */
  deleteWorker(workerId: string): Promise<boolean>;
  /** Deletes every tracked worker and returns how many were removed. */
  deleteAll(): Promise<number>;
  listWorkers(): WorkerIdentity[];
  /** Re-tracks identities created by an earlier process. */
  restore(identities: readonly WorkerIdentity[]): void;
}

export type IdentityProviderFactory = (deploymentId: string) => IdentityProvider;

type DirectoryAccount = WorkerIdentity & { password: string };

export type DirectoryIdentityProviderOptions = {
  env?: NodeJS.ProcessEnv;
  domain?: string;
};

export class DirectoryIdentityProvider implements IdentityProvider {
  private readonly env: NodeJS.ProcessEnv;
  private readonly domainOverride: string | null;
  private readonly accounts = new Map<string, DirectoryAccount>();
  private session: { credentials: DirectoryCredentials; domain: string } | null = null;

  constructor(options: DirectoryIdentityProviderOptions = {}) {
    this.env = options.env ?? process.env;
    this.domainOverride = normalizeString(options.domain);
  }

  async ensureReady(): Promise<void> {
    this.connect();
  }

  async createWorker(request: WorkerProvisionRequest): Promise<WorkerIdentity> {
    const { domain } = this.connect();
    const workerId = deriveWorkerId(request.deploymentId, request.index);
    if (this.accounts.has(workerId)) {
      throw new ProvisioningError(`Worker ${workerId} already exists`, { workerId });
    }
    const slug = `kwsim-${request.deploymentId}-${request.index}`;
    const account: DirectoryAccount = {
      workerId,
      displayName: deriveDisplayName(request.index, request.displayNamePrefix),
      principalName: `${slug}@${domain}`,
      objectId: `dir-${slug}`,
      department: request.department,
      index: request.index,
      password: generatePassword(),
    };
    this.accounts.set(workerId, account);
    log.debug({ workerId, principalName: account.principalName }, "Directory account created");
    return toIdentity(account);
  }

  async deleteWorker(workerId: string): Promise<boolean> {
    const account = this.accounts.get(workerId);
    if (!account) {
      return false;
    }
    this.connect();
    this.accounts.delete(workerId);
    log.debug({ workerId, objectId: account.objectId }, "Directory account deleted");
    return true;
  }

  async deleteAll(): Promise<number> {
    let deleted = 0;
    for (const workerId of [...this.accounts.keys()]) {
      if (await this.deleteWorker(workerId)) {
        deleted += 1;
      }
    }
    return deleted;
  }

  listWorkers(): WorkerIdentity[] {
    return [...this.accounts.values()].map(toIdentity);
  }

  restore(identities: readonly WorkerIdentity[]): void {
    for (const identity of identities) {
      if (!this.accounts.has(identity.workerId)) {
        this.accounts.set(identity.workerId, { ...identity, password: "" });
      }
    }
  }

  private connect(): { credentials: DirectoryCredentials; domain: string } {
    if (this.session) {
      return this.session;
    }
    const resolved = resolveDirectoryEnv(this.env);
    if (!resolved.credentials) {
      throw new ConfigurationError(
        `Missing directory credentials. Required: ${DIRECTORY_CREDENTIAL_KEYS.join(", ")}`,
        resolved.missing.map((key) => `'${key}' is not set`),
      );
    }
    this.session = {
      credentials: resolved.credentials,
      domain: this.domainOverride ?? resolved.domain,
    };
    log.info({ tenantId: resolved.credentials.tenantId }, "Directory session established");
    return this.session;
  }
}

function toIdentity(account: DirectoryAccount): WorkerIdentity {
  return {
    workerId: account.workerId,
    displayName: account.displayName,
    principalName: account.principalName,
    objectId: account.objectId,
    department: account.department,
    index: account.index,
  };
}

export function createDirectoryIdentityProviderFactory(
  options: DirectoryIdentityProviderOptions = {},
): IdentityProviderFactory {
  return () => new DirectoryIdentityProvider(options);
}
