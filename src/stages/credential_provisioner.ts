/**
 * @fileoverview CredentialProvisioner
 *
 * Fetches ephemeral private-key material and installs it into an isolated key
 * store plus a connection config with one host-routing stanza per host.
 *
 * The default transport sends the auth token as a query parameter of a plain
 * GET and the default store writes the key unencrypted. Replace either through
 * `KeyTransport` or `KeyStore`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CredentialError } from '../core/errors.js';
import type { CredentialBundle } from '../core/types.js';
import { endpointLabel, registerSecret } from '../security/redaction.js';
import { logInfo } from '../telemetry/logger.js';
import { readFileIfExists } from '../utils/fs.js';

// ============================================================================
// INTERFACES
// ============================================================================

export interface KeyTransport {
  fetchKey(endpoint: string, token: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface KeyTarget {
  hostPattern: string;
  user: string;
}

export interface KeyStore {
  store(key: Uint8Array, target: KeyTarget): Promise<CredentialBundle>;
  /** Remove every key and config entry this store has written. */
  discard(): Promise<void>;
}

// ============================================================================
// HTTP TRANSPORT
// ============================================================================

export interface HttpKeyTransportOptions {
  /** Query parameter carrying the token (default: `token`) */
  tokenParam?: string;
  fetchImpl?: typeof fetch;
}

export class HttpKeyTransport implements KeyTransport {
  private readonly tokenParam: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpKeyTransportOptions = {}) {
    this.tokenParam = options.tokenParam ?? 'token';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchKey(endpoint: string, token: string, signal?: AbortSignal): Promise<Uint8Array> {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch (error) {
      throw new CredentialError('invalid_endpoint', 'Key endpoint is not a valid URL', { cause: error });
    }
    url.searchParams.set(this.tokenParam, token);
    const label = endpointLabel(endpoint);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', signal });
    } catch (error) {
      throw new CredentialError('network', `Key request to ${label} failed`, { cause: error });
    }
    if (!response.ok) {
      await response.body?.cancel();
      throw new CredentialError('http_status', `Key endpoint ${label} answered HTTP ${response.status}`, {
        status: response.status,
      });
    }
    return new Uint8Array(await response.arrayBuffer());
  }
}

// ============================================================================
// FILE KEY STORE
// ============================================================================

const STANZA_MARKER = 'pkgstage';
export const CONNECTION_CONFIG_FILE = 'ssh_config';

export function renderHostStanza(target: KeyTarget, keyPath: string): string[] {
  return [
    `# BEGIN ${STANZA_MARKER} ${target.hostPattern}`,
    `Host ${target.hostPattern}`,
    `    IdentityFile "${keyPath}"`,
    '    IdentitiesOnly yes',
    `    User ${target.user}`,
    `# END ${STANZA_MARKER} ${target.hostPattern}`,
  ];
}

/**
 * Replace the stanza for `target.hostPattern` (or append it), leaving other
 * hosts' entries untouched.
 */
export function upsertHostStanza(config: string, target: KeyTarget, keyPath: string): string {
  const begin = `# BEGIN ${STANZA_MARKER} ${target.hostPattern}`;
  const end = `# END ${STANZA_MARKER} ${target.hostPattern}`;
  const kept: string[] = [];
  let inside = false;
  for (const line of config.split('\n')) {
    if (line === begin) {
      inside = true;
      continue;
    }
    if (inside) {
      if (line === end) inside = false;
      continue;
    }
    kept.push(line);
  }
  while (kept.length > 0 && kept[kept.length - 1].trim() === '') kept.pop();
  if (kept.length > 0) kept.push('');
  return [...kept, ...renderHostStanza(target, keyPath), ''].join('\n');
}

function hostSlug(hostPattern: string): string {
  return hostPattern.replace(/[^A-Za-z0-9.-]+/g, '_');
}

export class FileKeyStore implements KeyStore {
  constructor(private readonly directory: string) {}

  get configPath(): string {
    return path.join(this.directory, CONNECTION_CONFIG_FILE);
  }

  async store(key: Uint8Array, target: KeyTarget): Promise<CredentialBundle> {
    const keyPath = path.join(this.directory, `id_${hostSlug(target.hostPattern)}`);
    // ssh_config has no escape for a quote inside a quoted argument
    if (keyPath.includes('"')) {
      throw new CredentialError('storage', 'Key store path cannot contain a double quote');
    }
    await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
    await fs.chmod(this.directory, 0o700);

    await fs.writeFile(keyPath, key, { mode: 0o600 });
    await fs.chmod(keyPath, 0o600);

    const existing = (await readFileIfExists(this.configPath)) ?? '';
    await fs.writeFile(this.configPath, upsertHostStanza(existing, target, keyPath), { mode: 0o600 });
    await fs.chmod(this.configPath, 0o600);

    return {
      keyPath,
      configPath: this.configPath,
      hostPattern: target.hostPattern,
      user: target.user,
      agentRegistration: 'unregistered',
    };
  }

  async discard(): Promise<void> {
    await fs.rm(this.directory, { recursive: true, force: true });
  }
}

// ============================================================================
// PROVISIONER
// ============================================================================

export interface CredentialProvisionerOptions {
  transport: KeyTransport;
  store: KeyStore;
  target: KeyTarget;
}

export class CredentialProvisioner {
  constructor(private readonly options: CredentialProvisionerOptions) {}

  async provision(tokenEndpoint: string, authToken: string, signal?: AbortSignal): Promise<CredentialBundle> {
    if (authToken.trim() === '') {
      throw new CredentialError('missing_token', 'No auth token supplied for the key endpoint');
    }
    registerSecret(authToken);
    const label = endpointLabel(tokenEndpoint);
    const { hostPattern } = this.options.target;

    logInfo('[provision] Requesting key material', { endpoint: label, host: hostPattern });
    let key: Uint8Array;
    try {
      key = await this.options.transport.fetchKey(tokenEndpoint, authToken, signal);
    } catch (error) {
      if (error instanceof CredentialError) throw error;
      throw new CredentialError('network', `Key request to ${label} failed`, { cause: error });
    }
    if (key.byteLength === 0) {
      throw new CredentialError('empty_body', `Key endpoint ${label} returned an empty body`);
    }
    registerSecret(Buffer.from(key).toString('utf8'));

    let bundle: CredentialBundle;
    try {
      bundle = await this.options.store.store(key, this.options.target);
    } catch (error) {
      throw new CredentialError('storage', 'Key material could not be stored', { cause: error });
    }
    logInfo('[provision] Key installed', { host: hostPattern, config: bundle.configPath });
    return bundle;
  }
}
