import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { CredentialError } from '../../core/errors.js';
import { redactText, registeredSecretCount } from '../../security/redaction.js';
import { pathExists } from '../../utils/fs.js';
import {
  StaticKeyTransport,
  TEST_ENDPOINT,
  TEST_HOST,
  TEST_KEY_TEXT,
  TEST_TOKEN,
  makeTempDir,
  removeDir,
} from '../../test/fixtures.js';
import {
  CONNECTION_CONFIG_FILE,
  CredentialProvisioner,
  FileKeyStore,
  HttpKeyTransport,
  renderHostStanza,
  upsertHostStanza,
  type KeyStore,
} from '../credential_provisioner.js';

const TARGET = { hostPattern: TEST_HOST, user: 'git' };

describe('upsertHostStanza', () => {
  it('appends a stanza to an empty config', () => {
    expect(upsertHostStanza('', TARGET, '/keys/id_git')).toBe([
      '# BEGIN pkgstage git.example.test',
      'Host git.example.test',
      '    IdentityFile "/keys/id_git"',
      '    IdentitiesOnly yes',
      '    User git',
      '# END pkgstage git.example.test',
      '',
    ].join('\n'));
  });

  it('replaces the stanza for the same host and keeps other hosts', () => {
    const other = { hostPattern: 'mirror.example.test', user: 'deploy' };
    let config = upsertHostStanza('', other, '/keys/id_mirror');
    config = upsertHostStanza(config, TARGET, '/keys/old');
    config = upsertHostStanza(config, TARGET, '/keys/new');

    expect(config).toBe([
      ...renderHostStanza(other, '/keys/id_mirror'),
      '',
      ...renderHostStanza(TARGET, '/keys/new'),
      '',
    ].join('\n'));
  });
});

describe('HttpKeyTransport', () => {
  it('sends the token as a query parameter on a GET', async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => new Response('key-bytes'));
    const transport = new HttpKeyTransport({ tokenParam: 'access_token', fetchImpl });

    const body = await transport.fetchKey(`${TEST_ENDPOINT}?arch=x86_64`, TEST_TOKEN);

    expect(new TextDecoder().decode(body)).toBe('key-bytes');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [input, init] = fetchImpl.mock.calls[0];
    expect(String(input)).toBe('https://keys.example.test/deploy-key?arch=x86_64&access_token=test-secret');
    expect(init?.method).toBe('GET');
  });

  it('reports HTTP failures with the status and without the token', async () => {
    const transport = new HttpKeyTransport({ fetchImpl: async () => new Response('denied', { status: 403 }) });

    const error = await transport.fetchKey(TEST_ENDPOINT, TEST_TOKEN).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CredentialError);
    expect(error).toMatchObject({
      reason: 'http_status',
      status: 403,
      message: 'Key endpoint https://keys.example.test/deploy-key answered HTTP 403',
    });
  });

  it('releases the response body on HTTP failures', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });
    const transport = new HttpKeyTransport({ fetchImpl: async () => new Response(body, { status: 503 }) });

    await expect(transport.fetchKey(TEST_ENDPOINT, TEST_TOKEN)).rejects.toMatchObject({ reason: 'http_status', status: 503 });
    expect(cancelled).toBe(true);
  });

  it('wraps network failures', async () => {
    const transport = new HttpKeyTransport({
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await expect(transport.fetchKey(TEST_ENDPOINT, TEST_TOKEN)).rejects.toMatchObject({ reason: 'network' });
  });

  it('rejects an endpoint that is not a URL', async () => {
    const transport = new HttpKeyTransport({ fetchImpl: vi.fn() });

    await expect(transport.fetchKey('keys', TEST_TOKEN)).rejects.toMatchObject({ reason: 'invalid_endpoint' });
  });
});

describe('FileKeyStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('pkgstage-keys');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes the key and config with owner-only permissions', async () => {
    const store = new FileKeyStore(join(dir, 'credentials'));

    const bundle = await store.store(new TextEncoder().encode(TEST_KEY_TEXT), TARGET);

    expect(bundle).toEqual({
      keyPath: join(dir, 'credentials', 'id_git.example.test'),
      configPath: join(dir, 'credentials', CONNECTION_CONFIG_FILE),
      hostPattern: TEST_HOST,
      user: 'git',
      agentRegistration: 'unregistered',
    });
    expect(await readFile(bundle.keyPath, 'utf8')).toBe(TEST_KEY_TEXT);
    expect((await stat(bundle.keyPath)).mode & 0o777).toBe(0o600);
    expect((await stat(bundle.configPath)).mode & 0o777).toBe(0o600);
    expect((await stat(join(dir, 'credentials'))).mode & 0o777).toBe(0o700);
  });

  it('quotes a key path containing spaces', async () => {
    const store = new FileKeyStore(join(dir, 'My Projects', 'credentials'));

    const bundle = await store.store(new TextEncoder().encode(TEST_KEY_TEXT), TARGET);

    const config = await readFile(bundle.configPath, 'utf8');
    expect(config.split('\n')[2]).toBe(`    IdentityFile "${join(dir, 'My Projects', 'credentials', 'id_git.example.test')}"`);
  });

  it('refuses a key path containing a double quote before writing anything', async () => {
    const store = new FileKeyStore(join(dir, 'say "hi"', 'credentials'));

    await expect(store.store(new TextEncoder().encode(TEST_KEY_TEXT), TARGET)).rejects.toMatchObject({
      reason: 'storage',
      message: 'Key store path cannot contain a double quote',
    });
    expect(await pathExists(join(dir, 'say "hi"'))).toBe(false);
  });

  it('keeps exactly one stanza per host across repeated stores', async () => {
    const store = new FileKeyStore(join(dir, 'credentials'));
    const key = new TextEncoder().encode(TEST_KEY_TEXT);

    await store.store(key, TARGET);
    await store.store(key, TARGET);
    const bundle = await store.store(key, TARGET);

    const config = await readFile(bundle.configPath, 'utf8');
    expect(config.match(/^Host /gm)).toHaveLength(1);
    expect(config).toBe(upsertHostStanza('', TARGET, bundle.keyPath));
  });

  it('removes everything on discard', async () => {
    const store = new FileKeyStore(join(dir, 'credentials'));
    await store.store(new TextEncoder().encode(TEST_KEY_TEXT), TARGET);

    await store.discard();

    expect(await pathExists(join(dir, 'credentials'))).toBe(false);
  });
});

describe('CredentialProvisioner', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('pkgstage-provision');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  function provisioner(transport: StaticKeyTransport, store: KeyStore = new FileKeyStore(join(dir, 'credentials'))) {
    return new CredentialProvisioner({ transport, store, target: TARGET });
  }

  it('fetches the key with the token and installs it', async () => {
    const transport = new StaticKeyTransport();

    const bundle = await provisioner(transport).provision(TEST_ENDPOINT, TEST_TOKEN);

    expect(transport.requests).toEqual([{ endpoint: TEST_ENDPOINT, token: TEST_TOKEN }]);
    expect(await readFile(bundle.keyPath, 'utf8')).toBe(TEST_KEY_TEXT);
  });

  it('registers the token and key text for redaction', async () => {
    await provisioner(new StaticKeyTransport()).provision(TEST_ENDPOINT, TEST_TOKEN);

    expect(registeredSecretCount()).toBe(2);
    expect(redactText(`token ${TEST_TOKEN}`).text).toBe('token [REDACTED:secret]');
    expect(redactText(TEST_KEY_TEXT.trim()).text).toBe('[REDACTED:private_key]');
  });

  it('is idempotent on the connection config', async () => {
    const p = provisioner(new StaticKeyTransport());

    await p.provision(TEST_ENDPOINT, TEST_TOKEN);
    await p.provision(TEST_ENDPOINT, TEST_TOKEN);
    const bundle = await p.provision(TEST_ENDPOINT, TEST_TOKEN);

    const config = await readFile(bundle.configPath, 'utf8');
    expect(config.match(/# BEGIN pkgstage git\.example\.test/g)).toHaveLength(1);
  });

  it('refuses an empty token without contacting the endpoint', async () => {
    const transport = new StaticKeyTransport();

    await expect(provisioner(transport).provision(TEST_ENDPOINT, '  ')).rejects.toMatchObject({
      reason: 'missing_token',
      exitCode: 11,
    });
    expect(transport.requests).toHaveLength(0);
  });

  it('fails on an empty key body and stores nothing', async () => {
    const credentialsDir = join(dir, 'credentials');
    const transport = new StaticKeyTransport(new Uint8Array(0));

    const error = await provisioner(transport).provision(TEST_ENDPOINT, TEST_TOKEN).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CredentialError);
    expect(error).toMatchObject({
      reason: 'empty_body',
      message: 'Key endpoint https://keys.example.test/deploy-key returned an empty body',
      exitCode: 11,
    });
    expect(await pathExists(credentialsDir)).toBe(false);
  });

  it('wraps unexpected transport failures as network errors', async () => {
    const transport = new StaticKeyTransport(new Error('socket hang up'));

    await expect(provisioner(transport).provision(TEST_ENDPOINT, TEST_TOKEN)).rejects.toMatchObject({
      reason: 'network',
      message: 'Key request to https://keys.example.test/deploy-key failed',
    });
  });

  it('reports storage failures without the key material', async () => {
    const store: KeyStore = {
      store: async () => {
        throw new Error('EACCES');
      },
      discard: async () => {},
    };

    await expect(provisioner(new StaticKeyTransport(), store).provision(TEST_ENDPOINT, TEST_TOKEN)).rejects.toMatchObject({
      reason: 'storage',
      message: 'Key material could not be stored',
    });
  });
});
