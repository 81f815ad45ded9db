/**
 * @fileoverview AuthenticatedCompiler
 *
 * Drives the compile step inside a key-agent session that exists only for the
 * duration of this stage. The session environment and the bundle's
 * connection config are passed to the compile process explicitly; nothing is
 * read from or written to the user's ambient ssh configuration.
 */

import { CompileError, type CompileFailureKind } from '../core/errors.js';
import type { BuildTree, CredentialBundle } from '../core/types.js';
import { diagnosticsOf, type ToolRunner } from '../process/tool_runner.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { pathExists } from '../utils/fs.js';

// ============================================================================
// KEY AGENT
// ============================================================================

export interface AgentSession {
  readonly id: string;
  /** Variables that point a client at this session */
  readonly env: Readonly<Record<string, string>>;
}

export interface KeyAgent {
  start(signal?: AbortSignal): Promise<AgentSession>;
  addKey(session: AgentSession, keyPath: string, signal?: AbortSignal): Promise<void>;
  stop(session: AgentSession): Promise<void>;
  /** Ids of sessions started and not yet stopped */
  activeSessions(): readonly string[];
}

/**
 * Parse the Bourne-shell output of `ssh-agent -s`.
 */
export function parseAgentOutput(output: string): Record<string, string> | null {
  const sock = /SSH_AUTH_SOCK=([^;\s]+)/.exec(output);
  const pid = /SSH_AGENT_PID=(\d+)/.exec(output);
  if (!sock || !pid) return null;
  return { SSH_AUTH_SOCK: sock[1], SSH_AGENT_PID: pid[1] };
}

export class SshKeyAgent implements KeyAgent {
  private readonly active = new Set<string>();

  constructor(
    private readonly runner: ToolRunner,
    private readonly binaries: { agent?: string; add?: string } = {},
  ) {}

  async start(signal?: AbortSignal): Promise<AgentSession> {
    const result = await this.runner.run({ command: this.binaries.agent ?? 'ssh-agent', args: ['-s'], signal });
    if (result.exitCode !== 0) {
      throw new CompileError('authentication', `ssh-agent exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }
    const env = parseAgentOutput(result.stdout);
    if (!env) {
      throw new CompileError('authentication', 'ssh-agent did not report a socket and pid');
    }
    const session: AgentSession = { id: env.SSH_AGENT_PID, env };
    this.active.add(session.id);
    return session;
  }

  async addKey(session: AgentSession, keyPath: string, signal?: AbortSignal): Promise<void> {
    if (!(await pathExists(keyPath))) {
      throw new CompileError('authentication', 'Provisioned key file is missing');
    }
    const result = await this.runner.run({
      command: this.binaries.add ?? 'ssh-add',
      args: ['-q', keyPath],
      env: session.env,
      signal,
    });
    if (result.exitCode !== 0) {
      throw new CompileError('authentication', `ssh-add exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }
  }

  async stop(session: AgentSession): Promise<void> {
    this.active.delete(session.id);
    const result = await this.runner.run({ command: this.binaries.agent ?? 'ssh-agent', args: ['-k'], env: session.env });
    if (result.exitCode !== 0) {
      logWarning('[compile] ssh-agent did not shut down cleanly', {
        pid: session.id,
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }
  }

  activeSessions(): readonly string[] {
    return [...this.active];
  }
}

/**
 * Start a session, register `keyPath`, run `work`, and always stop the session.
 */
export async function withAgentSession<T>(
  agent: KeyAgent,
  keyPath: string,
  work: (session: AgentSession) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  const session = await agent.start(signal);
  try {
    await agent.addKey(session, keyPath, signal);
    return await work(session);
  } finally {
    await agent.stop(session);
  }
}

// ============================================================================
// FAILURE CLASSIFICATION
// ============================================================================

const AUTHENTICATION_PATTERNS = [
  /permission denied \(publickey/i,
  /authentication failed/i,
  /host key verification failed/i,
  /no supported authentication methods/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /temporary failure in name resolution/i,
  /connection (?:timed out|refused|reset)/i,
  /network is unreachable/i,
  /spurious network error/i,
  /failed to (?:download|fetch)/i,
  /operation timed out/i,
];

export function classifyCompileFailure(diagnostics: string): CompileFailureKind {
  if (AUTHENTICATION_PATTERNS.some((pattern) => pattern.test(diagnostics))) return 'authentication';
  if (NETWORK_PATTERNS.some((pattern) => pattern.test(diagnostics))) return 'network';
  return 'source';
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

// ============================================================================
// COMPILER
// ============================================================================

export interface AuthenticatedCompilerOptions {
  runner: ToolRunner;
  agent: KeyAgent;
  meson?: string;
}

export class AuthenticatedCompiler {
  private readonly meson: string;

  constructor(private readonly options: AuthenticatedCompilerOptions) {
    this.meson = options.meson ?? 'meson';
  }

  async compile(buildTree: BuildTree, credential: CredentialBundle, signal?: AbortSignal): Promise<BuildTree> {
    return withAgentSession(this.options.agent, credential.keyPath, async (session) => {
      logInfo('[compile] Key registered with agent session', { session: session.id, host: credential.hostPattern });
      const env: Record<string, string> = {
        ...session.env,
        GIT_SSH_COMMAND: `ssh -F ${shellQuote(credential.configPath)}`,
        CARGO_NET_GIT_FETCH_WITH_CLI: 'true',
      };
      const result = await this.options.runner.run({
        command: this.meson,
        args: ['compile', '-C', buildTree.root],
        cwd: buildTree.root,
        env,
        signal,
      });
      if (result.exitCode !== 0) {
        const diagnostics = diagnosticsOf(result);
        const kind = classifyCompileFailure(diagnostics);
        throw new CompileError(kind, `meson compile exited with status ${result.exitCode} (${kind})`, {
          exitCode: result.exitCode,
          diagnostics,
        });
      }
      logInfo('[compile] Build complete', { buildDir: buildTree.root, durationMs: result.durationMs });
      return { ...buildTree, status: 'compiled' as const };
    }, signal);
  }
}
