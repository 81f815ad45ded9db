import { describe, it, expect, beforeEach, vi } from 'vitest';
import { execa } from 'execa';
import { SPAWN_FAILURE_EXIT_CODE, createExecaRunner, diagnosticsOf, formatCommand } from '../tool_runner.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

function buildExecaResult(options: { exitCode?: number; stdout?: string; stderr?: string; isCanceled?: boolean }) {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    isCanceled: options.isCanceled ?? false,
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

describe('formatCommand', () => {
  it('quotes arguments containing whitespace or quotes', () => {
    expect(formatCommand('ssh', ['-F', '/tmp/my keys/config', "it's"])).toBe('ssh -F "/tmp/my keys/config" "it\'s"');
  });
});

describe('diagnosticsOf', () => {
  it('puts stderr before stdout and keeps the tail', () => {
    const stdout = Array.from({ length: 5 }, (_, i) => `out ${i}`).join('\n');

    expect(diagnosticsOf({ stdout, stderr: 'err' }, 3)).toBe('out 2\nout 3\nout 4');
    expect(diagnosticsOf({ stdout: 'out', stderr: 'err\n' })).toBe('err\n\nout');
  });

  it('ignores blank streams', () => {
    expect(diagnosticsOf({ stdout: '  \n', stderr: 'fatal: bad revision' })).toBe('fatal: bad revision');
  });
});

describe('createExecaRunner', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('passes cwd, env and signal through and never rejects on exit status', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 0, stdout: 'Ok: 3' }));
    const controller = new AbortController();

    const result = await createExecaRunner().run({
      command: 'meson',
      args: ['test', '-C', '/w/build'],
      cwd: '/w/build',
      env: { SSH_AUTH_SOCK: '/tmp/agent.1' },
      signal: controller.signal,
    });

    expect(execaMock).toHaveBeenCalledWith('meson', ['test', '-C', '/w/build'], {
      cwd: '/w/build',
      env: { SSH_AUTH_SOCK: '/tmp/agent.1' },
      signal: controller.signal,
      reject: false,
    });
    expect(result).toMatchObject({
      command: 'meson test -C /w/build',
      exitCode: 0,
      stdout: 'Ok: 3',
      stderr: '',
      aborted: false,
    });
  });

  it('reports the tool exit status verbatim', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 128, stderr: 'fatal: repository not found' }));

    const result = await createExecaRunner().run({ command: 'git', args: ['clone'] });

    expect(result.exitCode).toBe(128);
    expect(result.stderr).toBe('fatal: repository not found');
  });

  it('maps a missing exit status to the spawn failure code', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ stderr: 'spawn meson ENOENT' }));

    const result = await createExecaRunner().run({ command: 'meson', args: ['setup'] });

    expect(result.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
  });

  it('flags cancelled invocations', async () => {
    execaMock.mockResolvedValueOnce(buildExecaResult({ exitCode: 143, isCanceled: true }));

    const result = await createExecaRunner().run({ command: 'meson', args: ['compile'] });

    expect(result.aborted).toBe(true);
  });
});
