/**
 * @fileoverview pkgstage CLI dispatcher
 *
 * Commands:
 *   pkgstage prepare   - Acquire the source and provision the build credential
 *   pkgstage build     - Configure and compile
 *   pkgstage check     - Run the test suite
 *   pkgstage package   - Stage outputs and license under the staging root
 *   pkgstage run       - Every stage in one process
 *   pkgstage status    - Show pipeline state and outcomes
 *   pkgstage help      - Show usage
 *
 * `runCli` resolves to the process exit code instead of exiting, so the whole
 * dispatcher can be driven from tests.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { DEFAULT_CONFIG_FILE, loadPipelineConfig, type ResolvedPipelineConfig } from '../config/pipeline_config.js';
import { createDefaultDependencies, type DependencyLocations } from '../pipeline/dependencies.js';
import { BuildPipeline, type PipelineDependencies } from '../pipeline/pipeline.js';
import { clearRegisteredSecrets } from '../security/redaction.js';
import { getErrorMessage } from '../utils/errors.js';
import { buildCommand } from './commands/build.js';
import { checkCommand } from './commands/check.js';
import type { CliOptions, CommandContext } from './commands/context.js';
import { packageCommand } from './commands/package.js';
import { prepareCommand } from './commands/prepare.js';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import {
  CliError,
  classifyError,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';

const COMMANDS = ['prepare', 'build', 'check', 'package', 'run', 'status', 'help'] as const;

type Command = (typeof COMMANDS)[number];
type PipelineCommand = Exclude<Command, 'status' | 'help'>;

const PIPELINE_COMMANDS: Record<PipelineCommand, (context: CommandContext) => Promise<void>> = {
  prepare: prepareCommand,
  build: buildCommand,
  check: checkCommand,
  package: packageCommand,
  run: runCommand,
};

const OPTIONS = {
  config: { type: 'string', short: 'c' },
  source: { type: 'string' },
  build: { type: 'string' },
  stage: { type: 'string' },
  state: { type: 'string' },
  credentials: { type: 'string' },
  json: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

const WORK_DIR = '.pkgstage';

export interface CliEnvironment {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Builds the pipeline's collaborators; defaults to execa, fetch and the filesystem */
  createDependencies?: (config: ResolvedPipelineConfig, locations: DependencyLocations) => PipelineDependencies;
}

interface ParsedCommandLine {
  command: string | undefined;
  commandArgs: string[];
  help: boolean;
  version: boolean;
  options: CliOptions;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isPipelineCommand(value: Command): value is PipelineCommand {
  return Object.prototype.hasOwnProperty.call(PIPELINE_COMMANDS, value);
}

function parseCommandLine(argv: string[], cwd: string): ParsedCommandLine {
  try {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
    const resolve = (value: string | undefined, fallback: string): string => path.resolve(cwd, value ?? fallback);
    return {
      command: positionals[0],
      commandArgs: positionals.slice(1),
      help: values.help ?? false,
      version: values.version ?? false,
      options: {
        config: resolve(values.config, DEFAULT_CONFIG_FILE),
        source: resolve(values.source, path.join(WORK_DIR, 'source')),
        build: resolve(values.build, path.join(WORK_DIR, 'build')),
        stage: resolve(values.stage, path.join(WORK_DIR, 'stage')),
        state: resolve(values.state, path.join(WORK_DIR, 'state.json')),
        credentials: resolve(values.credentials, path.join(WORK_DIR, 'credentials')),
        json: values.json ?? false,
      },
    };
  } catch (error) {
    throw new CliError(getErrorMessage(error));
  }
}

/**
 * Output a structured error for script consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

async function dispatch(argv: string[], environment: CliEnvironment): Promise<void> {
  const cwd = environment.cwd ?? process.cwd();
  const env = environment.env ?? process.env;
  const { command, commandArgs, help, version, options } = parseCommandLine(argv, cwd);

  if (version) {
    const { PKGSTAGE_VERSION } = await import('../index.js');
    console.log(`pkgstage ${PKGSTAGE_VERSION.string}`);
    return;
  }

  if (help || !command || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return;
  }

  if (!isCommand(command)) {
    throw new CliError(`Unknown command: ${command}`, 'EINVALID_ARGUMENT', {
      command,
      available: COMMANDS.join(', '),
    });
  }

  if (command === 'status') {
    await statusCommand({ statePath: options.state, json: options.json });
    return;
  }
  if (!isPipelineCommand(command)) {
    showHelp();
    return;
  }

  const config = await loadPipelineConfig(options.config, env);
  const createDependencies = environment.createDependencies ?? createDefaultDependencies;
  const deps = createDependencies(config, { credentialsDir: options.credentials, statePath: options.state });
  const pipeline = await BuildPipeline.open(
    config,
    { sourceDir: options.source, buildDir: options.build, stagingDir: options.stage },
    deps,
  );
  await PIPELINE_COMMANDS[command]({ options, config, pipeline, env });
}

/**
 * Run one CLI invocation and resolve to its exit code.
 */
export async function runCli(argv: string[], environment: CliEnvironment = {}): Promise<number> {
  const jsonMode = argv.includes('--json');
  try {
    await dispatch(argv, environment);
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  } finally {
    clearRegisteredSecrets();
  }
}
