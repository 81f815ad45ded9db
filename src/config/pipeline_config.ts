/**
 * @fileoverview Pipeline configuration file
 *
 * `pkgstage.yaml` names the source, the credential endpoint, the build
 * options, the verification policy and the install metadata. Relative
 * patch paths resolve against the config file's directory; the license path
 * resolves against the working tree root.
 *
 * @example
 * ```yaml
 * package:
 *   name: tunebox
 * source:
 *   repository: https://git.example.org/tunebox.git
 *   revision: v0.9.1
 *   patch: fix-build.patch
 * credentials:
 *   endpoint: https://keys.example.org/deploy-key
 *   host: git.example.org
 * build:
 *   buildType: release
 *   offline: false
 * verification:
 *   mode: non-fatal
 *   timeout: unbounded
 * ```
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { InvalidConfigError } from '../core/errors.js';
import type { TimeoutPolicy, VerificationMode } from '../core/types.js';
import { BuildOptionsShape, formatIssues, resolveBuildOptions, type BuildOptions } from './build_options.js';

export const DEFAULT_CONFIG_FILE = 'pkgstage.yaml';
export const DEFAULT_TOKEN_ENV = 'PKGSTAGE_AUTH_TOKEN';

const PipelineConfigSchema = z.object({
  package: z.object({
    name: z.string().regex(/^[a-z0-9][a-z0-9._+-]*$/, 'package names are lowercase alphanumerics and ._+-'),
  }).strict(),
  source: z.object({
    repository: z.string().min(1),
    revision: z.string().min(1),
    patch: z.string().min(1).optional(),
  }).strict(),
  credentials: z.object({
    endpoint: z.string().url(),
    tokenParam: z.string().min(1).default('token'),
    host: z.string().min(1),
    user: z.string().min(1).default('git'),
    tokenEnv: z.string().min(1).default(DEFAULT_TOKEN_ENV),
  }).strict(),
  build: BuildOptionsShape.partial().default({}),
  verification: z.object({
    mode: z.enum(['required', 'non-fatal', 'skip']).default('required'),
    timeout: z.union([z.literal('unbounded'), z.number().positive()]).default('unbounded'),
  }).strict().default({}),
  install: z.object({
    license: z.string().min(1).default('LICENSE'),
  }).strict().default({}),
  pipeline: z.object({
    timeoutMs: z.number().int().positive().optional(),
  }).strict().default({}),
}).strict();

export type RawPipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface CredentialSettings {
  endpoint: string;
  tokenParam: string;
  host: string;
  user: string;
  tokenEnv: string;
}

export interface ResolvedPipelineConfig {
  packageName: string;
  source: {
    repository: string;
    revision: string;
    /** Absolute path */
    patchFile?: string;
  };
  credentials: CredentialSettings;
  buildOptions: BuildOptions;
  verification: {
    mode: VerificationMode;
    timeout: TimeoutPolicy;
  };
  /** Relative to the working tree root unless absolute */
  licensePath: string;
  timeoutMs?: number;
}

/**
 * Validate an already-parsed config document and apply environment overrides.
 *
 * @param baseDir - directory relative patch paths resolve against
 */
export function resolvePipelineConfig(
  document: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env,
  sourceName = DEFAULT_CONFIG_FILE,
): ResolvedPipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new InvalidConfigError(sourceName, formatIssues(parsed.error));
  }
  const raw = parsed.data;

  return {
    packageName: raw.package.name,
    source: {
      repository: raw.source.repository,
      revision: raw.source.revision,
      patchFile: raw.source.patch ? path.resolve(baseDir, raw.source.patch) : undefined,
    },
    credentials: { ...raw.credentials },
    buildOptions: resolveBuildOptions(raw.build, env),
    verification: {
      mode: raw.verification.mode,
      timeout: raw.verification.timeout === 'unbounded'
        ? { kind: 'unbounded' }
        : { kind: 'multiplier', factor: raw.verification.timeout },
    },
    licensePath: raw.install.license,
    timeoutMs: raw.pipeline.timeoutMs,
  };
}

export async function loadPipelineConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedPipelineConfig> {
  const absolute = path.resolve(configPath);
  let text: string;
  try {
    text = await fs.readFile(absolute, 'utf8');
  } catch (error) {
    throw new InvalidConfigError(configPath, 'file could not be read', { cause: error });
  }

  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InvalidConfigError(configPath, `not valid YAML (${detail})`, { cause: error });
  }

  return resolvePipelineConfig(document, path.dirname(absolute), env, configPath);
}
