/**
 * @fileoverview Pipeline state persistence
 *
 * The CLI sub-commands run as separate processes, so the pipeline state and
 * the stage entities travel between them in a small JSON file. The file holds
 * paths and statuses only: key bytes and tokens are never part of a snapshot.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { BuildOptionsShape, formatIssues } from '../config/build_options.js';
import { InvalidConfigError } from '../core/errors.js';
import type { BuildTree, CredentialBundle, StageOutcome, StagingRoot, WorkingTree } from '../core/types.js';
import { readFileIfExists } from '../utils/fs.js';
import { safeJsonParse } from '../utils/safe_json.js';
import { PIPELINE_STATES, type PipelineState } from './state_machine.js';

export const SNAPSHOT_VERSION = 1;

const StageNameSchema = z.enum(['acquire', 'provision', 'configure', 'compile', 'verify', 'install']);

const PipelineSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  state: z.enum(PIPELINE_STATES),
  workingTree: z.object({
    root: z.string(),
    repositoryUrl: z.string(),
    revision: z.string(),
    patchStatus: z.enum(['applied', 'none']),
  }).optional(),
  credential: z.object({
    keyPath: z.string(),
    configPath: z.string(),
    hostPattern: z.string(),
    user: z.string(),
    agentRegistration: z.enum(['unregistered', 'registered', 'revoked']),
  }).optional(),
  buildTree: z.object({
    root: z.string(),
    sourceRoot: z.string(),
    options: BuildOptionsShape,
    status: z.enum(['unconfigured', 'configured', 'compiled', 'tested']),
  }).optional(),
  stagingRoot: z.object({
    root: z.string(),
    entries: z.array(z.string()),
  }).optional(),
  outcomes: z.array(z.object({
    stage: StageNameSchema,
    status: z.enum(['succeeded', 'failed', 'tolerated', 'skipped']),
    exitCode: z.number().int(),
    durationMs: z.number().nonnegative(),
  })),
});

export interface PipelineSnapshot {
  version: typeof SNAPSHOT_VERSION;
  state: PipelineState;
  workingTree?: WorkingTree;
  credential?: CredentialBundle;
  buildTree?: BuildTree;
  stagingRoot?: StagingRoot;
  outcomes: StageOutcome[];
}

export function emptySnapshot(): PipelineSnapshot {
  return { version: SNAPSHOT_VERSION, state: 'empty', outcomes: [] };
}

export interface StateStore {
  load(): Promise<PipelineSnapshot | null>;
  save(snapshot: PipelineSnapshot): Promise<void>;
}

export class MemoryStateStore implements StateStore {
  private snapshot: PipelineSnapshot | null = null;

  async load(): Promise<PipelineSnapshot | null> {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  async save(snapshot: PipelineSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
  }
}

export class JsonStateStore implements StateStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<PipelineSnapshot | null> {
    const text = await readFileIfExists(this.filePath);
    if (text === null) return null;
    const json = safeJsonParse(text);
    if (!json.ok) {
      throw new InvalidConfigError(this.filePath, `state file is not valid JSON (${json.error.message})`);
    }
    const parsed = PipelineSnapshotSchema.safeParse(json.value);
    if (!parsed.success) {
      throw new InvalidConfigError(this.filePath, `state file is malformed: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  async save(snapshot: PipelineSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2) + '\n', { encoding: 'utf8', mode: 0o600 });
    await fs.rename(tempPath, this.filePath);
  }
}
