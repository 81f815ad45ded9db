/**
 * @fileoverview Meta-build options
 *
 * The options map handed to the configure step, its validation, the
 * environment overrides, and the mapping to `meson setup` arguments.
 */

import { z } from 'zod';
import { InvalidConfigError } from '../core/errors.js';

export const BuildTypeSchema = z.enum(['debug', 'release']);
export const WrapModeSchema = z.enum(['allow-download', 'no-download']);

export const BuildOptionsShape = z.object({
  prefix: z.string().startsWith('/', 'prefix must be an absolute path'),
  libDir: z.string().min(1),
  sbinDir: z.string().min(1),
  buildType: BuildTypeSchema,
  wrapMode: WrapModeSchema,
  lto: z.boolean(),
  pie: z.boolean(),
  offline: z.boolean(),
}).strict();

export const BuildOptionsSchema = BuildOptionsShape.superRefine((options, ctx) => {
  if (options.offline && options.wrapMode === 'allow-download') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['wrapMode'],
      message: 'offline builds cannot allow wrap downloads',
    });
  }
});

export type BuildOptions = z.infer<typeof BuildOptionsShape>;
export type BuildType = z.infer<typeof BuildTypeSchema>;
export type WrapMode = z.infer<typeof WrapModeSchema>;

export const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  prefix: '/usr',
  libDir: 'lib',
  sbinDir: 'bin',
  buildType: 'release',
  wrapMode: 'no-download',
  lto: true,
  pie: true,
  offline: false,
};

/** Environment variables that override individual build options. */
export const BUILD_OPTION_ENV = {
  prefix: 'PKGSTAGE_PREFIX',
  libDir: 'PKGSTAGE_LIBDIR',
  sbinDir: 'PKGSTAGE_SBINDIR',
  buildType: 'PKGSTAGE_BUILDTYPE',
  wrapMode: 'PKGSTAGE_WRAP_MODE',
  lto: 'PKGSTAGE_LTO',
  pie: 'PKGSTAGE_PIE',
  offline: 'PKGSTAGE_OFFLINE',
} as const satisfies Record<keyof BuildOptions, string>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export function parseBooleanFlag(name: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new InvalidConfigError(name, `expected a boolean (1/0, true/false, yes/no, on/off), got '${raw}'`);
}

/**
 * Layer defaults, configured values and environment overrides, then validate.
 */
export function resolveBuildOptions(
  configured: Partial<BuildOptions>,
  env: NodeJS.ProcessEnv = process.env,
): BuildOptions {
  const fromEnv: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(BUILD_OPTION_ENV)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;
    fromEnv[key] = key === 'lto' || key === 'pie' || key === 'offline'
      ? parseBooleanFlag(variable, raw)
      : raw.trim();
  }

  const parsed = BuildOptionsSchema.safeParse({ ...DEFAULT_BUILD_OPTIONS, ...configured, ...fromEnv });
  if (!parsed.success) {
    throw new InvalidConfigError('build options', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * `meson setup` arguments for the options map, after the build and source directories.
 */
export function toMesonArgs(options: BuildOptions): string[] {
  return [
    '--prefix', options.prefix,
    '--libexecdir', options.libDir,
    '--sbindir', options.sbinDir,
    '--buildtype', options.buildType,
    '--wrap-mode', options.wrapMode === 'allow-download' ? 'default' : 'nodownload',
    `-Db_lto=${options.lto}`,
    `-Db_pie=${options.pie}`,
    `-Doffline=${options.offline}`,
  ];
}
