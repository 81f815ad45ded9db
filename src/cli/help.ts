/**
 * @fileoverview Detailed help text for pkgstage CLI commands
 */

const COMMON_OPTIONS = `
OPTIONS:
    -c, --config <file>     Pipeline configuration (default: pkgstage.yaml)
    --source <dir>          Working tree directory (default: .pkgstage/source)
    --build <dir>           Build directory (default: .pkgstage/build)
    --stage <dir>           Staging root (default: .pkgstage/stage)
    --state <file>          State file (default: .pkgstage/state.json)
    --credentials <dir>     Ephemeral key store (default: .pkgstage/credentials)
    --json                  Print results and errors as JSON
`;

const HELP_TEXT = {
  main: `
pkgstage - Staged, credential-aware package build pipeline

USAGE:
    pkgstage <command> [options]

COMMANDS:
    prepare             Clone, check out and patch the source; provision the key
    build               Configure the build directory and compile
    check               Run the project test suite
    package             Install into the staging root with the license
    run                 All of the above in one process
    status              Show pipeline state and stage outcomes
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --json              Enable JSON output (results and ErrorEnvelope errors)
${COMMON_OPTIONS}
ENVIRONMENT:
    PKGSTAGE_AUTH_TOKEN     Auth token for the key endpoint (see credentials.tokenEnv)
    PKGSTAGE_PREFIX, PKGSTAGE_LIBDIR, PKGSTAGE_SBINDIR, PKGSTAGE_BUILDTYPE,
    PKGSTAGE_LTO, PKGSTAGE_PIE, PKGSTAGE_OFFLINE, PKGSTAGE_WRAP_MODE
                            Override the build options in the config file
    PKGSTAGE_DEBUG=1        Emit debug logs

EXIT CODES:
    0                   Success
    <tool status>       The failing tool's own exit status, passed through
    2                   Usage or configuration error
    10-15               Stage failure without a tool status
                        (source, credential, configure, compile, verify, install)
    16                  Sub-command invoked out of order
    124                 Pipeline deadline exceeded

EXAMPLES:
    PKGSTAGE_AUTH_TOKEN=... pkgstage prepare
    pkgstage build && pkgstage check && pkgstage package
    pkgstage run --config packaging/pkgstage.yaml --stage /tmp/pkgroot

For more information on a specific command, run:
    pkgstage help <command>
`,

  prepare: `
pkgstage prepare - Acquire the source and provision the build credential

USAGE:
    pkgstage prepare [options]

Clones source.repository into the source directory, detaches at
source.revision and applies source.patch. Then fetches the ephemeral key
from credentials.endpoint and writes it, with its host entry, into the
credential store. The key is discarded if this command fails.
${COMMON_OPTIONS}`,

  build: `
pkgstage build - Configure and compile

USAGE:
    pkgstage build [options]

Runs meson setup against an empty build directory, then meson compile inside
a key-agent session holding the provisioned key. The credential store is
removed when this command ends, whether it succeeds or not.
${COMMON_OPTIONS}`,

  check: `
pkgstage check - Run the test suite

USAGE:
    pkgstage check [options]

Runs meson test. verification.mode decides what a failing suite means:
required (fail), non-fatal (record and continue) or skip (do not run).
${COMMON_OPTIONS}`,

  package: `
pkgstage package - Stage the build outputs

USAGE:
    pkgstage package [options]

Runs meson install with the staging root as destdir and copies the license to
<prefix>/share/licenses/<package>/LICENSE inside it.
${COMMON_OPTIONS}`,

  run: `
pkgstage run - Run every stage in one process

USAGE:
    pkgstage run [options]

Equivalent to prepare, build, check and package in sequence, under the
optional pipeline.timeoutMs deadline. Stops at the first failure.
${COMMON_OPTIONS}`,

  status: `
pkgstage status - Show pipeline state

USAGE:
    pkgstage status [--state <file>] [--json]

Prints the persisted state, the next sub-command to run and every recorded
stage outcome. Does not read the configuration file.
`,
} as const;

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}
