import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import {
  ConfigLoader,
  GitShipper,
  Installer,
  PACSCRIPT_EXTENSION,
  PacstallInstaller,
  Shipper,
  UserPrompt,
  groupByStatus,
  parsePacscripts,
  updatePacscripts,
} from '@pacup/core';
import { Config, ConfigInput, ConsoleLogger, UsageError, logger } from '@pacup/shared';
import { UpdateRenderer } from '../output/renderer';
import { ConsoleUI } from '../ui/console';
import { USER_AGENT, VERSION } from '../version';

export interface UpdateCommandOptions {
  showRepology?: boolean;
  debug?: boolean;
  verbose?: boolean;
  yes?: boolean;
  nonInteractive?: boolean;
  ship?: boolean;
  push?: boolean;
  config?: string;
}

/** Exit status when at least one attempted update failed. */
export const EXIT_UPDATE_FAILED = 70;

export interface UpdateDependencies {
  config?: Config;
  renderer?: UpdateRenderer;
  prompt?: UserPrompt;
  installer?: Installer;
  shipper?: Shipper;
  logger?: ConsoleLogger;
  cwd?: string;
}

/**
 * Rejects anything that is not an existing, non-git pacscript file.
 */
export function validatePacscriptPaths(paths: readonly string[], cwd = process.cwd()): string[] {
  if (paths.length === 0) {
    throw new UsageError('At least one pacscript is required.');
  }
  if (!paths.every((p) => path.extname(p) === PACSCRIPT_EXTENSION)) {
    throw new UsageError('All pacscripts must have a .pacscript extension.');
  }
  if (paths.some((p) => path.basename(p, PACSCRIPT_EXTENSION).endsWith('-git'))) {
    throw new UsageError('Git pacscripts are not supported.');
  }
  return paths.map((p) => {
    const resolved = path.resolve(cwd, p);
    if (!fs.existsSync(resolved)) {
      throw new UsageError(`Pacscript not found: ${p}`);
    }
    if (!fs.statSync(resolved).isFile()) {
      throw new UsageError(`Not a file: ${p}`);
    }
    return resolved;
  });
}

function configFlags(options: UpdateCommandOptions): ConfigInput {
  const ship: NonNullable<ConfigInput['ship']> = {};
  if (options.ship !== undefined) ship.enabled = options.ship;
  if (options.push !== undefined) ship.push = options.push;
  return { ship };
}

/**
 * Checks every pacscript against Repology, shows where each one stands and
 * updates the outdated ones. Resolves to the process exit code.
 */
export async function runUpdate(
  pacscripts: readonly string[],
  options: UpdateCommandOptions,
  deps: UpdateDependencies = {},
): Promise<number> {
  const paths = validatePacscriptPaths(pacscripts, deps.cwd);

  const log = deps.logger ?? logger;
  log.setLevel(options.debug ? 'debug' : options.verbose ? 'info' : 'silent');
  log.info(`PacUp ${VERSION}`);

  const config =
    deps.config ??
    ConfigLoader.load({ configPath: options.config, flags: configFlags(options), cwd: deps.cwd });

  const renderer =
    deps.renderer ??
    new UpdateRenderer({
      progress: process.stderr.isTTY ? (text) => process.stderr.write(text) : undefined,
      columns: process.stdout.columns,
    });

  log.info(`Parsing ${paths.length} pacscripts`);
  const outcomes = await parsePacscripts(paths, {
    concurrency: config.repology.concurrency,
    showDebugOutput: options.showRepology ?? false,
    parse: { evaluator: config.evaluator },
    resolve: {
      apiUrl: config.repology.apiUrl,
      denylist: config.repology.denylist,
      timeoutMs: config.http.timeoutMs,
      userAgent: USER_AGENT,
      observer: renderer,
    },
    releaseNotes: { timeoutMs: config.http.timeoutMs, userAgent: USER_AGENT },
    logger: log,
  });

  log.info('Sorting parsed pacscripts by version status');
  const groups = groupByStatus(outcomes);
  for (const failure of groups.failed) {
    log.debug(`Could not load ${failure.path}`);
  }
  renderer.statusGroups(groups);

  log.info('Updating pacscripts');
  const report = await updatePacscripts(groups.outdated, {
    prompt:
      deps.prompt ?? new ConsoleUI({ yes: options.yes, nonInteractive: options.nonInteractive }),
    installer: deps.installer ?? new PacstallInstaller({ ...config.install, logger: log }),
    shipper:
      deps.shipper ??
      (config.ship.enabled
        ? new GitShipper({ push: config.ship.push, remote: config.ship.remote, logger: log })
        : undefined),
    reporter: renderer,
    download: {
      dir: config.download.dir,
      timeoutMs: config.http.timeoutMs,
      contentLengthRetries: config.http.contentLengthRetries,
      userAgent: USER_AGENT,
    },
    logger: log,
  });

  renderer.summary(report);
  log.debug(`Updated: ${report.updated.map((p) => p.name).join(', ') || 'none'}`);
  return report.failed.size > 0 ? EXIT_UPDATE_FAILED : 0;
}

export const registerUpdateCommand = (program: Command) => {
  program
    .command('update', { isDefault: true })
    .description('Update the given pacscripts to their latest upstream versions.')
    .argument('<pacscripts...>', 'pacscripts to update')
    .option('-r, --show-repology', 'Show the parsed Repology data')
    .option('-y, --yes', 'Answer "yes" to every prompt')
    .option('--non-interactive', 'Never prompt; every question is answered "no"')
    .option('-s, --ship', 'Commit each successful update')
    .option('--push', 'Push commits made with --ship')
    .action(async (pacscripts: string[], _options: UpdateCommandOptions, command: Command) => {
      process.exitCode = await runUpdate(
        pacscripts,
        command.optsWithGlobals<UpdateCommandOptions>(),
      );
    });
};
