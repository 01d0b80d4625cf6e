import { Command } from 'commander';
import chalk from 'chalk';
import { CommandRunner } from '@pacup/exec';
import { ConfigLoader } from '@pacup/core';
import { Config, errorMessage } from '@pacup/shared';

const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

export type CheckResult = [string, string];

export async function checkExecutable(
  name: string,
  runner: CommandRunner = new CommandRunner(),
): Promise<CheckResult> {
  const location = await runner.locate(name);
  return location
    ? [CHECKS.OK, `${name} found at: ${location}`]
    : [CHECKS.FAIL, `${name} not found in PATH.`];
}

export function checkConfigSources(sources: readonly string[]): CheckResult {
  if (sources.length === 0) {
    return [CHECKS.OK, 'No configuration files found. Using defaults.'];
  }
  return [CHECKS.OK, `Configuration loaded from: ${sources.join(', ')}`];
}

export function checkShipping(config: Config): CheckResult {
  if (!config.ship.enabled) {
    return [CHECKS.OK, 'Shipping is disabled. Pass --ship to commit updates.'];
  }
  return [
    CHECKS.WARN,
    config.ship.push
      ? `Updates are committed and pushed to '${config.ship.remote}'.`
      : 'Updates are committed but not pushed.',
  ];
}

/**
 * Runs every check and prints the results. Resolves to false when any check failed.
 */
export async function runDoctor(
  configPath: string | undefined,
  runner: CommandRunner = new CommandRunner(),
): Promise<boolean> {
  console.log(chalk.bold('PacUp Environment Checkup'));
  console.log('---------------------------------');

  const results: CheckResult[] = [];
  let config: Config | undefined;
  try {
    config = ConfigLoader.load({ configPath });
    results.push(checkConfigSources(ConfigLoader.sources({ configPath })));
    results.push(checkShipping(config));
  } catch (error: unknown) {
    results.push([CHECKS.FAIL, `Failed to load configuration: ${errorMessage(error)}`]);
  }

  const shell = config?.evaluator.shell ?? 'bash';
  const installer = config?.install.command ?? 'pacstall';
  for (const executable of [shell, installer, 'git']) {
    results.push(await checkExecutable(executable, runner));
  }

  results.forEach(([status, message]) => {
    console.log(`${status} ${message}`);
  });
  console.log('---------------------------------');

  const hasFailures = results.some(([status]) => status === CHECKS.FAIL);
  if (hasFailures) {
    console.log(
      chalk.red.bold('Doctor checks failed.') +
        ' Please resolve the issues marked with ' +
        CHECKS.FAIL,
    );
  } else {
    console.log(chalk.green.bold('All checks passed. Your environment looks good!'));
  }
  return !hasFailures;
}

export const registerDoctorCommand = (program: Command) => {
  program
    .command('doctor')
    .description('Run checks to diagnose issues with the environment.')
    .action(async () => {
      const passed = await runDoctor(program.opts<{ config?: string }>().config);
      if (!passed) {
        process.exitCode = 1;
      }
    });
};
