import { Command } from 'commander';
import { registerDoctorCommand } from './commands/doctor';
import { registerUpdateCommand } from './commands/update';
import { VERSION } from './version';

export const name = '@pacup/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pacup')
    .description('Updates pacscripts to the latest upstream versions.')
    .version(`PacUp ${VERSION}`, '-V, --version', 'Show the version and exit')
    .option('--config <path>', 'Path to configuration file')
    .option('-d, --debug', 'Turn on debugging mode')
    .option('-v, --verbose', 'Turn on verbose mode')
    // Subcommands inherit this, so argument errors reach the top-level handler
    .exitOverride();

  registerUpdateCommand(program);
  registerDoctorCommand(program);

  return program;
}
