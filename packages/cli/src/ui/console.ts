import inquirer from 'inquirer';
import pc from 'picocolors';
import type { UserPrompt } from '@pacup/core';

export interface ConsoleUIOptions {
  /** Answer yes to every question without asking. */
  yes?: boolean;
  /** Never ask; every question resolves to no. */
  nonInteractive?: boolean;
}

export class ConsoleUI implements UserPrompt {
  constructor(private readonly options: ConsoleUIOptions = {}) {}

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    if (this.options.yes) {
      return true;
    }
    // Without a TTY there is nobody to answer
    if (this.options.nonInteractive || !process.stdin.isTTY) {
      return false;
    }

    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: `${pc.bold(pc.blue('::'))} ${message}`,
        default: defaultValue,
      },
    ]);
    return confirmed;
  }
}
