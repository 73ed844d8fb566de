/**
 * Interactive confirmation for destructive operations
 */

import inquirer from 'inquirer';

export type Confirm = (message: string) => Promise<boolean>;

export const confirmWithPrompt: Confirm = async (message) => {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: false,
    },
  ]);
  return confirmed;
};
