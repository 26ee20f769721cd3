import inquirer from 'inquirer';

import { isAccountId } from './iam/caller-identity';

export async function promptForValue(
  message: string,
  defaultValue?: string,
): Promise<string> {
  const answers = await inquirer.prompt<{ value: string }>([
    {
      name: 'value',
      type: 'input',
      message,
      default: defaultValue,
      validate: (input: string) =>
        input.trim().length > 0 || `${message} is required`,
    },
  ]);

  return answers.value.trim();
}

export async function promptForAccountId(message: string): Promise<string> {
  const answers = await inquirer.prompt<{ accountId: string }>([
    {
      name: 'accountId',
      type: 'input',
      message,
      validate: (input: string) =>
        isAccountId(input.trim()) || 'an AWS account id has 12 digits',
    },
  ]);

  return answers.accountId.trim();
}
