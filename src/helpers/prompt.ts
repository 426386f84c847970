import inquirer from 'inquirer';

export async function promptConfirmation(message: string, defaultValue: boolean = false): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message,
      default: defaultValue
    }
  ]);

  return confirmed;
}

export async function promptChoice<T extends string>(
  message: string,
  choices: { name: string; value: T }[],
  defaultValue?: T
): Promise<T> {
  const { choice } = await inquirer.prompt<{ choice: T }>([
    {
      type: 'list',
      name: 'choice',
      message,
      choices,
      default: defaultValue
    }
  ]);

  return choice;
}

export async function promptInput(message: string, defaultValue?: string): Promise<string> {
  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: 'input',
      name: 'value',
      message,
      default: defaultValue
    }
  ]);

  return value.trim();
}
