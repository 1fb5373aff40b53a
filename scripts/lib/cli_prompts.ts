import { input as inputPrompt, select as selectPrompt } from '@inquirer/prompts';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
}

export interface PromptAdapter {
  select<T>(options: { message: string; choices: Array<SelectChoice<T>>; defaultValue?: T }): Promise<T>;
  input(options: { message: string; defaultValue?: string }): Promise<string>;
}

export const interactivePromptAdapter: PromptAdapter = {
  async select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    defaultValue?: T;
  }): Promise<T> {
    return selectPrompt({
      message: options.message,
      choices: options.choices,
      default: options.defaultValue
    });
  },

  async input(options): Promise<string> {
    return inputPrompt({
      message: options.message,
      default: options.defaultValue
    });
  }
};

export async function inputValidated(
  prompt: PromptAdapter,
  options: {
    message: string;
    defaultValue?: string;
    validate?: (value: string) => string | undefined;
  }
): Promise<string> {
  while (true) {
    const raw = await prompt.input({
      message: options.message,
      defaultValue: options.defaultValue
    });

    const value = raw.trim();
    const errorMessage = options.validate ? options.validate(value) : undefined;
    if (!errorMessage) {
      return value;
    }

    console.log(errorMessage);
  }
}
