import password from '@inquirer/password';

// -- Types ---

export interface PromptOptions {
  /** Defaults to 'Enter password:'. */
  readonly message?: string;
  /** Return an error message to reject the input, or true to accept it. */
  readonly validate?: (input: string) => string | true;
}

/**
 * Thrown when the user cancels the prompt (Ctrl+C).
 */
export class PromptCancelledError extends Error {
  override readonly name = 'PromptCancelledError' as const;

  constructor() {
    super('Password prompt cancelled by user');
  }
}

// -- Constants ---

const DEFAULT_MESSAGE = 'Enter password:';
export const MIN_PASSWORD_LENGTH = 8;

// -- Public API ---

export function validatePasswordStrength(input: string): string | true {
  if (input.length < MIN_PASSWORD_LENGTH) {
    return `Password must be at least ${MIN_PASSWORD_LENGTH} characters`;
  }
  return true;
}

/**
 * Masked password input. The prompt renders on stderr so stdout stays JSON.
 *
 * @throws PromptCancelledError if the user cancels
 */
export async function promptForPassword(options: PromptOptions = {}): Promise<string> {
  try {
    return await password(
      {
        message: options.message ?? DEFAULT_MESSAGE,
        mask: '*',
        validate: options.validate,
      },
      { output: process.stderr },
    );
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'ExitPromptError') {
      throw new PromptCancelledError();
    }
    throw error;
  }
}

/**
 * Ask for a new master-key password twice. The second entry must match the first.
 */
export async function promptNewPassword(): Promise<string> {
  const first = await promptForPassword({
    message: 'Master key password:',
    validate: validatePasswordStrength,
  });
  await promptForPassword({
    message: 'Confirm password:',
    validate: (input) => (input === first ? true : 'Passwords do not match'),
  });
  return first;
}
