import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PromptCancelledError, validatePasswordStrength } from './password-prompt.js';

// -- Mock @inquirer/password ---

const mockPassword = vi.fn<(config: Record<string, unknown>, context?: Record<string, unknown>) => Promise<string>>();

vi.mock('@inquirer/password', () => ({
  default: (config: Record<string, unknown>, context?: Record<string, unknown>) => mockPassword(config, context),
}));

// Must import after mock
const { promptForPassword, promptNewPassword } = await import('./password-prompt.js');

// -- Tests ---

beforeEach(() => {
  mockPassword.mockReset();
});

describe('promptForPassword', () => {
  it('returns the entered password', async () => {
    mockPassword.mockResolvedValueOnce('correct-horse');

    await expect(promptForPassword()).resolves.toBe('correct-horse');
  });

  it('uses the default message and a masked input', async () => {
    mockPassword.mockResolvedValueOnce('test');

    await promptForPassword();

    expect(mockPassword).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Enter password:', mask: '*' }),
      { output: process.stderr },
    );
  });

  it('throws PromptCancelledError on Ctrl+C', async () => {
    const exitError = new Error('User force closed the prompt');
    exitError.name = 'ExitPromptError';
    mockPassword.mockRejectedValueOnce(exitError);

    await expect(promptForPassword()).rejects.toThrow(PromptCancelledError);
  });

  it('rethrows other errors unchanged', async () => {
    mockPassword.mockRejectedValueOnce(new Error('stdin closed'));

    await expect(promptForPassword()).rejects.toThrow('stdin closed');
  });
});

describe('promptNewPassword', () => {
  it('asks twice and returns the first entry', async () => {
    mockPassword.mockResolvedValueOnce('test-secret').mockResolvedValueOnce('test-secret');

    await expect(promptNewPassword()).resolves.toBe('test-secret');
    expect(mockPassword).toHaveBeenCalledTimes(2);
  });

  it('confirmation rejects a different entry', async () => {
    mockPassword.mockResolvedValueOnce('test-secret').mockResolvedValueOnce('test-secret');

    await promptNewPassword();

    const confirm = mockPassword.mock.calls[1]?.[0];
    const validate = confirm?.['validate'];
    expect(typeof validate).toBe('function');
    if (typeof validate === 'function') {
      expect(validate('other')).toBe('Passwords do not match');
      expect(validate('test-secret')).toBe(true);
    }
  });
});

describe('validatePasswordStrength', () => {
  it('rejects passwords shorter than 8 characters', () => {
    expect(validatePasswordStrength('short')).toBe('Password must be at least 8 characters');
  });

  it('accepts 8 characters', () => {
    expect(validatePasswordStrength('12345678')).toBe(true);
  });
});
