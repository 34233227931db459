import password from '@inquirer/password';
import { readFile } from 'fs/promises';
import { ArchiveCredentials } from '../application/ports/output/catalogue-service.port';
import { InvalidArgumentError } from '../domain/errors/archive.errors';

export interface AccountOptions {
  password?: string;
  passwordFile?: string;
}

export type PasswordPrompt = (message: string) => Promise<string>;

const promptHidden: PasswordPrompt = (message) => password({ message });

async function readPasswordFile(path: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(`Unable to read password file ${path}: ${reason}`);
  }

  const firstLine = content.split(/\r?\n/)[0].trim();
  if (firstLine.length === 0) {
    throw new InvalidArgumentError(`Password file ${path} is empty`);
  }
  return firstLine;
}

/**
 * Password from --password, else the first line of --password-file, else a
 * hidden prompt on the terminal.
 */
export async function resolveCredentials(
  username: string,
  options: AccountOptions,
  prompt: PasswordPrompt = promptHidden,
): Promise<ArchiveCredentials> {
  if (username.trim().length === 0) {
    throw new InvalidArgumentError('A username is required');
  }

  if (options.password) {
    return { username, password: options.password };
  }

  if (options.passwordFile) {
    return { username, password: await readPasswordFile(options.passwordFile) };
  }

  const entered = await prompt(`Password for ${username}:`);
  if (entered.length === 0) {
    throw new InvalidArgumentError('A password is required');
  }
  return { username, password: entered };
}
