import { describe, it, expect, beforeEach, afterEach, vi, Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PasswordPrompt, resolveCredentials } from '../../../src/cli/credentials';
import { InvalidArgumentError } from '../../../src/domain/errors/archive.errors';

describe('resolveCredentials', () => {
  let directory: string;
  let prompt: Mock<PasswordPrompt>;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'credentials-'));
    prompt = vi.fn<PasswordPrompt>().mockResolvedValue('prompted-secret');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should prefer the password option', async () => {
    await expect(
      resolveCredentials('test-user', { password: 'test-secret', passwordFile: 'ignored' }, prompt),
    ).resolves.toEqual({ username: 'test-user', password: 'test-secret' });
    expect(prompt).not.toHaveBeenCalled();
  });

  it('should read the first line of the password file', async () => {
    const path = join(directory, 'password');
    await writeFile(path, '  test-secret  \nsecond line\n');

    await expect(resolveCredentials('test-user', { passwordFile: path }, prompt)).resolves.toEqual({
      username: 'test-user',
      password: 'test-secret',
    });
  });

  it('should reject an empty password file', async () => {
    const path = join(directory, 'password');
    await writeFile(path, '\n');

    await expect(resolveCredentials('test-user', { passwordFile: path }, prompt)).rejects.toThrow(
      `Password file ${path} is empty`,
    );
  });

  it('should reject a missing password file', async () => {
    await expect(
      resolveCredentials('test-user', { passwordFile: join(directory, 'missing') }, prompt),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it('should prompt when no password is given', async () => {
    await expect(resolveCredentials('test-user', {}, prompt)).resolves.toEqual({
      username: 'test-user',
      password: 'prompted-secret',
    });
    expect(prompt).toHaveBeenCalledWith('Password for test-user:');
  });

  it('should reject an empty prompted password', async () => {
    prompt.mockResolvedValue('');

    await expect(resolveCredentials('test-user', {}, prompt)).rejects.toThrow('A password is required');
  });

  it('should require a username', async () => {
    await expect(resolveCredentials(' ', { password: 'test-secret' }, prompt)).rejects.toThrow(
      'A username is required',
    );
  });
});
