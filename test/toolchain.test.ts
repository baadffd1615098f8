/**
 * Tests for the shell toolchain runner.
 *
 * The runner cases spawn plain shell built-ins only; no compiler is needed.
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import { ShellToolchainRunner, commandExecutable, isCommandNotFound } from '../src/toolchain.js';
import { ToolchainUnavailableError } from '../src/errors.js';
import type { ToolchainInvocation } from '../src/toolchain.js';

function invocation(command: string, timeoutMs = 10_000): ToolchainInvocation {
  return {
    workspace: os.tmpdir(),
    buildSystem: 'javac',
    stage: 'compile',
    command,
    timeoutMs,
  };
}

describe('isCommandNotFound', () => {
  it.each([
    [127, '', 'javac'],
    ['ENOENT', '', 'javac'],
    [1, 'bash: javac: command not found', 'javac'],
    [2, '/bin/sh: 1: kotlinc: not found', 'kotlinc'],
    [1, 'zsh: command not found: mvn', 'mvn'],
  ])('recognises %s / %s', (code, output, executable) => {
    expect(isCommandNotFound(code, output, executable)).toBe(true);
  });

  it('does not flag compiler errors', () => {
    expect(isCommandNotFound(1, 'User.java:3: error: cannot find symbol', 'javac')).toBe(false);
  });

  it('does not flag program output that mentions not found', () => {
    expect(isCommandNotFound(1, 'GET /users/42: not found', 'java')).toBe(false);
    expect(isCommandNotFound(1, 'lookup: command not found', 'java')).toBe(false);
  });
});

describe('commandExecutable', () => {
  it('takes the first word', () => {
    expect(commandExecutable('  javac -d .build/classes "Main.java"')).toBe('javac');
  });
});

describe('ShellToolchainRunner', () => {
  const runner = new ShellToolchainRunner();

  it('returns exit code 0 and the output on success', async () => {
    const result = await runner.run(invocation('echo compiled'));

    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('compiled');
    expect(result.timedOut).toBe(false);
  });

  it('returns the exit code and combined output on failure', async () => {
    const result = await runner.run(invocation('echo out; echo err 1>&2; exit 3'));

    expect(result.exitCode).toBe(3);
    expect(result.output).toBe('out\nerr');
    expect(result.timedOut).toBe(false);
  });

  it('returns a failing program run that prints not found', async () => {
    const result = await runner.run({
      ...invocation('echo "GET /users/42: not found"; exit 1'),
      stage: 'run',
    });

    expect(result.exitCode).toBe(1);
    expect(result.output).toBe('GET /users/42: not found');
  });

  it('throws ToolchainUnavailableError for a missing binary', async () => {
    await expect(
      runner.run(invocation('curlgen-test-no-such-binary --version'))
    ).rejects.toBeInstanceOf(ToolchainUnavailableError);
  });

  it('marks a stage that runs past its timeout', async () => {
    const result = await runner.run(invocation('sleep 2', 100));

    expect(result.timedOut).toBe(true);
    expect(result.output).toBe('compile stage timed out after 100ms');
  });

  it('checks executables on PATH', async () => {
    await expect(runner.checkAvailable('sh')).resolves.toBeUndefined();
    await expect(runner.checkAvailable('curlgen-test-no-such-binary')).rejects.toBeInstanceOf(
      ToolchainUnavailableError
    );
  });
});
