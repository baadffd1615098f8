/**
 * Toolchain Runner
 *
 * Runs one build stage (compile or run) as a shell command in the workspace
 * and hands back the combined output with the exit code. A missing binary is
 * an environment problem and is thrown; everything else, including a
 * non-zero exit or a timeout, is returned as a StageResult.
 */

import { exec } from 'child_process';
import { promisify } from 'util';
import { ToolchainUnavailableError } from './errors.js';
import type { BuildSystem, ToolchainStage } from './types.js';

const execAsync = promisify(exec);

// ============================================================================
// Types
// ============================================================================

export interface ToolchainInvocation {
  /** Absolute workspace path, used as the working directory */
  workspace: string;
  buildSystem: BuildSystem;
  stage: ToolchainStage;
  command: string;
  timeoutMs: number;
}

export interface StageResult {
  /** Process exit code; null when the runner only has narrative output */
  exitCode: number | null;
  /** Combined stdout and stderr */
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface ToolchainRunner {
  run(invocation: ToolchainInvocation): Promise<StageResult>;
  /** Throws ToolchainUnavailableError when the executable cannot be started */
  checkAvailable(executable: string): Promise<void>;
}

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whether a failed exec means the executable itself is missing. Output
 * counts only when it is the shell's own message naming that executable.
 */
export function isCommandNotFound(
  code: number | string | undefined,
  output: string,
  executable: string
): boolean {
  if (code === 127 || code === 'ENOENT') return true;
  if (executable.length === 0) return false;
  const name = escapeRegExp(executable);
  return [
    new RegExp(`(?:^|: )${name}: (?:command )?not found$`, 'm'),
    new RegExp(`command not found: ${name}$`, 'm'),
    new RegExp(`'${name}' is not recognized as an internal or external command`),
  ].some((pattern) => pattern.test(output));
}

/** First word of a shell command */
export function commandExecutable(command: string): string {
  return command.trim().split(/\s+/)[0] ?? '';
}

// ============================================================================
// Shell Runner
// ============================================================================

export class ShellToolchainRunner implements ToolchainRunner {
  private maxBuffer: number;

  constructor(options: { maxBuffer?: number } = {}) {
    this.maxBuffer = options.maxBuffer ?? 10 * 1024 * 1024;
  }

  async run(invocation: ToolchainInvocation): Promise<StageResult> {
    const startTime = Date.now();
    console.log(`[Toolchain] ${invocation.stage} (${invocation.buildSystem}): ${invocation.command}`);

    try {
      const { stdout, stderr } = await execAsync(invocation.command, {
        cwd: invocation.workspace,
        timeout: invocation.timeoutMs,
        maxBuffer: this.maxBuffer,
      });

      return {
        exitCode: 0,
        output: (stdout + stderr).trim(),
        timedOut: false,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      if (!isExecFailure(error)) throw error;

      const output = `${error.stdout ?? ''}${error.stderr ?? ''}`.trim();
      if (isCommandNotFound(error.code, output, commandExecutable(invocation.command))) {
        throw new ToolchainUnavailableError(
          `Toolchain command could not be started: ${invocation.command}`,
          invocation.command,
          { cause: error }
        );
      }

      const timedOut = error.killed === true && error.signal === 'SIGTERM';
      const exitCode = typeof error.code === 'number' ? error.code : null;

      return {
        exitCode,
        output: timedOut
          ? `${output}\n${invocation.stage} stage timed out after ${invocation.timeoutMs}ms`.trim()
          : output || error.message || 'Toolchain stage failed without output',
        timedOut,
        durationMs: Date.now() - startTime,
      };
    }
  }

  async checkAvailable(executable: string): Promise<void> {
    const lookup = process.platform === 'win32' ? `where ${executable}` : `command -v ${executable}`;
    try {
      await execAsync(lookup, { timeout: 10000 });
    } catch (error) {
      throw new ToolchainUnavailableError(
        `${executable} is not on PATH`,
        executable,
        { cause: error }
      );
    }
  }
}

export function createToolchainRunner(): ToolchainRunner {
  return new ShellToolchainRunner();
}
