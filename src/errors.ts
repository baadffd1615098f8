/**
 * Session-level errors.
 *
 * Content-quality problems (bad code, failed compiles, empty responses) are
 * reported as values on the session result. Only the conditions below are
 * thrown: they mean the environment is broken, not the generated code.
 */

export type CodegenErrorCode =
  | 'PLANNING_FAILED'
  | 'TOOLCHAIN_UNAVAILABLE'
  | 'WORKSPACE_IO'
  | 'INVALID_CONFIG';

export abstract class CodegenError extends Error {
  abstract readonly code: CodegenErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The planner could not produce a plan. Raised before the retry loop starts,
 * so it never consumes an attempt.
 */
export class PlanningError extends CodegenError {
  readonly code = 'PLANNING_FAILED' as const;
}

/**
 * The compiler or runtime binary could not be started.
 */
export class ToolchainUnavailableError extends CodegenError {
  readonly code = 'TOOLCHAIN_UNAVAILABLE' as const;

  constructor(
    message: string,
    readonly command: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A read, write or listing inside the workspace failed.
 */
export class WorkspaceIOError extends CodegenError {
  readonly code = 'WORKSPACE_IO' as const;

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends CodegenError {
  readonly code = 'INVALID_CONFIG' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
