/**
 * Test doubles shared by the validator, feedback loop and engine tests.
 */

import type { StageResult, ToolchainInvocation, ToolchainRunner } from '../src/toolchain.js';

export function stageResult(exitCode: number | null, output = '', timedOut = false): StageResult {
  return { exitCode, output, timedOut, durationMs: 1 };
}

type Responder = (invocation: ToolchainInvocation) => StageResult | Promise<StageResult>;

/**
 * In-process ToolchainRunner. Every stage succeeds with empty output unless a
 * responder says otherwise.
 */
export class FakeToolchainRunner implements ToolchainRunner {
  invocations: ToolchainInvocation[] = [];
  checked: string[] = [];
  private responder: Responder;

  constructor(responder: Responder = () => stageResult(0)) {
    this.responder = responder;
  }

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  async run(invocation: ToolchainInvocation): Promise<StageResult> {
    this.invocations.push(invocation);
    return this.responder(invocation);
  }

  async checkAvailable(executable: string): Promise<void> {
    this.checked.push(executable);
  }

  commands(): string[] {
    return this.invocations.map((invocation) => invocation.command);
  }
}
