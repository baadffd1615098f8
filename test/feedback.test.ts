import { describe, it, expect } from 'vitest';
import { buildFeedback, categorizeOutcome, compilerErrorLines } from '../src/feedback.js';
import {
  EMPTY_SET_DIAGNOSTIC,
  MISSING_ENTRY_POINT_DIAGNOSTIC,
  UNSAFE_ARTIFACT_DIAGNOSTIC,
} from '../src/departments/quality-gate.js';
import type { ValidationOutcome } from '../src/types.js';

function outcome(overrides: Partial<ValidationOutcome> & { files?: string[]; entryPoint?: string }): ValidationOutcome {
  const { files = ['Main.java'], entryPoint, ...rest } = overrides;
  return {
    compiled: false,
    ran: false,
    diagnosticText: '',
    metadata: {
      startedAt: '2026-01-01T00:00:00.000Z',
      endedAt: '2026-01-01T00:00:01.000Z',
      files,
      buildSystem: 'javac',
      toolchain: [],
      entryPoint,
    },
    ...rest,
  };
}

describe('categorizeOutcome', () => {
  it.each([
    ['success', outcome({ compiled: true, ran: true, entryPoint: 'Main' }), 'success', undefined],
    ['empty set', outcome({ files: [], diagnosticText: EMPTY_SET_DIAGNOSTIC }), 'empty_extraction', 'generation'],
    [
      'unsafe names',
      outcome({ diagnosticText: `${UNSAFE_ARTIFACT_DIAGNOSTIC}: ../A.java` }),
      'unsafe_artifact',
      'generation',
    ],
    [
      'compile timeout',
      outcome({ diagnosticText: 'compile stage timed out after 100ms' }),
      'timeout',
      'compilation',
    ],
    [
      'compile error',
      outcome({ diagnosticText: 'Main.java:1: error: ; expected' }),
      'compile_failure',
      'compilation',
    ],
    [
      'missing entry point',
      outcome({ compiled: true, diagnosticText: `${MISSING_ENTRY_POINT_DIAGNOSTIC}: none` }),
      'missing_entry_point',
      'execution',
    ],
    [
      'run timeout',
      outcome({ compiled: true, entryPoint: 'Main', diagnosticText: 'run stage timed out after 5000ms' }),
      'timeout',
      'execution',
    ],
    [
      'runtime exception',
      outcome({ compiled: true, entryPoint: 'Main', diagnosticText: 'Exception in thread "main"' }),
      'runtime_failure',
      'execution',
    ],
  ])('%s', (_label, value, category, phase) => {
    expect(categorizeOutcome(value)).toEqual({ category, phase });
  });
});

describe('buildFeedback', () => {
  it('is the diagnostic text as captured', () => {
    expect(buildFeedback(outcome({ diagnosticText: 'Main.java:1: error: ; expected' }))).toBe(
      'Main.java:1: error: ; expected'
    );
  });

  it('appends the analysis when there is one', () => {
    const value = outcome({ diagnosticText: 'boom', analysis: 'Check line 1.' });
    expect(buildFeedback(value)).toBe('boom\n\nAnalysis:\nCheck line 1.');
  });
});

describe('compilerErrorLines', () => {
  it('picks javac and kotlinc error lines', () => {
    const text = [
      'com/example/User.java:3: error: cannot find symbol',
      '  symbol: class Strin',
      'e: file:///work/Main.kt:4:9 Unresolved reference: foo',
      'warning: [deprecation]',
      '2 errors',
    ].join('\n');

    expect(compilerErrorLines(text)).toEqual([
      'com/example/User.java:3: error: cannot find symbol',
      'e: file:///work/Main.kt:4:9 Unresolved reference: foo',
    ]);
  });
});
