/**
 * Unit Tests for the Planning Department
 */

import { describe, it, expect, vi } from 'vitest';
import { Planner, describePlan, stripReasoning } from '../../src/departments/planning.js';
import { PLANNING_SYSTEM_PROMPT } from '../../src/prompts.js';
import { PlanningError } from '../../src/errors.js';

const CURL = `curl -X POST https://api.example.com/users -H 'Content-Type: application/json' -d '{"name":"Ada"}'`;

const PLAN = [
  '# API: `https://api.example.com/users`',
  '# Operation: `createUser`',
  '# HTTP Method: `POST`',
  '# Request Body: `{ "name": "Ada" }`',
  '# Response Body: `{ "id": 1, "name": "Ada" }`',
].join('\n');

function completionReturning(text: string) {
  return { complete: vi.fn().mockResolvedValue(text) };
}

describe('Planner', () => {
  it('sends the request to the planner prompt', async () => {
    const completion = completionReturning(PLAN);
    await new Planner(completion).plan(CURL);

    expect(completion.complete).toHaveBeenCalledWith(
      PLANNING_SYSTEM_PROMPT,
      expect.stringContaining(CURL)
    );
  });

  it('returns the plan text without reasoning sections', async () => {
    const completion = completionReturning(`<think>\nlooks like a POST\n</think>\n\n${PLAN}\n`);
    const plan = await new Planner(completion).plan(CURL);

    expect(plan).toBe(PLAN);
  });

  it('passes a malformed plan through', async () => {
    const plan = await new Planner(completionReturning('create a user')).plan(CURL);
    expect(plan).toBe('create a user');
  });

  it('throws PlanningError on a blank plan', async () => {
    await expect(new Planner(completionReturning('<think>hmm</think>  ')).plan(CURL)).rejects.toThrow(
      new PlanningError('Planner returned an empty plan')
    );
  });

  it('wraps completion failures', async () => {
    const completion = { complete: vi.fn().mockRejectedValue(new Error('connection refused')) };

    const error = await new Planner(completion).plan(CURL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toHaveProperty('message', 'Planner completion failed: connection refused');
    expect(error).toHaveProperty('code', 'PLANNING_FAILED');
  });
});

describe('describePlan', () => {
  it('reads the labeled fields', () => {
    expect(describePlan(PLAN)).toEqual({
      API: 'https://api.example.com/users',
      Operation: 'createUser',
      'HTTP Method': 'POST',
      'Request Body': '{ "name": "Ada" }',
      'Response Body': '{ "id": 1, "name": "Ada" }',
    });
  });

  it('leaves missing fields out', () => {
    expect(describePlan('Operation: listUsers')).toEqual({ Operation: 'listUsers' });
  });
});

describe('stripReasoning', () => {
  it('removes every think section', () => {
    expect(stripReasoning('<think>a</think>x<THINK>b</THINK>y')).toBe('xy');
  });
});
