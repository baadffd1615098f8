/**
 * Planning Department
 *
 * Turns a request (usually a cURL command) into an operation plan with a
 * single planner completion. The plan is returned as raw text: its labeled
 * fields are a convention the generator prompt relies on, not a schema.
 * A malformed plan is passed along and shows up later as a failed attempt.
 */

import type { TextCompletion } from '../models.js';
import { PlanningError, errorMessage } from '../errors.js';
import {
  PLAN_FIELDS,
  PLANNING_SYSTEM_PROMPT,
  buildPlanningUserPrompt,
  type PlanField,
} from '../prompts.js';

export type OperationPlan = string;

export class Planner {
  private completion: TextCompletion;

  constructor(completion: TextCompletion) {
    this.completion = completion;
  }

  /**
   * Produce the operation plan for a request.
   *
   * @throws PlanningError when the completion fails or returns blank text
   */
  async plan(request: string): Promise<OperationPlan> {
    let text: string;
    try {
      text = await this.completion.complete(
        PLANNING_SYSTEM_PROMPT,
        buildPlanningUserPrompt(request)
      );
    } catch (error) {
      throw new PlanningError(`Planner completion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const plan = stripReasoning(text).trim();
    if (plan.length === 0) {
      throw new PlanningError('Planner returned an empty plan');
    }

    const fields = describePlan(plan);
    console.log(
      `[Planner] Plan ready: ${fields.Operation ?? 'unnamed operation'} ` +
      `(${fields['HTTP Method'] ?? '?'} ${fields.API ?? '?'})`
    );
    return plan;
  }
}

/**
 * Drop `<think>…</think>` sections that reasoning models prepend.
 */
export function stripReasoning(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/gi, '');
}

/**
 * Read the labeled fields of a plan for display. Missing fields are absent;
 * nothing is validated.
 */
export function describePlan(plan: OperationPlan): Partial<Record<PlanField, string>> {
  const fields: Partial<Record<PlanField, string>> = {};
  for (const line of plan.split(/\r?\n/)) {
    const match = line.match(/^\s*#*\s*([A-Za-z ]+?)\s*:\s*(.+)$/);
    if (!match) continue;
    const label = PLAN_FIELDS.find((f) => f.toLowerCase() === match[1].toLowerCase());
    if (label && fields[label] === undefined) {
      fields[label] = match[2].trim().replace(/^`(.*)`$/, '$1');
    }
  }
  return fields;
}

export function createPlanner(completion: TextCompletion): Planner {
  return new Planner(completion);
}
