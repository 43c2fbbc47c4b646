/**
 * In-memory PlanLookup keyed by (domain, taskId).
 */
import { InputMismatchError, ErrorCodes } from '../../utils/errors.js';
import { compareStrings } from '../../utils/string.js';
import { validatePlan } from './schema.js';
import type { ExpectedPlan, PlanLookup } from './types.js';

function planKey(domain: string, taskId: string): string {
  return `${domain}\u0000${taskId}`;
}

export class PlanIndex implements PlanLookup {
  private plans: Map<string, ExpectedPlan> = new Map();
  private emptyTasks: Set<string> = new Set();

  static from(plans: Iterable<ExpectedPlan>): PlanIndex {
    const index = new PlanIndex();
    for (const plan of plans) {
      index.add(plan);
    }
    return index;
  }

  /**
   * Validate and register a plan. A second plan for the same
   * (domain, taskId) is rejected.
   */
  add(plan: ExpectedPlan): void {
    const valid = validatePlan(plan);
    const key = planKey(valid.domain, valid.taskId);
    if (this.plans.has(key)) {
      throw new InputMismatchError(
        ErrorCodes.MALFORMED_PLAN,
        `Duplicate plan for task ${valid.taskId} in domain ${valid.domain}`,
        { taskId: valid.taskId, domain: valid.domain }
      );
    }
    this.plans.set(key, valid);
  }

  get(domain: string, taskId: string): ExpectedPlan | undefined {
    return this.plans.get(planKey(domain, taskId));
  }

  get size(): number {
    return this.plans.size;
  }

  domains(): string[] {
    return [...new Set([...this.plans.values()].map((plan) => plan.domain))].sort(compareStrings);
  }

  /**
   * Record a task that exists but has no plan because it lists no actions.
   */
  addEmptyTask(domain: string, taskId: string): void {
    this.emptyTasks.add(planKey(domain, taskId));
  }

  isEmptyTask(domain: string, taskId: string): boolean {
    return this.emptyTasks.has(planKey(domain, taskId));
  }
}
