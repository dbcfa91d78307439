/**
 * Long-poll matching: wait until an eligible task appears, the deadline
 * passes, or the caller goes away.
 *
 * The coordinator only finds work; it never locks. Between a `task` outcome
 * and the caller's `lock` another agent may win, and the caller simply asks
 * again.
 */

import { AgentLogger } from '../../agents/shared/src/logger.js';
import type { AgentRole, NextTaskResult, SkillLevel, TaskChange } from '../../agents/shared/src/types.js';
import { findEligible } from './matcher.js';
import type { TaskStore } from './taskStore.js';

export interface WaitCoordinatorOptions {
  pollIntervalMs: number;
  maxPollIntervalMs: number;
  backoffFactor: number;
  maxWaitMs: number;
  now?: () => number;
}

export interface WaitRequest {
  deadlineMs: number;
  signal?: AbortSignal | undefined;
}

type WakeReason = 'timer' | 'change' | 'abort';

export class WaitCoordinator {
  private logger = new AgentLogger('WaitCoordinator');
  private now: () => number;

  constructor(
    private store: TaskStore,
    private options: WaitCoordinatorOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async nextTask(role: AgentRole, skillLevel: SkillLevel, request: WaitRequest): Promise<NextTaskResult> {
    const { signal } = request;
    const started = this.now();
    const budget = Math.max(0, Math.min(request.deadlineMs, this.options.maxWaitMs));
    const deadline = started + budget;
    let interval = Math.min(this.options.pollIntervalMs, this.options.maxPollIntervalMs);

    while (true) {
      if (signal?.aborted) {
        this.logger.debug('Wait cancelled', { role });
        return { outcome: 'cancelled' };
      }

      // Fresh read on every evaluation
      const task = findEligible(role, skillLevel, this.store.listCandidates(role));
      if (task) {
        return { outcome: 'task', task };
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return { outcome: 'timeout', waitedMs: this.now() - started };
      }

      const reason = await this.suspend(Math.min(interval, remaining), signal);
      if (reason === 'abort') {
        this.logger.debug('Wait cancelled', { role });
        return { outcome: 'cancelled' };
      }
      interval = Math.min(interval * this.options.backoffFactor, this.options.maxPollIntervalMs);
    }
  }

  /**
   * Sleep until the timer fires, a task enters `created`, or the signal
   * aborts. Every listener is removed before resolving.
   */
  private suspend(ms: number, signal: AbortSignal | undefined): Promise<WakeReason> {
    return new Promise((resolve) => {
      let settled = false;

      const finish = (reason: WakeReason): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        unsubscribe();
        signal?.removeEventListener('abort', onAbort);
        resolve(reason);
      };

      const onAbort = (): void => finish('abort');
      const timer = setTimeout(() => finish('timer'), ms);
      const unsubscribe = this.store.onChange((change: TaskChange) => {
        if (change.newStatus === 'created') {
          finish('change');
        }
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
