/**
 * Task lifecycle state machine
 *
 * Legal edges, who may take them, and what each does to the lock. Pure data
 * and lookups; the lock manager and coordinator apply the effects.
 */

import { InvalidTransitionError } from '../../agents/shared/src/errors.js';
import type { AgentRole, TaskStatus } from '../../agents/shared/src/types.js';

export type LockEffect = 'none' | 'acquire' | 'release';

export type ActorRule =
  /** Any agent holding one of these roles */
  | { kind: 'role'; roles: readonly AgentRole[] }
  /** Only the agent currently holding the lock */
  | { kind: 'holder' }
  /** Only the lock manager's `lock` operation */
  | { kind: 'lockOperation' };

export interface Transition {
  from: TaskStatus;
  to: TaskStatus;
  actor: ActorRule;
  lockEffect: LockEffect;
}

export interface WorkflowPolicy {
  /** Where a failed review sends a task */
  reworkTarget: 'created' | 'pending';
  /** Roles that may promote staged tasks and create ready ones */
  privilegedRoles: readonly AgentRole[];
  /** Roles that may pick up finished development for review */
  reviewerRoles: readonly AgentRole[];
}

export const DEFAULT_POLICY: WorkflowPolicy = {
  reworkTarget: 'created',
  privilegedRoles: ['pm', 'architect'],
  reviewerRoles: ['qa'],
};

export function buildTransitionTable(policy: WorkflowPolicy = DEFAULT_POLICY): readonly Transition[] {
  return [
    { from: 'pending', to: 'created', actor: { kind: 'role', roles: policy.privilegedRoles }, lockEffect: 'none' },
    { from: 'created', to: 'locked', actor: { kind: 'lockOperation' }, lockEffect: 'acquire' },
    { from: 'locked', to: 'dev_done', actor: { kind: 'holder' }, lockEffect: 'release' },
    { from: 'locked', to: 'created', actor: { kind: 'holder' }, lockEffect: 'release' },
    { from: 'dev_done', to: 'testing', actor: { kind: 'role', roles: policy.reviewerRoles }, lockEffect: 'acquire' },
    { from: 'testing', to: 'qa_done', actor: { kind: 'holder' }, lockEffect: 'release' },
    { from: 'testing', to: policy.reworkTarget, actor: { kind: 'holder' }, lockEffect: 'release' },
    {
      from: 'qa_done',
      to: 'completed',
      actor: { kind: 'role', roles: [...policy.reviewerRoles, ...policy.privilegedRoles] },
      lockEffect: 'none',
    },
  ];
}

export class StateMachine {
  readonly policy: WorkflowPolicy;
  private readonly table: readonly Transition[];

  constructor(policy: Partial<WorkflowPolicy> = {}) {
    this.policy = { ...DEFAULT_POLICY, ...policy };
    this.table = buildTransitionTable(this.policy);
  }

  find(from: TaskStatus, to: TaskStatus): Transition | undefined {
    return this.table.find((edge) => edge.from === from && edge.to === to);
  }

  edgesFrom(from: TaskStatus): Transition[] {
    return this.table.filter((edge) => edge.from === from);
  }

  /**
   * Resolve the edge a `setStatus` call wants to take. Holder checks are the
   * caller's job; role rules are checked here.
   */
  resolve(from: TaskStatus, to: TaskStatus, role: AgentRole): Transition {
    const edge = this.find(from, to);
    if (!edge) {
      throw new InvalidTransitionError(from, to, { reason: 'no such edge' });
    }
    if (edge.actor.kind === 'lockOperation') {
      throw new InvalidTransitionError(from, to, { reason: 'locking is only possible through lock' });
    }
    if (edge.actor.kind === 'role' && !edge.actor.roles.includes(role)) {
      throw new InvalidTransitionError(from, to, { reason: `role ${role} may not take this edge`, role });
    }
    return edge;
  }

  isPrivileged(role: AgentRole): boolean {
    return this.policy.privilegedRoles.includes(role);
  }

  isReleaseEdge(from: TaskStatus, to: TaskStatus): boolean {
    const edge = this.find(from, to);
    return edge !== undefined && edge.actor.kind === 'holder' && edge.lockEffect === 'release';
  }
}
