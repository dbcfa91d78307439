/**
 * Eligibility and ordering of candidate tasks for an agent
 */

import { SKILL_RANK, type AgentRole, type SkillLevel, type TaskRecord } from '../../agents/shared/src/types.js';

export function isEligible(task: TaskRecord, role: AgentRole, skillLevel: SkillLevel): boolean {
  return task.targetRole === role && task.status === 'created' && SKILL_RANK[task.skillLevel] <= SKILL_RANK[skillLevel];
}

/**
 * Pick the first eligible task: oldest first, an exact skill match before a
 * fallback at equal age, then lowest id.
 */
export function findEligible(role: AgentRole, skillLevel: SkillLevel, pool: readonly TaskRecord[]): TaskRecord | null {
  let best: TaskRecord | null = null;
  for (const task of pool) {
    if (!isEligible(task, role, skillLevel)) continue;
    if (best === null || compareCandidates(task, best, skillLevel) < 0) {
      best = task;
    }
  }
  return best;
}

function compareCandidates(a: TaskRecord, b: TaskRecord, skillLevel: SkillLevel): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  const aExact = a.skillLevel === skillLevel ? 0 : 1;
  const bExact = b.skillLevel === skillLevel ? 0 : 1;
  if (aExact !== bExact) {
    return aExact - bExact;
  }
  return a.id - b.id;
}
