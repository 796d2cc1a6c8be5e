export type StepStatus =
  | 'pending'
  | 'executing'
  | 'succeeded'
  | 'failed'
  | 'scoring'
  | 'scored'
  | 'recorded';

const STEP_TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  pending: ['executing'],
  executing: ['succeeded', 'failed'],
  succeeded: ['scoring', 'recorded'],
  failed: ['recorded'],
  scoring: ['scored'],
  scored: ['recorded'],
  recorded: [],
};

export function transitionStepStatus(current: StepStatus, next: StepStatus): StepStatus {
  const allowed = STEP_TRANSITIONS[current];
  if (!allowed.includes(next)) {
    throw new Error(`Invalid step status transition: '${current}' → '${next}'`);
  }
  return next;
}
