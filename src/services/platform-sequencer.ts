import type { PlatformSequences, ScenarioGroup } from '../types';
import { sortedKeys } from './scenario-grouper';

/**
 * One ordered work-stream per platform, so each platform can proceed
 * without waiting on the others.
 */
export function buildPlatformSequences(group: ScenarioGroup): PlatformSequences {
  const sequences: PlatformSequences = new Map();
  for (const scenarioId of sortedKeys(group)) {
    const platforms = group.get(scenarioId);
    if (!platforms) continue;
    for (const platformId of sortedKeys(platforms)) {
      const steps = platforms.get(platformId) ?? [];
      const sequence = sequences.get(platformId);
      if (sequence) {
        sequence.push({ scenarioId, steps });
      } else {
        sequences.set(platformId, [{ scenarioId, steps }]);
      }
    }
  }
  return sequences;
}
