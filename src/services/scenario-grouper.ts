import type { ScenarioGroup, TestStep } from '../types';

/**
 * Numeric value of a scenario id: plain digits ("12") or letters followed by
 * digits ("Q001" → 1). Anything else has no numeric form.
 */
export function parseScenarioNumeric(value: string | undefined): number | null {
  if (value === undefined) return null;
  const text = value.trim();
  if (/^[0-9]+$/.test(text)) {
    return parseInt(text, 10);
  }
  const match = /^[A-Za-z]+([0-9]+)$/.exec(text);
  return match ? parseInt(match[1], 10) : null;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Decimal step index; anything else (blank, hex, words) sorts as 0. */
export function parseStepIndex(value: string): number {
  const text = value.trim();
  return DECIMAL_PATTERN.test(text) ? parseFloat(text) : 0;
}

/**
 * Keep the scenario ids inside the inclusive [start, end] window.
 * A missing bound defaults to the first/last id.
 */
export function filterScenarioIds(scenarioIds: string[], start?: string, end?: string): string[] {
  if (start === undefined && end === undefined) {
    return scenarioIds;
  }
  if (scenarioIds.length === 0) {
    return [];
  }
  const lower = start ?? scenarioIds[0];
  const upper = end ?? scenarioIds[scenarioIds.length - 1];
  const lowerNum = parseScenarioNumeric(lower);
  const upperNum = parseScenarioNumeric(upper);

  return scenarioIds.filter((scenarioId) => {
    const scenarioNum = parseScenarioNumeric(scenarioId);
    if ((lowerNum !== null || upperNum !== null) && scenarioNum !== null) {
      if (lowerNum !== null && scenarioNum < lowerNum) return false;
      if (upperNum !== null && scenarioNum > upperNum) return false;
      return true;
    }
    return scenarioId >= lower && scenarioId <= upper;
  });
}

export function filterByPlatform(
  steps: TestStep[],
  include: ReadonlySet<string>,
  exclude: ReadonlySet<string>
): TestStep[] {
  return steps.filter((step) => {
    const platformId = step.platformId.toUpperCase();
    if (include.size > 0 && !include.has(platformId)) return false;
    return !exclude.has(platformId);
  });
}

export function sortedKeys<V>(map: Map<string, V>): string[] {
  return [...map.keys()].sort();
}

export function groupByScenario(steps: TestStep[], start?: string, end?: string): ScenarioGroup {
  const scenarioIds = [...new Set(steps.map((step) => step.scenarioId))].sort();
  const included = new Set(filterScenarioIds(scenarioIds, start, end));

  const group: ScenarioGroup = new Map();
  for (const step of steps) {
    if (!included.has(step.scenarioId)) continue;
    let platforms = group.get(step.scenarioId);
    if (!platforms) {
      platforms = new Map();
      group.set(step.scenarioId, platforms);
    }
    const bucket = platforms.get(step.platformId);
    if (bucket) {
      bucket.push(step);
    } else {
      platforms.set(step.platformId, [step]);
    }
  }

  // Array.prototype.sort is stable, so equal indices keep their input order.
  for (const platforms of group.values()) {
    for (const bucket of platforms.values()) {
      bucket.sort((a, b) => parseStepIndex(a.stepIndex) - parseStepIndex(b.stepIndex));
    }
  }
  return group;
}

/** Scenarios sorted, then platforms sorted, steps in execution order. */
export function flattenScenarios(group: ScenarioGroup): TestStep[] {
  const steps: TestStep[] = [];
  for (const scenarioId of sortedKeys(group)) {
    const platforms = group.get(scenarioId);
    if (!platforms) continue;
    for (const platformId of sortedKeys(platforms)) {
      steps.push(...(platforms.get(platformId) ?? []));
    }
  }
  return steps;
}
