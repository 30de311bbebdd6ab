import type { ConflictSplit, PlacementBasis, ReadySet } from '../types/index.js';
import type { ConflictDetector } from './resources.js';

export interface SplitGroup {
  taskIds: string[];
  basis: PlacementBasis;
  split?: ConflictSplit;
}

/**
 * Split one ready set into conflict-free groups by greedy colouring: each
 * task, in set order, joins the first group holding nothing it conflicts
 * with. Not minimal, but no two conflicting tasks ever share a group.
 */
export function splitReadySet(set: ReadySet, detector: ConflictDetector): SplitGroup[] {
  if (set.taskIds.length < 2) {
    return [{ taskIds: [...set.taskIds], basis: set.basis }];
  }

  const colours: string[][] = [];
  const resources = new Set<string>();

  for (const id of set.taskIds) {
    let placed = false;
    for (const group of colours) {
      const clashes = group.flatMap((other) => detector.sharedResources(id, other));
      if (clashes.length === 0) {
        group.push(id);
        placed = true;
        break;
      }
      clashes.forEach((resource) => resources.add(resource));
    }
    if (!placed) {
      colours.push([id]);
    }
  }

  if (colours.length === 1) {
    return [{ taskIds: colours[0], basis: set.basis }];
  }

  const shared = Array.from(resources).sort();
  return colours.map((taskIds, i) => ({
    taskIds,
    basis: set.basis,
    split: { part: i + 1, parts: colours.length, resources: shared },
  }));
}

export function applyConflictResolution(
  readySets: readonly ReadySet[],
  detector: ConflictDetector
): SplitGroup[] {
  return readySets.flatMap((set) => splitReadySet(set, detector));
}

export function withoutConflictResolution(readySets: readonly ReadySet[]): SplitGroup[] {
  return readySets.map((set) => ({ taskIds: [...set.taskIds], basis: set.basis }));
}
