/**
 * Navigation over a flow's step tree.
 *
 * A pointer alternates positions and branch indexes:
 * `[2]` is top-level step 2, `[2, 1, 0]` is the first step of branch 1 of
 * the decision at step 2, and `[2, -1, 3]` is step 3 of its `otherwise`.
 * `[steps.length]` marks the end of the flow.
 */

import type { Step } from '../types/flow';
import { OTHERWISE_BRANCH, type StepPointer } from '../types/instance';

export const START: StepPointer = [0];

/** Steps of the sequence that contains `pointer`'s last position */
function sequenceAt(steps: readonly Step[], pointer: StepPointer): readonly Step[] | undefined {
  let sequence = steps;
  for (let i = 0; i < pointer.length - 1; i += 2) {
    const step = sequence[pointer[i]];
    if (!step || step.type !== 'decision') return undefined;
    const branch = pointer[i + 1];
    const next = branch === OTHERWISE_BRANCH ? step.otherwise : step.branches[branch]?.steps;
    if (!next) return undefined;
    sequence = next;
  }
  return sequence;
}

export function stepAt(steps: readonly Step[], pointer: StepPointer): Step | undefined {
  if (pointer.length % 2 === 0) return undefined;
  return sequenceAt(steps, pointer)?.[pointer[pointer.length - 1]];
}

export function isEnd(steps: readonly Step[], pointer: StepPointer): boolean {
  return pointer.length === 1 && pointer[0] >= steps.length;
}

/**
 * Move a pointer off the end of exhausted sequences: the end of a branch
 * continues after its decision.
 */
export function normalize(steps: readonly Step[], pointer: StepPointer): StepPointer {
  let current = [...pointer];
  while (current.length > 1) {
    const sequence = sequenceAt(steps, current);
    if (sequence && current[current.length - 1] < sequence.length) break;
    current = current.slice(0, -2);
    current[current.length - 1] += 1;
  }
  return current;
}

/** Pointer after the step at `pointer` */
export function nextPointer(steps: readonly Step[], pointer: StepPointer): StepPointer {
  const moved = [...pointer];
  moved[moved.length - 1] += 1;
  return normalize(steps, moved);
}

/** Pointer to the first step of a branch of the decision at `pointer` */
export function enterBranch(steps: readonly Step[], pointer: StepPointer, branch: number): StepPointer {
  return normalize(steps, [...pointer, branch, 0]);
}

/** Lexicographic order; used to check the pointer only moves forward */
export function comparePointers(a: StepPointer, b: StepPointer): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) {
      // An `otherwise` branch sorts after every numbered branch
      const left = i % 2 === 1 && a[i] === OTHERWISE_BRANCH ? Number.MAX_SAFE_INTEGER : a[i];
      const right = i % 2 === 1 && b[i] === OTHERWISE_BRANCH ? Number.MAX_SAFE_INTEGER : b[i];
      return left - right;
    }
  }
  return a.length - b.length;
}

export function formatPointer(pointer: StepPointer): string {
  return pointer.map(p => (p === OTHERWISE_BRANCH ? 'else' : String(p))).join('.');
}
