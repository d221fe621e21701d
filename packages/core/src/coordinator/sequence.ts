/** Monotonic id source. Ids are never reused within one sequence. */
export interface Sequence {
  next(): number;
  peek(): number;
}

export function createSequence(start = 1): Sequence {
  let current = start;
  return {
    next: () => current++,
    peek: () => current,
  };
}
