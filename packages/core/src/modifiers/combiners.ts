/**
 * Folds the next modifier amount of a priority group into the group total.
 * The fold starts from `0`.
 */
export type StackCombiner = (total: number, next: number) => number;

/**
 * Combines the running amount with a priority group's stacked total.
 */
export type FinalCombiner = (current: number, stackTotal: number) => number;

export const stackCombiners = Object.freeze({
  sum: ((total, next) => total + next) satisfies StackCombiner,
  /** Strongest contribution wins. Since the fold starts at `0`, negative amounts collapse to `0`. */
  highest: ((total, next) => Math.max(total, next)) satisfies StackCombiner,
});

export const finalCombiners = Object.freeze({
  add: ((current, stackTotal) => current + stackTotal) satisfies FinalCombiner,
  multiply: ((current, stackTotal) => current * stackTotal) satisfies FinalCombiner,
  /** `0.25` stacked means +25%. */
  percent: ((current, stackTotal) => current * (1 + stackTotal)) satisfies FinalCombiner,
  override: ((_current, stackTotal) => stackTotal) satisfies FinalCombiner,
});

export type StackCombinerName = keyof typeof stackCombiners;
export type FinalCombinerName = keyof typeof finalCombiners;
