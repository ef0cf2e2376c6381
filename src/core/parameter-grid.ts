import { ParamGrid, SubmissionError, TaskParams } from '../types';

export function validateParamGrid(grid: unknown): asserts grid is ParamGrid {
  if (grid === null || typeof grid !== 'object' || Array.isArray(grid)) {
    throw new SubmissionError('Parameter grid must be an object of value lists', 'paramGrid');
  }

  for (const [key, values] of Object.entries(grid)) {
    if (!Array.isArray(values)) {
      throw new SubmissionError(`Parameter grid entry "${key}" must be a list of values`, 'paramGrid');
    }
  }
}

/**
 * Cartesian product of the grid. Keys keep insertion order; the last key varies fastest.
 */
export function expandParamGrid(grid: ParamGrid, base: TaskParams = {}): TaskParams[] {
  const keys = Object.keys(grid);
  let combinations: TaskParams[] = [{ ...base }];

  for (const key of keys) {
    const next: TaskParams[] = [];

    for (const combination of combinations) {
      for (const value of grid[key]) {
        next.push({ ...combination, [key]: value });
      }
    }

    combinations = next;
  }

  return combinations;
}

export function countCombinations(grid: ParamGrid): number {
  return Object.values(grid).reduce((count, values) => count * values.length, 1);
}
