export const NO_TRANSITION = '✕';
export const DELTA = 'δ';
export const PATH_ARROW = '→';

export const formatState = (state: number) => `q${state}`;

/**
 * Format states as `q1` for a single state and `{q0, q1}` for several.
 * No states at all is an empty string.
 */
export function formatStates(states: Iterable<number>): string {
  const labels = [...states].map(formatState);
  if (labels.length <= 1) {
    return labels.join('');
  }
  return `{${labels.join(', ')}}`;
}

export function formatPath(path: readonly number[]): string {
  return path.map(formatState).join(PATH_ARROW);
}
