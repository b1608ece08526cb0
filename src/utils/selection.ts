/**
 * Parsing of numbered-list answers such as `1,3-5` or `all`.
 */

export interface ParsedSelection {
  /** 1-based positions, ascending, without duplicates */
  indices: number[];
  /** Parts that were neither a number nor a range */
  ignored: string[];
}

const NUMBER = /^\d+$/;

/**
 * Parse a selection against a list of `max` items.
 * Numbers and ranges outside 1..max are dropped silently; malformed parts
 * are collected in `ignored`.
 */
export function parseSelection(input: string, max: number): ParsedSelection {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === 'all') {
    return { indices: Array.from({ length: max }, (_, i) => i + 1), ignored: [] };
  }

  const selected = new Set<number>();
  const ignored: string[] = [];

  for (const rawPart of trimmed.split(',')) {
    const part = rawPart.trim();
    if (part === '') continue;

    if (part.includes('-')) {
      const bounds = part.split('-').map(bound => bound.trim());
      if (bounds.length !== 2 || !bounds.every(bound => NUMBER.test(bound))) {
        ignored.push(part);
        continue;
      }
      const start = Number(bounds[0]);
      const end = Number(bounds[1]);
      if (start >= 1 && start <= end && end <= max) {
        for (let i = start; i <= end; i++) selected.add(i);
      }
      continue;
    }

    if (!NUMBER.test(part)) {
      ignored.push(part);
      continue;
    }
    const value = Number(part);
    if (value >= 1 && value <= max) selected.add(value);
  }

  return { indices: Array.from(selected).sort((a, b) => a - b), ignored };
}
