export interface IndexRange {
  start: number;
  end: number;
}

/**
 * Half-open range `[start, min(end ?? length, length))`. An empty range is
 * returned as `start === end` when `start` is past the clamp.
 */
export function resolveRange(
  length: number,
  start: number,
  end?: number,
): IndexRange {
  const clampedEnd = Math.min(end ?? length, length);
  return { start, end: Math.max(start, clampedEnd) };
}

export function* rangeIndices({ start, end }: IndexRange): Generator<number> {
  for (let index = start; index < end; index++) {
    yield index;
  }
}
