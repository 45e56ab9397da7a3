/**
 * Yields every `size`-element combination of `items` in lexicographic order of
 * positions, lazily. Each yielded array is fresh.
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  const n = items.length;
  if (size < 0 || size > n) return;

  const indices = Array.from({ length: size }, (_, i) => i);
  for (;;) {
    yield indices.map(i => items[i]).filter((item): item is T => item !== undefined);

    // rightmost position that can still move
    let i = size - 1;
    while (i >= 0 && indices[i] === i + n - size) i--;
    if (i < 0) return;

    indices[i] = (indices[i] ?? 0) + 1;
    for (let j = i + 1; j < size; j++) {
      indices[j] = (indices[j - 1] ?? 0) + 1;
    }
  }
}
