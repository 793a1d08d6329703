export function pickOne<T>(items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('pickOne needs at least one item');
  }
  return items[Math.floor(Math.random() * items.length)];
}
