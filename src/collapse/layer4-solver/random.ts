/** Uniform source in [0, 1), e.g. an Alea instance. */
export type Rng = () => number;

export function pickRandom<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}
