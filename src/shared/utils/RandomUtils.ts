import seedrandom from "seedrandom";

/**
 * Shared utility for random number generation.
 * Backed by a seedable PRNG so world generation and ids can be reproduced.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom();

  /**
   * Reseeds the shared generator. Passing no seed restores an auto-seeded one.
   */
  public static setSeed(seed?: string): void {
    RandomUtils.rng = seed === undefined ? seedrandom() : seedrandom(seed);
  }

  /**
   * Creates an independent generator, leaving the shared one untouched.
   */
  public static createRng(seed: string): seedrandom.PRNG {
    return seedrandom(seed);
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return RandomUtils.rng();
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public static intRange(min: number, max: number): number {
    return Math.floor(RandomUtils.rng() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public static chance(probability: number): boolean {
    return RandomUtils.rng() < probability;
  }

  /**
   * Short base-36 identifier with the given prefix.
   */
  public static id(prefix: string): string {
    return `${prefix}-${RandomUtils.rng().toString(36).substring(2, 9)}`;
  }
}
