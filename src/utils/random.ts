import { randomBytes } from 'crypto';

// Returns `size` bytes. Swapped out in tests to pin nonces.
export type RandomSource = (size: number) => Buffer;

export const secureRandom: RandomSource = (size) => randomBytes(size);
