import { RandomSource } from '@rng/domain/RandomSource';

const HEX_ALPHABET = '0123456789abcdef';
const HASH_LENGTH = 64;

export const HASH_PATTERN = /^0x[0-9a-f]{64}$/;

export class HashSampler {
  constructor(private readonly random: RandomSource) {}

  sample(): string {
    let hex = '';
    for (let i = 0; i < HASH_LENGTH; i++) {
      hex += HEX_ALPHABET[Math.floor(this.random.next() * HEX_ALPHABET.length)];
    }
    return `0x${hex}`;
  }
}
