/**
 * Randomized cross-check: every realization must agree on every generated pair.
 */

import { InvalidOptionError } from '../errors.js';
import { MATCH_ANY, MATCH_ONE, REALIZATIONS, REALIZATION_NAMES } from '../matcher/index.js';
import type { Realization } from '../matcher/types.js';
import type { ContextLogger } from '../observability/context-logger.js';
import type { Divergence, FuzzReport } from './types.js';

export interface FuzzOptions {
  iterations: number;
  maxLength?: number;
  alphabet?: string;
  seed?: number;
  realizations?: readonly Realization[];
  logger?: ContextLogger;
}

export type Random = () => number;

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: Random, maxInclusive: number): number {
  return Math.floor(random() * (maxInclusive + 1));
}

export function randomString(random: Random, alphabet: readonly string[], length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet[randomInt(random, alphabet.length - 1)];
  }
  return out;
}

/** A subject the pattern is likely to match: wildcards filled with random literals. */
export function subjectFromPattern(random: Random, pattern: string, literals: readonly string[]): string {
  let out = '';
  for (const ch of pattern) {
    if (ch === MATCH_ANY) {
      out += randomString(random, literals, randomInt(random, 3));
    } else if (ch === MATCH_ONE) {
      out += randomString(random, literals, 1);
    } else {
      out += ch;
    }
  }
  return out;
}

function requireNonNegativeInteger(value: number, option: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidOptionError(option, `expected an integer >= 0, got ${value}`);
  }
  return value;
}

export function crossCheck(options: FuzzOptions): FuzzReport {
  const iterations = requireNonNegativeInteger(options.iterations, 'fuzz.iterations');
  const maxLength = requireNonNegativeInteger(options.maxLength ?? 60, 'fuzz.max_length');
  const seed = options.seed ?? 1;
  const alphabet = Array.from(options.alphabet ?? 'abc*?');
  if (alphabet.length === 0) {
    throw new InvalidOptionError('fuzz.alphabet', 'must not be empty');
  }
  const literals = alphabet.filter((ch) => ch !== MATCH_ANY && ch !== MATCH_ONE);
  const fillers = literals.length > 0 ? literals : alphabet;
  const realizations = options.realizations ?? REALIZATION_NAMES;

  const random = createRandom(seed);
  const divergences: Divergence[] = [];
  let matched = 0;

  for (let i = 0; i < iterations; i++) {
    const pattern = randomString(random, alphabet, randomInt(random, maxLength));
    const subject = random() < 0.5
      ? subjectFromPattern(random, pattern, fillers).slice(0, maxLength)
      : randomString(random, alphabet, randomInt(random, maxLength));

    const results: Partial<Record<Realization, boolean>> = {};
    const seen = new Set<boolean>();
    for (const realization of realizations) {
      const result = REALIZATIONS[realization](pattern, subject);
      results[realization] = result;
      seen.add(result);
    }

    if (seen.size > 1) {
      divergences.push({ pattern, subject, results });
      options.logger?.error('Realizations disagree', { pattern, subject, ...results });
    } else if (seen.has(true)) {
      matched++;
    }
  }

  options.logger?.debug('Fuzz cross-check finished', {
    iterations,
    seed,
    matched,
    divergences: divergences.length,
  });

  return { iterations, seed, matched, divergences };
}
