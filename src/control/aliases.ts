import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { AliasExhaustedError } from '../shared/errors.js';

export interface AliasWords {
  adjectives: string[];
  nouns: string[];
}

export interface GenerateAliasOptions {
  isTaken?: (alias: string) => boolean | Promise<boolean>;
  random?: () => number;
  words?: AliasWords;
  maxAttempts?: number;
}

const ALIAS_PATTERN = /^[a-z]+(?:-[a-z]+)+$/;
const WORDS_FILE = new URL('../../data/alias-words.json', import.meta.url);

const aliasWordsSchema = z.object({
  adjectives: z.array(z.string().regex(/^[a-z]+$/)).min(2),
  nouns: z.array(z.string().regex(/^[a-z]+$/)).min(1),
});

let cachedWords: AliasWords | undefined;

export const loadAliasWords = (): AliasWords => {
  if (!cachedWords) {
    const raw: unknown = JSON.parse(readFileSync(WORDS_FILE, { encoding: 'utf8' }));
    cachedWords = aliasWordsSchema.parse(raw);
  }
  return cachedWords;
};

export const normalizeAlias = (value: string) => value.trim().toLowerCase();

export const isValidAlias = (value: string) => {
  const normalized = normalizeAlias(value);
  return normalized.length > 0 && normalized.length <= 64 && ALIAS_PATTERN.test(normalized);
};

const pickIndex = (random: () => number, size: number) => Math.min(size - 1, Math.floor(random() * size));

/** One `adjective-adjective-noun` draw; the two adjectives always differ. */
export const drawAlias = (words: AliasWords, random: () => number = Math.random) => {
  const first = pickIndex(random, words.adjectives.length);
  let second = pickIndex(random, words.adjectives.length - 1);
  if (second >= first) second += 1;
  const noun = pickIndex(random, words.nouns.length);
  return `${words.adjectives[first]}-${words.adjectives[second]}-${words.nouns[noun]}`;
};

export const generateAlias = async (options: GenerateAliasOptions = {}): Promise<string> => {
  const words = options.words ?? loadAliasWords();
  const random = options.random ?? Math.random;
  const maxAttempts = options.maxAttempts ?? 50;

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const alias = drawAlias(words, random);
    if (!options.isTaken || !(await options.isTaken(alias))) {
      return alias;
    }
  }

  throw new AliasExhaustedError(maxAttempts);
};
