import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { pick, randomInt } from './random.js';
import type { Rng } from './random.js';

const wordListsSchema = z.object({
  buzzwords: z.array(z.string().min(1)).min(1),
  surnames: z.array(z.string().min(1)).min(1),
});

export type WordLists = z.infer<typeof wordListsSchema>;

const WORD_LISTS_URL = new URL('../../../data/wordlists.json', import.meta.url);

let cached: WordLists | null = null;

/** Loads and validates `data/wordlists.json` once per process. */
export function loadWordLists(): WordLists {
  if (cached === null) {
    const raw: unknown = JSON.parse(readFileSync(WORD_LISTS_URL, 'utf-8'));
    cached = wordListsSchema.parse(raw);
  }
  return cached;
}

export function ipv4Address(rng: Rng): string {
  return [0, 1, 2, 3].map(() => randomInt(rng, 1, 255)).join('.');
}

/** e.g. `cronin4821` */
export function username(rng: Rng, words: WordLists = loadWordLists()): string {
  return `${pick(rng, words.surnames)}${randomInt(rng, 1000, 10000)}`;
}

export function buzzword(rng: Rng, words: WordLists = loadWordLists()): string {
  return pick(rng, words.buzzwords);
}

const CARD_PREFIXES = ['4', '51', '52', '53', '54', '55'] as const;
const CARD_LENGTH = 16;

/** Luhn check digit for a string of digits that does not yet carry one. */
export function luhnCheckDigit(partial: string): number {
  let sum = 0;
  for (let i = 0; i < partial.length; i++) {
    // Rightmost payload digit is doubled once the check digit is appended.
    let d = Number(partial[partial.length - 1 - i]);
    if (i % 2 === 0) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
  }
  return (10 - (sum % 10)) % 10;
}

export function isLuhnValid(digits: string): boolean {
  if (!/^\d+$/.test(digits)) return false;
  return luhnCheckDigit(digits.slice(0, -1)) === Number(digits.slice(-1));
}

/** 16-digit Visa/Mastercard-shaped number with a valid check digit. */
export function creditCardNumber(rng: Rng): string {
  let digits: string = pick(rng, CARD_PREFIXES);
  while (digits.length < CARD_LENGTH - 1) {
    digits += String(randomInt(rng, 0, 10));
  }
  return digits + String(luhnCheckDigit(digits));
}
