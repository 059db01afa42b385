/**
 * @fileoverview Past-tense heuristic for domain event names
 *
 * A word counts as past tense when it ends in "-ed" or appears in the
 * irregular allow-list. This is morphology only: "Seed" passes and
 * "Began" needs the list.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Errors } from '../core/errors.js';

const IRREGULAR_LIST_URL = new URL('../../data/irregular_past_tense.json', import.meta.url);

const IrregularListSchema = z.object({
  description: z.string().optional(),
  words: z.array(z.string().min(1)),
});

let cachedIrregulars: ReadonlySet<string> | null = null;

export function loadIrregularPastTense(): ReadonlySet<string> {
  if (cachedIrregulars) return cachedIrregulars;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(IRREGULAR_LIST_URL, 'utf-8'));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw Errors.config('irregularPastTense', `cannot read built-in word list: ${message}`);
  }
  const parsed = IrregularListSchema.safeParse(raw);
  if (!parsed.success) {
    throw Errors.config('irregularPastTense', 'built-in word list is malformed');
  }
  cachedIrregulars = new Set(parsed.data.words.map((word) => word.toLowerCase()));
  return cachedIrregulars;
}

/**
 * Split a PascalCase or camelCase identifier into words.
 * `HTTPRequestSent` -> `['HTTP', 'Request', 'Sent']`
 */
export function splitIdentifier(name: string): string[] {
  return name.match(/[A-Z]+(?![a-z])|[A-Z]?[a-z0-9]+/g) ?? [];
}

/** Drops a trailing `Event` so `OrderPlacedEvent` is judged on `Placed`. */
export function eventBaseName(name: string): string {
  return name.length > 'Event'.length && name.endsWith('Event') ? name.slice(0, -'Event'.length) : name;
}

export function createPastTenseCheck(extraWords: readonly string[] = []): (word: string) => boolean {
  const irregulars = new Set(loadIrregularPastTense());
  for (const word of extraWords) {
    irregulars.add(word.toLowerCase());
  }
  return (word: string): boolean => {
    const lower = word.toLowerCase();
    return (lower.length > 2 && lower.endsWith('ed')) || irregulars.has(lower);
  };
}
