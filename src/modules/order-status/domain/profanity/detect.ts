import { foldDiacritics } from '@/common/utils/string.utils';
import { PROHIBITED_WORDS } from './prohibited-words';

const PROHIBITED_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}])(${[...PROHIBITED_WORDS]
    .sort((a, b) => b.length - a.length)
    .map((word) => word.replace(/\s+/g, '\\s+'))
    .join('|')})(?![\\p{L}\\p{N}])`,
  'u',
);

/**
 * True when the text contains a prohibited word as a whole word, ignoring case
 * and accents ("Cabrón" matches, "computadora" does not).
 */
export function containsProfanity(text: string): boolean {
  return PROHIBITED_PATTERN.test(foldDiacritics(text));
}
