/** Stored accent-free and lowercase; matched against folded text. */
export const PROHIBITED_WORDS: readonly string[] = [
  'estupido',
  'idiota',
  'imbecil',
  'tonto',
  'pendejo',
  'pendeja',
  'hijo de puta',
  'hija de puta',
  'puta',
  'cabron',
  'cabrona',
];
