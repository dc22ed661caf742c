export const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Title-case a phrase: "METFORMIN hcl" -> "Metformin Hcl".
 * Letters following any non-letter start a new word.
 */
export const toTitleCase = (value: string): string =>
  value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) =>
    `${boundary}${letter.toUpperCase()}`,
  );

/**
 * Build a case-insensitive alternation that matches any of the given phrases as
 * whole words, longest phrase first.
 */
export const buildPhraseAlternation = (phrases: string[]): string =>
  phrases
    .slice()
    .sort((a, b) => b.length - a.length)
    .map((phrase) => escapeRegExp(phrase).replace(/ /g, '\\s+'))
    .join('|');
