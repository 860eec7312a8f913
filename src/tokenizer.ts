const ASCII_PUNCTUATION_RE = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;
const NON_WORD_RE = /[^\p{L}\p{M}\p{N}\p{Pc}]+/u;

export function stripPunctuation(text: string): string {
  return text.replace(ASCII_PUNCTUATION_RE, " ");
}

export function tokenize(text: string): string[] {
  const cleaned = stripPunctuation(text).toLowerCase().trim();
  if (!cleaned) return [];
  return cleaned.split(NON_WORD_RE).filter((token) => token.length > 0);
}
