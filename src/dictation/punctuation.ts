const PUNCTUATION = /\p{P}/gu;

export function stripPunctuation(text: string): string {
  return text.replace(PUNCTUATION, '');
}
