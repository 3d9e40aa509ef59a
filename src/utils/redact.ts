const PII_PATTERNS: Array<[RegExp, string]> = [
  [/[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g, '[EMAIL_REDACTED]'],
  [/\b(?:\d[ -]?){13,16}\b/g, '[CC_REDACTED]'],
  [/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN_REDACTED]'],
  [/(?:\+?\d{1,2}[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}\b/g, '[PHONE_REDACTED]'],
];

/** Masks email, card, SSN and phone shapes in free-text diagnostics. */
export function redactPii(text: string): string {
  return PII_PATTERNS.reduce((current, [pattern, label]) => current.replace(pattern, label), text);
}
