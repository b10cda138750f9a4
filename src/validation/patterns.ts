export type PIIKind = 'email' | 'phone' | 'ssn';

export interface PIIPattern {
  kind: PIIKind;
  description: string;
  regex: RegExp;
}

export const PII_PATTERNS: readonly PIIPattern[] = [
  {
    kind: 'email',
    description: 'Email address (local@domain.tld)',
    regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/,
  },
  {
    kind: 'phone',
    description: 'Phone number in 3-3-4 digit groups',
    regex: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/,
  },
  {
    kind: 'ssn',
    description: 'Social security number in 3-2-4 digit groups',
    regex: /\b\d{3}-\d{2}-\d{4}\b/,
  },
];

export function findPII(text: string, patterns: readonly PIIPattern[] = PII_PATTERNS): PIIKind[] {
  return patterns.filter(p => p.regex.test(text)).map(p => p.kind);
}
