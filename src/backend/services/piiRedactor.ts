/**
 * PII Redactor
 *
 * Replaces personal data in user messages with entity placeholders such as
 * `<EMAIL_ADDRESS>` before the message is stored or sent to the model.
 * Detection is pattern based: email addresses, card numbers (Luhn checked)
 * and phone numbers.
 */

export interface IRedactor {
  redact(text: string): string;
}

export interface PiiPattern {
  /** Placeholder name, rendered as `<ENTITY>` */
  entity: string;
  /** Must carry the global flag */
  pattern: RegExp;
  /** Rejects a match that only looks like the entity */
  accept?: (match: string) => boolean;
}

export function passesLuhn(digits: string): boolean {
  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;
    if (double) {
      digit *= 2;
      if (digit > 9) {
        digit -= 9;
      }
    }
    sum += digit;
    double = !double;
  }
  return sum % 10 === 0;
}

// Applied in order: cards go before phones so a card is never half-matched
// as a phone number.
export const DEFAULT_PII_PATTERNS: readonly PiiPattern[] = [
  {
    entity: 'EMAIL_ADDRESS',
    pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
  },
  {
    entity: 'CREDIT_CARD',
    pattern: /\b(?:\d[ -]?){12,18}\d\b/g,
    accept: (match) => passesLuhn(match.replace(/[ -]/g, '')),
  },
  {
    entity: 'PHONE_NUMBER',
    pattern: /(?:\+\d{1,3}[ .-]?)?(?:\(\d{3}\)|\b\d{3})[ .-]?\d{3}[ .-]?\d{4}\b/g,
  },
];

export class PatternRedactor implements IRedactor {
  constructor(private readonly patterns: readonly PiiPattern[] = DEFAULT_PII_PATTERNS) {}

  redact(text: string): string {
    return this.patterns.reduce(
      (current, { entity, pattern, accept }) =>
        current.replace(pattern, (match) =>
          accept && !accept(match) ? match : `<${entity}>`
        ),
      text
    );
  }
}

/** Leaves text untouched; used when redaction is switched off */
export const passthroughRedactor: IRedactor = {
  redact: (text) => text,
};

export function createRedactor(enabled = true): IRedactor {
  return enabled ? new PatternRedactor() : passthroughRedactor;
}
