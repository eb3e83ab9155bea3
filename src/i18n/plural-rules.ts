/**
 * Plural Rules
 *
 * A plural rule maps a count and a time unit to the key of the form to
 * use in a language table. Tables refer to rules by id.
 *
 * @module i18n/plural-rules
 */

export const TIME_UNITS = ['second', 'minute', 'hour', 'day'] as const;

export type TimeUnitName = (typeof TIME_UNITS)[number];

export interface PluralRule {
  readonly id: string;
  formKey(count: number, unit: TimeUnitName): string;
}

/** `second` for exactly 1, `seconds` otherwise. */
export const defaultPluralRule: PluralRule = {
  id: 'default',
  formKey: (count, unit) => (count === 1 ? unit : `${unit}s`),
};

/**
 * 1, 21, 31 -> `second`; 2-4, 22-24 -> `second_few`; everything else,
 * including 11-14, -> `seconds`.
 */
export const eastSlavicPluralRule: PluralRule = {
  id: 'east-slavic',
  formKey(count, unit) {
    const mod10 = count % 10;
    const mod100 = count % 100;
    if (mod10 === 1 && mod100 !== 11) {
      return unit;
    }
    if (mod10 >= 2 && mod10 <= 4 && (mod100 < 10 || mod100 >= 20)) {
      return `${unit}_few`;
    }
    return `${unit}s`;
  },
};

/**
 * 1 and 2 -> `second`; 3-10 -> `seconds`; 0 and 11+ -> `seconds_many`.
 * The dual is folded into the singular.
 */
export const arabicPluralRule: PluralRule = {
  id: 'arabic',
  formKey(count, unit) {
    if (count === 1 || count === 2) {
      return unit;
    }
    if (count >= 3 && count <= 10) {
      return `${unit}s`;
    }
    return `${unit}s_many`;
  },
};

/** Languages without grammatical number; always the `seconds` key. */
export const invariantPluralRule: PluralRule = {
  id: 'invariant',
  formKey: (_count, unit) => `${unit}s`,
};

export const PLURAL_RULES: Readonly<Record<string, PluralRule>> = Object.freeze({
  [defaultPluralRule.id]: defaultPluralRule,
  [eastSlavicPluralRule.id]: eastSlavicPluralRule,
  [arabicPluralRule.id]: arabicPluralRule,
  [invariantPluralRule.id]: invariantPluralRule,
});

export function findPluralRule(id: string): PluralRule | undefined {
  return Object.prototype.hasOwnProperty.call(PLURAL_RULES, id) ? PLURAL_RULES[id] : undefined;
}
