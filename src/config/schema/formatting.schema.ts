/**
 * Formatting Config Schema
 *
 * Defaults used by humanize()/toString() when the caller passes no
 * precision or delimiter.
 *
 * @module config/schema/formatting
 */

export interface FormattingConfigSchema {
  /** Decimal places kept when humanizing (half away from zero) */
  precision: number;
  /** Text placed between the number and the unit symbol */
  delimiter: string;
}

export const DEFAULT_FORMATTING_CONFIG: FormattingConfigSchema = {
  precision: 2,
  delimiter: ' ',
};
