import { Effect, Option } from 'effect';
import type { Queryable } from '../Document/Document.js';
import { FieldNotFoundError, MalformedNumberError } from '../errors.js';

// Thousands separators the provider renders: comma, no-break space, narrow no-break space
const GROUPING_SEPARATORS = /[,\u00a0\u202f]/g;
const DIGITS = /^\d+$/;

/**
 * Parses an unsigned decimal integer rendered with grouping separators,
 * so "1,234,567" and "1234567" give the same value. Signs, decimals and
 * values beyond `Number.MAX_SAFE_INTEGER` are rejected.
 */
export const parseGroupedInteger = (text: string): Option.Option<number> => {
  const digits = text.trim().replace(GROUPING_SEPARATORS, '');
  if (!DIGITS.test(digits)) {
    return Option.none();
  }
  const value = Number(digits);
  return Number.isSafeInteger(value) ? Option.some(value) : Option.none();
};

/**
 * Trimmed text of the first node matching `selector`.
 * Fails with {@link FieldNotFoundError} when nothing matches or the text is blank.
 */
export const extractText = (
  node: Queryable,
  field: string,
  selector: string
): Effect.Effect<string, FieldNotFoundError> => {
  const text = node.locate(selector).first().text().trim();
  return text === ''
    ? Effect.fail(FieldNotFoundError.create(field, selector))
    : Effect.succeed(text);
};

/**
 * Like {@link extractText}, then parsed with {@link parseGroupedInteger}.
 */
export const extractUnsignedInt = (
  node: Queryable,
  field: string,
  selector: string
): Effect.Effect<number, FieldNotFoundError | MalformedNumberError> =>
  Effect.flatMap(extractText(node, field, selector), (text) =>
    Option.match(parseGroupedInteger(text), {
      onNone: () => Effect.fail(MalformedNumberError.create(field, text)),
      onSome: (value) => Effect.succeed(value),
    })
  );

/**
 * Trimmed text of everything matching `selector` inside a row.
 * Blank cells give an empty string; this never fails.
 */
export const cellText = (row: Queryable, selector: string): string =>
  row.locate(selector).text().trim();
