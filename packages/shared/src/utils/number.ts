/**
 * Formats a coordinate as a float literal: the shortest decimal that reads
 * back to the same value, with `.0` appended when it would otherwise look
 * like an integer.
 */
export const formatFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite value ${value} as a float literal.`);
  }

  if (Object.is(value, -0)) {
    return "-0.0";
  }

  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
};
