/**
 * Value parsers for text ranges. A parser receives the complete text of
 * the range and throws when it is not a valid value; it never trims.
 */

export type ValueParser<T> = (text: string) => T;

const INTEGER_RE = /^[+-]?\d+$/;
const UNSIGNED_RE = /^\+?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;

export const integer: ValueParser<number> = (text) => {
  if (!INTEGER_RE.test(text)) {
    throw new Error(`invalid digit found in "${text}"`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`number too large to fit in a safe integer: "${text}"`);
  }
  // Normalize "-0" so equality checks behave.
  return value === 0 ? 0 : value;
};

export const unsignedInteger: ValueParser<number> = (text) => {
  if (!UNSIGNED_RE.test(text)) {
    throw new Error(`invalid digit found in "${text}"`);
  }
  return integer(text);
};

export const bigInteger: ValueParser<bigint> = (text) => {
  if (!INTEGER_RE.test(text)) {
    throw new Error(`invalid digit found in "${text}"`);
  }
  return BigInt(text);
};

export const float: ValueParser<number> = (text) => {
  const special = FLOAT_SPECIAL_RE.exec(text);
  if (special) {
    if (special[2].toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!FLOAT_RE.test(text)) {
    throw new Error(`invalid float literal "${text}"`);
  }
  return Number(text);
};

export const boolean: ValueParser<boolean> = (text) => {
  if (text === "true") return true;
  if (text === "false") return false;
  throw new Error(`provided string was not \`true\` or \`false\`: "${text}"`);
};

export const text: ValueParser<string> = (value) => value;
