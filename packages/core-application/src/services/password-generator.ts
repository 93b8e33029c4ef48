import { randomInt } from "node:crypto";

const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWER = "abcdefghijklmnopqrstuvwxyz";
const DIGITS = "0123456789";
const PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

export const DEFAULT_PASSWORD_LENGTH = 16;

export type PasswordOptions = {
  length?: number;
  upper?: boolean;
  lower?: boolean;
  digits?: boolean;
  punctuation?: boolean;
};

/** Characters the options allow; lower-case letters when every class is off. */
export function passwordAlphabet(options: PasswordOptions = {}): string {
  let alphabet = "";
  if (options.upper ?? true) alphabet += UPPER;
  if (options.lower ?? true) alphabet += LOWER;
  if (options.digits ?? true) alphabet += DIGITS;
  if (options.punctuation ?? true) alphabet += PUNCTUATION;

  return alphabet.length > 0 ? alphabet : LOWER;
}

export function generatePassword(
  options: PasswordOptions = {},
  pick: (max: number) => number = randomInt
): string {
  const length = options.length ?? DEFAULT_PASSWORD_LENGTH;
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Password length must be a positive integer, got ${length}`);
  }

  const alphabet = passwordAlphabet(options);
  let out = "";
  for (let i = 0; i < length; i += 1) {
    out += alphabet[pick(alphabet.length)];
  }
  return out;
}
