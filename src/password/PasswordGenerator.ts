import { VAULT_CONSTANTS } from "../constants";
import { defaultRandomSource, type RandomSource } from "../crypto/RandomSource";
import { ValidationError } from "../errors";

export interface GeneratorOptions {
  length?: number;
  upper?: boolean;
  lower?: boolean;
  digits?: boolean;
  symbols?: boolean;
  /** Drop look-alike characters (`il1Lo0O`). */
  excludeSimilar?: boolean;
}

const G = VAULT_CONSTANTS.GENERATOR;

export function characterPool(opts: GeneratorOptions): string {
  let pool = "";
  if (opts.upper) pool += G.UPPER;
  if (opts.lower) pool += G.LOWER;
  if (opts.digits) pool += G.DIGITS;
  if (opts.symbols) pool += G.SYMBOLS;
  if (opts.excludeSimilar) {
    pool = [...pool].filter((c) => !G.SIMILAR.includes(c)).join("");
  }
  return pool;
}

/**
 * Random password drawn uniformly, per character, from the enabled classes.
 * Every class being present in the output is likely but not guaranteed.
 */
export function generatePassword(
  opts: GeneratorOptions,
  random: RandomSource = defaultRandomSource
): string {
  const length = opts.length ?? G.DEFAULT_LENGTH;
  if (!Number.isInteger(length) || length < 1 || length > G.MAX_LENGTH) {
    throw new ValidationError(`length must be an integer in [1, ${G.MAX_LENGTH}]`);
  }
  const pool = characterPool(opts);
  if (pool.length === 0) {
    throw new ValidationError("At least one character class must be enabled");
  }
  let out = "";
  for (let i = 0; i < length; i++) out += pool[random.uniformInt(pool.length)];
  return out;
}
