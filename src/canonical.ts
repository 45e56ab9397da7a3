import { invalidType, ok, type Result } from "./result";
import { baseLetter, NEGATION, parseTerm, sortLiterals } from "./term";

/** Variable letters in code-point order: `A`–`Z` then `a`–`z`. */
export const ALPHABET = [
  ..."ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  ..."abcdefghijklmnopqrstuvwxyz",
];

export type CanonicalOptions = {
  /** `A` is the high-order bit of a minterm index (default) or the low-order one. */
  highOrderFirst?: boolean;
  /** Prepend `f(<value>) = `. */
  includePrefix?: boolean;
};

export type ExpandOptions = {
  /** Add every letter between the smallest and largest letter used. */
  expandMissingLetters?: boolean;
};

export function toNonNegativeInteger(value: unknown): bigint | null {
  if (typeof value === "bigint") return value >= 0n ? value : null;
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  return null;
}

/** `"010"` → `"A'BC'"`, reading the bits from the other end when `highOrderFirst` is false. */
export function mintermFromBits(bits: string, highOrderFirst = true): string {
  const ordered = highOrderFirst ? [...bits] : [...bits].reverse();
  return ordered.map((bit, i) => (ALPHABET[i] ?? "") + (bit === "0" ? NEGATION : "")).join("");
}

function reverseSorted(terms: Iterable<string>): string[] {
  return [...terms].sort().reverse();
}

/**
 * Canonical DNF of the truth table whose rows are the set bits of `value`.
 * The variable count is the bit length of the highest row index, at least 2.
 */
export function canonical(value: number | bigint, options: CanonicalOptions = {}): Result<string> {
  const { highOrderFirst = true, includePrefix = false } = options;
  const n = toNonNegativeInteger(value);
  if (n === null) {
    return invalidType(value, "canonical() requires a non-negative integer");
  }

  const rows = [...n.toString(2)].reverse();
  const letters = Math.max(2, (rows.length - 1).toString(2).length);
  if (letters > ALPHABET.length) {
    return invalidType(value, `canonical() supports at most ${ALPHABET.length} variables`);
  }

  const minterms: string[] = [];
  rows.forEach((bit, index) => {
    if (bit === "1") {
      minterms.push(mintermFromBits(index.toString(2).padStart(letters, "0"), highOrderFirst));
    }
  });

  const result = reverseSorted(minterms).join(" + ");
  return ok(includePrefix ? `f(${n}) = ${result}` : result);
}

/** Minterm strings for truth-table row indices, sized to the largest index. */
export function mintermsFromIndices(indices: readonly bigint[], highOrderFirst = true): Result<string[]> {
  const largest = indices.reduce((max, index) => index > max ? index : max, 0n);
  const letters = largest.toString(2).length;
  if (letters > ALPHABET.length) {
    return invalidType(indices, `at most ${ALPHABET.length} variables are supported`);
  }
  return ok(reverseSorted(indices.map(index =>
    mintermFromBits(index.toString(2).padStart(letters, "0"), highOrderFirst))));
}

function product(choices: readonly (readonly string[])[]): string[][] {
  return choices.reduce<string[][]>(
    (acc, options) => acc.flatMap(prefix => options.map(option => [...prefix, option])),
    [[]]);
}

function letterRange(letters: readonly string[]): string[] {
  const codes = letters.map(letter => letter.charCodeAt(0));
  const first = Math.min(...codes);
  const last = Math.max(...codes);
  const result: string[] = [];
  for (let code = first; code <= last; code++) {
    const letter = String.fromCharCode(code);
    if (ALPHABET.includes(letter)) result.push(letter);
  }
  return result;
}

/**
 * Expands a sum of products into one canonical form of the same function by
 * adding both polarities of every letter a term lacks. With
 * `expandMissingLetters` a range like `A..I` holds 9 letters, so the output
 * can grow exponentially.
 */
export function toCanonicalForm(
  expression: string | readonly string[],
  options: ExpandOptions = {},
): Result<string> {
  let terms: readonly string[];
  if (typeof expression === "string") {
    if (expression.trim() === "1") return ok("1");
    terms = expression.split(/[^A-Za-z']+/);
  } else if (Array.isArray(expression) && expression.every(term => typeof term === "string")) {
    if (expression.length === 1 && expression[0] === "1") return ok("1");
    terms = expression;
  } else {
    return invalidType(expression, "expected a string or a list of term strings");
  }

  const parsed: string[][] = [];
  for (const term of terms) {
    if (term === "" || term === "0") continue;
    const literals = parseTerm(term);
    if (!literals.ok) return literals;
    parsed.push(literals.out);
  }

  const used = [...new Set(parsed.flat().map(baseLetter))];
  const letters = options.expandMissingLetters && used.length > 0 ? letterRange(used) : used;

  const expanded = new Set<string>();
  for (const literals of parsed) {
    const present = new Set(literals.map(baseLetter));
    const missing = letters.filter(letter => !present.has(letter)).sort();
    for (const fill of product(missing.map(letter => [letter, letter + NEGATION]))) {
      expanded.add(sortLiterals([...literals, ...fill]).join(""));
    }
  }

  return ok(reverseSorted(expanded).join(" + "));
}
