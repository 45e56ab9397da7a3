import { invalidTerm, ok, type Result } from "./result";

/** Set only on terms that end up in the final cover. */
export type Disposition = "required" | "added";

/**
 * One product term of a minimization run. Records live in an arena (a plain
 * array) indexed by `row`; updates replace the slot instead of mutating it.
 */
export type Term = {
  readonly literals: ReadonlySet<string>;
  /** Consumed by a merge into the next generation. */
  readonly covered: boolean;
  /** Number of un-negated letters; terms merge only across adjacent counts. */
  readonly literalCount: number;
  /** Sorted generation-1 rows this term was built from. */
  readonly provenance: readonly number[];
  readonly generation: number;
  readonly disposition: Disposition | null;
  /** Generation 1 only: `1` per positive and `0` per negated literal, in literal order. */
  readonly binary: string | null;
  readonly row: number;
  readonly dontCare: boolean;
};

const LITERAL = /[A-Za-z]'?/g;
const TERM = /^(?:[A-Za-z]'?)*$/;

export const NEGATION = "'";

export function baseLetter(literal: string): string {
  return literal.endsWith(NEGATION) ? literal.slice(0, -1) : literal;
}

export function isNegated(literal: string): boolean {
  return literal.endsWith(NEGATION);
}

export function splitLiterals(term: string): string[] {
  return term.match(LITERAL) ?? [];
}

/** Code-point order, so `A'` sorts before `B` and upper case before lower case. */
export function sortLiterals(literals: Iterable<string>): string[] {
  return [...literals].sort();
}

export function countPositive(literals: Iterable<string>): number {
  let count = 0;
  for (const literal of literals) {
    if (!isNegated(literal)) count++;
  }
  return count;
}

export function renderTerm(term: Pick<Term, "literals">): string {
  return sortLiterals(term.literals).join("");
}

export function toBinary(literals: Iterable<string>): string {
  return sortLiterals(literals).map(literal => isNegated(literal) ? "0" : "1").join("");
}

/** Letters of a term without polarity, sorted. Terms of one function share it. */
export function letterSignature(term: string): string {
  return splitLiterals(term).map(baseLetter).sort().join("");
}

export function parseTerm(term: string): Result<string[]> {
  if (!TERM.test(term)) {
    return invalidTerm(term, `term "${term}" must be letters, each optionally followed by a single '`);
  }
  const literals = splitLiterals(term);
  const letters = new Set(literals.map(baseLetter));
  if (letters.size !== literals.length) {
    return invalidTerm(term, `term "${term}" repeats a letter`);
  }
  return ok(literals);
}

export function sameLiterals(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && [...a].every(literal => b.has(literal));
}
