import { canonical, mintermFromBits, mintermsFromIndices, toNonNegativeInteger } from "./canonical";
import { binaryValue } from "./generation";
import { alphabetMismatch, invalidType, ok, type Result } from "./result";
import { letterSignature, parseTerm, splitLiterals, toBinary } from "./term";

/** Minterm strings such as `"AB'C"`, or truth-table row indices. */
export type TermList = readonly string[] | readonly (number | bigint)[];

export type MinimizeInput =
  | { kind: "integer"; value: number | bigint }
  | { kind: "expression"; expression: string }
  | { kind: "terms"; terms: TermList }
  | { kind: "termsWithDontCares"; terms: TermList; dontCares: TermList };

/** Host values accepted in place of a tagged {@link MinimizeInput}. */
export type RawInput = number | bigint | string | TermList | readonly [TermList, TermList];

export type ResolvedInput = {
  minterms: string[][];
  dontCares: Set<bigint>;
  /** The input is the constant `"1"`; `minterms` is then empty. */
  tautology: boolean;
};

function isTermList(value: unknown): value is TermList {
  if (!Array.isArray(value)) return false;
  const items: unknown[] = value;
  return items.every(item => typeof item === "string")
    || items.every(item => toNonNegativeInteger(item) !== null);
}

function isTagged(raw: object): raw is { kind: unknown } {
  return "kind" in raw;
}

/** Checks an untyped host value and turns it into a {@link MinimizeInput}. */
export function parseInput(raw: unknown): Result<MinimizeInput> {
  if (typeof raw === "number" || typeof raw === "bigint") {
    return toNonNegativeInteger(raw) === null
      ? invalidType(raw, "an integer input must be non-negative")
      : ok<MinimizeInput>({ kind: "integer", value: raw });
  }
  if (typeof raw === "string") {
    return ok<MinimizeInput>({ kind: "expression", expression: raw });
  }
  if (Array.isArray(raw)) {
    const items: unknown[] = raw;
    const [terms, dontCares] = items;
    if (items.length === 2 && Array.isArray(dontCares)) {
      return isTermList(terms) && isTermList(dontCares)
        ? ok<MinimizeInput>({ kind: "termsWithDontCares", terms, dontCares })
        : invalidType(raw, "expected [terms, dontCares] of strings or non-negative integers");
    }
    return isTermList(items)
      ? ok<MinimizeInput>({ kind: "terms", terms: items })
      : invalidType(raw, "a term list must hold only strings or only non-negative integers");
  }
  if (typeof raw === "object" && raw !== null && isTagged(raw)) {
    return parseTagged(raw);
  }
  return invalidType(raw, "unsupported input");
}

function parseTagged(raw: { kind: unknown }): Result<MinimizeInput> {
  const fields: Record<string, unknown> = { ...raw };
  switch (raw.kind) {
    case "integer":
      return parseInput(fields.value);
    case "expression":
      return typeof fields.expression === "string"
        ? ok<MinimizeInput>({ kind: "expression", expression: fields.expression })
        : invalidType(raw, "expression must be a string");
    case "terms":
      return isTermList(fields.terms)
        ? ok<MinimizeInput>({ kind: "terms", terms: fields.terms })
        : invalidType(raw, "terms must hold only strings or only non-negative integers");
    case "termsWithDontCares":
      return isTermList(fields.terms) && isTermList(fields.dontCares)
        ? ok<MinimizeInput>({ kind: "termsWithDontCares", terms: fields.terms, dontCares: fields.dontCares })
        : invalidType(raw, "terms and dontCares must hold only strings or only non-negative integers");
    default:
      return invalidType(raw, `unknown input kind ${String(raw.kind)}`);
  }
}

function termStrings(terms: TermList, highOrderFirst: boolean): Result<string[]> {
  const indices: bigint[] = [];
  const strings: string[] = [];
  for (const term of terms) {
    if (typeof term === "string") {
      strings.push(term);
    } else {
      indices.push(BigInt(term));
    }
  }
  return indices.length > 0 ? mintermsFromIndices(indices, highOrderFirst) : ok(strings);
}

/**
 * Row values of the don't-cares. Indices are read in the same bit order as
 * minterm indices, over the `width` letters of the minterms.
 */
function dontCareValues(dontCares: TermList, width: number, highOrderFirst: boolean): Result<Set<bigint>> {
  const values = new Set<bigint>();
  for (const item of dontCares) {
    if (typeof item === "string") {
      const literals = parseTerm(item);
      if (!literals.ok) return literals;
      values.add(binaryValue(toBinary(literals.out)));
      continue;
    }
    const bits = BigInt(item).toString(2);
    // Wider than every minterm, so it matches no row.
    if (bits.length > width) {
      values.add(BigInt(item));
      continue;
    }
    values.add(binaryValue(toBinary(splitLiterals(mintermFromBits(bits.padStart(width, "0"), highOrderFirst)))));
  }
  return ok(values);
}

function isTrueConstant(input: MinimizeInput): boolean {
  switch (input.kind) {
    case "integer":
      return false;
    case "expression":
      return input.expression.trim() === "1";
    case "terms":
    case "termsWithDontCares":
      return input.terms.length === 1 && input.terms[0] === "1";
  }
}

function mintermStrings(input: MinimizeInput, highOrderFirst: boolean): Result<string[]> {
  switch (input.kind) {
    case "integer": {
      const form = canonical(input.value, { highOrderFirst });
      return form.ok ? ok(form.out.split(" + ")) : form;
    }
    case "expression":
      return ok(input.expression.split(/[^A-Za-z']+/).filter(term => term !== ""));
    case "terms":
    case "termsWithDontCares":
      return termStrings(input.terms, highOrderFirst);
  }
}

/**
 * Turns an input into parsed minterms and don't-care row values. Every term
 * must use the letters of the first one. The constant `"1"` (as written by
 * `toCanonicalForm`) resolves to no minterms with `tautology` set.
 */
export function resolveInput(input: MinimizeInput, highOrderFirst = true): Result<ResolvedInput> {
  if (isTrueConstant(input)) {
    return ok({ minterms: [], dontCares: new Set<bigint>(), tautology: true });
  }
  const terms = mintermStrings(input, highOrderFirst);
  if (!terms.ok) return terms;

  const [first] = terms.out;
  const expected = first === undefined ? "" : letterSignature(first);
  const width = first === undefined ? 0 : splitLiterals(first).length;
  const dontCares = input.kind === "termsWithDontCares"
    ? dontCareValues(input.dontCares, width, highOrderFirst)
    : ok(new Set<bigint>());
  if (!dontCares.ok) return dontCares;
  const minterms: string[][] = [];
  for (const term of terms.out) {
    const literals = parseTerm(term);
    if (!literals.ok) return literals;
    if (letterSignature(term) !== expected) return alphabetMismatch(term, expected);
    minterms.push(literals.out);
  }

  return ok({ minterms, dontCares: dontCares.out, tautology: false });
}
