import { buildFirstGeneration, binaryValue, mergeToFixpoint } from "./generation";
import { parseInput, resolveInput, type MinimizeInput, type RawInput } from "./input";
import { ok, type Result } from "./result";
import { selectImplicants, type Alternatives, type SelectOptions } from "./selector";
import { renderTerm, type Term } from "./term";

export type MinimizeOptions = SelectOptions & {
  /** Applies to integer and index inputs only. */
  highOrderFirst?: boolean;
  returnDetails?: boolean;
};

export const DEFAULT_MINIMIZE_OPTIONS = {
  highOrderFirst: true,
  returnDetails: false,
} as const satisfies MinimizeOptions;

export type MinimizeDetails = {
  result: string;
  /** Every term of the run, indexed by row. */
  terms: Term[];
  alternatives: Alternatives;
};

/**
 * Quine–McCluskey minimization. Returns the minimized sum of products, or
 * with `returnDetails` the full term arena and the equally short alternatives.
 *
 * @example
 * minimize(248)                                  // { ok: true, out: "BC + A" }
 * minimize(["ABC", "A'BC", "AB'C", "A'B'C", "ABC'"]) // { ok: true, out: "C + AB" }
 */
export function minimize(
  input: MinimizeInput | RawInput,
  options: MinimizeOptions & { returnDetails: true },
): Result<MinimizeDetails>;
export function minimize(
  input: MinimizeInput | RawInput,
  options?: MinimizeOptions & { returnDetails?: false },
): Result<string>;
export function minimize(
  input: MinimizeInput | RawInput,
  options?: MinimizeOptions,
): Result<string> | Result<MinimizeDetails>;
export function minimize(
  input: MinimizeInput | RawInput,
  options: MinimizeOptions = {},
): Result<string> | Result<MinimizeDetails> {
  const details = minimizeDetails(input, options);
  if (!details.ok || (options.returnDetails ?? DEFAULT_MINIMIZE_OPTIONS.returnDetails)) {
    return details;
  }
  return ok(details.out.result);
}

function minimizeDetails(input: MinimizeInput | RawInput, options: MinimizeOptions): Result<MinimizeDetails> {
  const { highOrderFirst = DEFAULT_MINIMIZE_OPTIONS.highOrderFirst, maxCombinationSteps, log } = options;

  const parsed = parseInput(input);
  if (!parsed.ok) return parsed;
  const resolved = resolveInput(parsed.out, highOrderFirst);
  if (!resolved.ok) return resolved;

  const { minterms, dontCares, tautology } = resolved.out;
  if (minterms.length === 0) {
    return ok({ result: tautology ? "1" : "0", terms: [], alternatives: new Map<number, Term[]>() });
  }

  const terms = buildFirstGeneration(minterms, dontCares);
  log?.(`generation 1: ${terms.length} minterms, ${terms.filter(term => term.dontCare).length} don't-cares`);
  mergeToFixpoint(terms, log);

  const selection = selectImplicants(terms, { maxCombinationSteps, log });
  if (!selection.ok) return selection;

  return ok({ result: formatCover(terms), terms, alternatives: selection.out });
}

/**
 * Joins the selected terms in reverse code-point order; `"0"` and `"1"` for
 * constants. When every generation-1 term is a don't-care nothing is selected
 * and the empty join reads as `"1"`.
 */
export function formatCover(terms: readonly Term[]): string {
  const [first] = terms;
  if (first === undefined || first.literals.size === 0) {
    return "0";
  }
  const rendered = terms
    .filter(term => term.disposition !== null)
    .map(renderTerm)
    .sort()
    .reverse()
    .join(" + ");
  return rendered === "" ? "1" : rendered;
}

/** Truth-table integer of the generation-1 terms: the sum of 2^binary. */
export function resultToInteger(terms: readonly Term[]): bigint {
  return terms
    .filter(term => term.generation === 1 && term.binary !== null)
    .reduce((sum, term) => sum + (1n << binaryValue(term.binary ?? "")), 0n);
}

/** Renders each alternative as the required terms followed by that alternative's terms. */
export function alternatives(terms: readonly Term[], found: Alternatives): string[] {
  const required = terms.filter(term => term.disposition === "required").map(renderTerm);
  return [...found.values()].map(alternative =>
    [...required, ...alternative.map(renderTerm)].join(" + "));
}
