import { combinations } from "./combinations";
import type { Logger } from "./generation";
import { budgetExceeded, ok, type Result } from "./result";
import type { Term } from "./term";

/** Alternative index → terms of one equally short completion of the cover. */
export type Alternatives = Map<number, Term[]>;

export type SelectOptions = {
  /** Upper bound on combinations examined by the search; unlimited when omitted. */
  maxCombinationSteps?: number;
  log?: Logger;
};

type Candidate = {
  row: number;
  // generation-1 rows this term covers that are still uncovered
  sources: ReadonlySet<number>;
  length: number;
};

// Once a size yields a match, only this many larger sizes are tried.
const EXTRA_ROUNDS = 2;

function sameRows(a: ReadonlySet<number>, b: ReadonlySet<number>): boolean {
  return a.size === b.size && [...a].every(row => b.has(row));
}

/**
 * Marks the essential prime implicants `required` and completes the cover
 * with `added` terms, either a single term or the shortest combination found.
 * Returns every equally short combination found by the search.
 */
export function selectImplicants(terms: Term[], options: SelectOptions = {}): Result<Alternatives> {
  const { maxCombinationSteps, log } = options;
  const dontCareRows = new Set(
    terms.filter(term => term.dontCare && term.generation === 1).map(term => term.row));

  const occurrences = new Map<number, number>();
  for (const term of terms) {
    if (term.covered) continue;
    for (const row of term.provenance) {
      if (dontCareRows.has(row)) continue;
      occurrences.set(row, (occurrences.get(row) ?? 0) + 1);
    }
  }
  const required = new Set([...occurrences].filter(([_, count]) => count === 1).map(([row]) => row));

  const ignore = new Set(dontCareRows);
  const pending: number[] = [];
  let essentials = 0;
  for (const term of terms) {
    if (term.covered || term.dontCare) continue;
    if (term.provenance.some(row => required.has(row))) {
      terms[term.row] = { ...term, disposition: "required" };
      term.provenance.forEach(row => ignore.add(row));
      essentials++;
    } else {
      pending.push(...term.provenance);
    }
  }
  const keep = new Set(pending.filter(row => !ignore.has(row)));
  log?.(`essential prime implicants: ${essentials}, rows left to cover: ${keep.size}`);

  const alternatives: Alternatives = new Map();
  if (keep.size === 0) {
    return ok(alternatives);
  }

  const candidates: Candidate[] = [];
  for (const term of terms) {
    if (term.covered || term.disposition !== null) continue;
    const sources = new Set(term.provenance.filter(row => keep.has(row)));
    if (sources.size > 0) {
      candidates.push({ row: term.row, sources, length: term.literals.size });
    }
  }

  const single = candidates.find(candidate => sameRows(candidate.sources, keep));
  if (single) {
    markAdded(terms, single.row);
    log?.(`single term completes the cover: row ${single.row}`);
    return ok(alternatives);
  }

  let matches: Candidate[][] = [];
  let minLength = 0;
  let breakCount = 0;
  let steps = 0;

  for (let size = 2; size <= candidates.length; size++) {
    if (breakCount >= EXTRA_ROUNDS) break;
    if (matches.length > 0) breakCount++;

    for (const combination of combinations(candidates, size)) {
      if (maxCombinationSteps !== undefined && steps >= maxCombinationSteps) {
        return budgetExceeded(steps);
      }
      steps++;

      const covered = new Set<number>();
      let length = 0;
      for (const candidate of combination) {
        candidate.sources.forEach(row => covered.add(row));
        length += candidate.length;
      }
      if (!sameRows(covered, keep) || (minLength !== 0 && length > minLength)) continue;

      if (minLength === 0 || length < minLength) {
        matches = [];
        minLength = length;
      }
      matches.push(combination);
    }
  }
  log?.(`combination search: ${steps} steps, ${matches.length} minimal covers of ${minLength} literals`);

  const [first] = matches;
  first?.forEach(candidate => markAdded(terms, candidate.row));
  matches.forEach((match, index) => {
    alternatives.set(index, match.flatMap(candidate => terms[candidate.row] ?? []));
  });
  return ok(alternatives);
}

function markAdded(terms: Term[], row: number): void {
  const term = terms[row];
  if (term) terms[row] = { ...term, disposition: "added" };
}
