import { baseLetter, countPositive, sameLiterals, toBinary, type Term } from "./term";

export type Logger = (message: string) => void;

/**
 * Builds generation 1 from parsed minterms. Repeated literal sets keep their
 * first occurrence; rows follow a stable sort on `literalCount`.
 */
export function buildFirstGeneration(
  minterms: readonly (readonly string[])[],
  dontCares: ReadonlySet<bigint> = new Set(),
): Term[] {
  const distinct: ReadonlySet<string>[] = [];
  for (const literals of minterms) {
    const set = new Set(literals);
    if (!distinct.some(existing => sameLiterals(existing, set))) {
      distinct.push(set);
    }
  }

  return distinct
    .map(literals => ({ literals, literalCount: countPositive(literals) }))
    .sort((a, b) => a.literalCount - b.literalCount)
    .map(({ literals, literalCount }, row) => {
      const binary = toBinary(literals);
      return {
        literals,
        covered: false,
        literalCount,
        provenance: [row],
        generation: 1,
        disposition: null,
        binary,
        row,
        dontCare: dontCares.has(binaryValue(binary)),
      };
    });
}

export function binaryValue(binary: string): bigint {
  return binary === "" ? 0n : BigInt(`0b${binary}`);
}

function canCombine(a: Term, b: Term): { ok: true, out: ReadonlySet<string> } | { ok: false } {
  const diff = [...a.literals].filter(literal => !b.literals.has(literal))
    .concat([...b.literals].filter(literal => !a.literals.has(literal)));
  const [x, y] = diff;
  if (diff.length !== 2 || x === undefined || y === undefined || baseLetter(x) !== baseLetter(y)) {
    return { ok: false };
  }
  return { ok: true, out: new Set([...a.literals].filter(literal => b.literals.has(literal))) };
}

/**
 * Merges every pair of `generation` terms from adjacent `literalCount` groups
 * that differ in the polarity of one letter. Appends the new generation to
 * the arena, marks the parents covered and returns how many terms were added.
 */
export function mergeGeneration(terms: Term[], generation: number): number {
  const groups = new Map<number, Term[]>();
  for (const term of terms) {
    if (term.generation !== generation) continue;
    const group = groups.get(term.literalCount);
    if (group) {
      group.push(term);
    } else {
      groups.set(term.literalCount, [term]);
    }
  }

  const merged: { literals: ReadonlySet<string>, provenance: number[] }[] = [];
  const seen = new Set<string>();
  const usedRows = new Set<number>();
  const counts = [...groups.keys()].sort((a, b) => a - b);

  for (const count of counts) {
    const lower = groups.get(count) ?? [];
    const upper = groups.get(count + 1);
    if (!upper) continue;

    for (const x of lower) {
      for (const y of upper) {
        const result = canCombine(x, y);
        if (!result.ok) continue;
        usedRows.add(x.row);
        usedRows.add(y.row);

        const provenance = [...y.provenance, ...x.provenance].sort((a, b) => a - b);
        const key = provenance.join(",");
        if (!seen.has(key)) {
          seen.add(key);
          merged.push({ literals: result.out, provenance });
        }
      }
    }
  }

  const next = merged
    .map(item => ({ ...item, literalCount: countPositive(item.literals) }))
    .sort((a, b) => a.literalCount - b.literalCount);
  const offset = terms.length;
  next.forEach(({ literals, provenance, literalCount }, index) => {
    terms.push({
      literals,
      covered: false,
      literalCount,
      provenance,
      generation: generation + 1,
      disposition: null,
      binary: null,
      row: offset + index,
      dontCare: false,
    });
  });

  for (const row of usedRows) {
    const term = terms[row];
    if (term) terms[row] = { ...term, covered: true };
  }

  return next.length;
}

/** Runs merge passes until one adds nothing. Returns the last generation reached. */
export function mergeToFixpoint(terms: Term[], log?: Logger): number {
  let generation = 1;
  for (;;) {
    const added = mergeGeneration(terms, generation);
    log?.(`generation ${generation}: ${added} merged terms`);
    if (added === 0) return generation;
    generation++;
  }
}
