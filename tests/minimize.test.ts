import { describe, it } from "node:test";
import assert from "node:assert";
import {
  alternatives,
  canonical,
  minimize,
  resultToInteger,
  toCanonicalForm,
  type MinimizeDetails,
} from "../src";

const split = (term: string) => term.match(/[A-Za-z]'?/g) ?? [];

function expectString(result: ReturnType<typeof minimize>): string {
  assert.ok(result.ok, result.ok ? undefined : result.error.message);
  assert.equal(typeof result.out, "string");
  return String(result.out);
}

function details(...args: Parameters<typeof minimize>): MinimizeDetails {
  const [input, options] = args;
  const result = minimize(input, { ...options, returnDetails: true });
  assert.ok(result.ok, result.ok ? undefined : result.error.message);
  return result.out;
}

/** Rows (as letter/polarity sets) of `letters` that the sum of products is true for. */
function truthSet(expression: string, letters: readonly string[]): Set<string> {
  const rows = letters.reduce<string[][]>(
    (acc, letter) => acc.flatMap(row => [[...row, letter], [...row, `${letter}'`]]), [[]]);
  const terms = expression === "1" ? [[]] : expression.split(" + ").filter(term => term !== "" && term !== "0").map(split);
  return new Set(rows
    .filter(row => terms.some(term => term.every(literal => row.includes(literal))))
    .map(row => row.join("")));
}

function lettersOf(value: number): string[] {
  const form = canonical(value);
  assert.ok(form.ok);
  const first = form.out.split(" + ")[0] ?? "";
  const letters = split(first).map(literal => literal.replace("'", ""));
  return letters.length > 0 ? letters : ["A", "B"];
}

describe("minimize", () => {
  const cases: [number, string][] = [
    [2078, "B'CD + A'BC'D' + A'B'D + A'B'C"],
    [2077, "B'CD + A'C'D' + A'B'D'"],
    [12309, "ABC' + A'C'D' + A'B'D'"],
    [2003, "B'C' + AB'D' + A'C'D' + A'BC"],
    [248, "BC + A"],
    [213, "C' + AB"],
    [65024, "AD + AC + AB"],
    [38400, "ABCD + ABC'D' + AB'CD' + AB'C'D"],
    [743, "B'C'D + A'CD' + A'BD + A'B'D'"],
    [255, "1"],
    [15, "1"],
    [0, "0"],
  ];
  for (const [value, expected] of cases) {
    it(`should minimize ${value} to [${expected}]`, () => {
      assert.equal(expectString(minimize(value)), expected);
    });
  }

  it("reads A as the low-order bit on request", () => {
    assert.equal(expectString(minimize(248, { highOrderFirst: false })), "C + AB");
    assert.equal(expectString(minimize(2078, { highOrderFirst: false })), "BC'D' + AC'D' + ABC' + A'B'CD'");
  });

  it("accepts minterm strings and lists", () => {
    assert.equal(expectString(minimize(["ABC", "A'BC", "AB'C", "A'B'C", "ABC'"])), "C + AB");
    assert.equal(expectString(minimize("ABC + A'BC + AB'C + A'B'C + ABC'")), "C + AB");
    assert.equal(expectString(minimize("rts + r'ts + rt's + r't's + rts'")), "s + rt");
    assert.equal(expectString(minimize("ABCD + CDBA + ABC'D + DC'AB")), "ABD");
  });

  it("accepts minterm indices", () => {
    assert.equal(expectString(minimize([1, 3, 5, 7])), "C");
    assert.equal(expectString(minimize([0])), "A'");
    assert.equal(expectString(minimize([2, 3])), "A");
    assert.equal(expectString(minimize([])), "0");
  });

  it("reads the constant 1 back as 1", () => {
    assert.equal(expectString(minimize("1")), "1");
    assert.equal(expectString(minimize(" 1 ")), "1");
    assert.equal(expectString(minimize(["1"])), "1");
    const expanded = toCanonicalForm(expectString(minimize(255)));
    assert.ok(expanded.ok);
    assert.equal(expanded.out, "1");
    assert.equal(expectString(minimize(expanded.out)), "1");
    assert.equal(expectString(minimize(0)), "0");
    assert.equal(expectString(minimize("0")), "0");
  });

  it("reads don't-care indices in the minterm bit order", () => {
    assert.equal(expectString(minimize([[1, 3, 4], [4]], { highOrderFirst: false })), "AC'");
    assert.equal(expectString(minimize([[1, 3, 4], [1]], { highOrderFirst: false })), "AC' + A'B'C");
  });

  it("accepts tagged input", () => {
    assert.equal(expectString(minimize({ kind: "integer", value: 248n })), "BC + A");
    assert.equal(expectString(minimize({ kind: "expression", expression: "" })), "0");
  });

  it("uses don't-cares without requiring them", () => {
    assert.equal(
      expectString(minimize([[1, 2, 3, 4, 5, 6, 7, 8, 9, 10], [4, 5]])),
      "B'C'D + AB'D' + A'C");
    assert.equal(
      expectString(minimize([["ABC", "AB'C", "A'BC", "A'B'C"], ["A'B'C"]])),
      "C");
  });

  it("minimizes a five-variable function", () => {
    assert.equal(
      expectString(minimize(4222345678)),
      "BCE + BCD + BC'D'E' + B'C'E + AE + AC'D' + ABD' + A'B'D");
  });

  it("reports a letter mismatch", () => {
    assert.deepStrictEqual(minimize(["AB", "C"]), {
      ok: false,
      error: {
        kind: "AlphabetMismatch",
        message: `term "C" does not use the letters "AB"`,
        term: "C",
        expected: "AB",
      },
    });
  });

  it("honours the combination step budget", () => {
    const result = minimize(743, { maxCombinationSteps: 1 });
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.error.kind, "BudgetExceeded");
    assert.equal(expectString(minimize(743, { maxCombinationSteps: 1000 })), "B'C'D + A'CD' + A'BD + A'B'D'");
  });

  it("logs each stage", () => {
    const lines: string[] = [];
    minimize(248, { log: line => lines.push(line) });
    assert.deepStrictEqual(lines, [
      "generation 1: 5 minterms, 0 don't-cares",
      "generation 1: 5 merged terms",
      "generation 2: 1 merged terms",
      "generation 3: 0 merged terms",
      "essential prime implicants: 2, rows left to cover: 0",
    ]);
  });
});

describe("details", () => {
  it("returns the term arena and the alternatives", () => {
    const { result, terms, alternatives: found } = details(743);
    assert.equal(result, "B'C'D + A'CD' + A'BD + A'B'D'");
    assert.equal(terms.length, 14);
    assert.deepStrictEqual(alternatives(terms, found), [
      "B'C'D + A'B'D' + A'CD' + A'BD",
      "B'C'D + A'B'D' + A'C'D + A'BC",
      "B'C'D + A'B'D' + A'BC + A'BD",
      "B'C'D + A'B'C' + A'CD' + A'BD",
    ]);
  });

  it("lists alternatives after the required terms", () => {
    const { terms, alternatives: found } = details(886);
    assert.deepStrictEqual(alternatives(terms, found), [
      "AB'C' + A'CD' + A'BD' + A'C'D",
      "AB'C' + A'CD' + A'BC' + B'C'D",
      "AB'C' + A'CD' + A'BC' + A'C'D",
    ]);
  });

  it("has no alternatives when the essential implicants suffice", () => {
    const { terms, alternatives: found } = details(248);
    assert.deepStrictEqual(alternatives(terms, found), []);
  });

  it("recovers the truth-table integer", () => {
    assert.equal(resultToInteger(details(743).terms), 743n);
    assert.equal(resultToInteger(details(248).terms), 248n);
    assert.equal(resultToInteger(details([[1, 2, 3, 4, 5, 6, 7, 8, 9, 10], [4, 5]]).terms), 2046n);
  });

  it("each alternative covers the same rows", () => {
    const { terms, alternatives: found } = details(743);
    const letters = lettersOf(743);
    const expected = truthSet(expectString(minimize(743)), letters);
    for (const alternative of alternatives(terms, found)) {
      assert.deepStrictEqual(truthSet(alternative, letters), expected);
    }
  });
});

describe("properties", () => {
  const values = Array.from({ length: 1024 }, (_, i) => i);

  it("covers exactly the minterms of the canonical form", () => {
    for (const value of values) {
      const letters = lettersOf(value);
      const form = canonical(value);
      assert.ok(form.ok);
      const result = expectString(minimize(value));
      assert.deepStrictEqual(truthSet(result, letters), truthSet(form.out, letters), `value ${value}`);
    }
  });

  it("selects terms that cover every minterm row", () => {
    for (const value of values.filter(v => v % 7 === 3)) {
      const { terms } = details(value);
      const selected = new Set(terms.filter(term => term.disposition !== null).flatMap(term => term.provenance));
      const firstGeneration = terms.filter(term => term.generation === 1 && !term.dontCare);
      assert.ok(firstGeneration.every(term => selected.has(term.row)), `value ${value}`);
    }
  });

  it("renders sorted literals without repeated letters", () => {
    for (const value of values.filter(v => v % 5 === 1)) {
      const result = expectString(minimize(value));
      for (const term of result.split(" + ")) {
        const literals = split(term);
        assert.deepStrictEqual(literals, [...literals].sort(), `value ${value}`);
        assert.equal(new Set(literals.map(literal => literal.replace("'", ""))).size, literals.length);
      }
    }
  });

  it("keeps the covered rows when minimizing again", () => {
    for (const value of values.filter(v => v % 11 === 2)) {
      const letters = lettersOf(value);
      const once = expectString(minimize(value));
      const expanded = toCanonicalForm(once);
      assert.ok(expanded.ok);
      const twice = expectString(minimize(expanded.out));
      assert.deepStrictEqual(truthSet(twice, letters), truthSet(once, letters), `value ${value}`);
    }
  });
});
