import { ALPHABET, toCanonicalForm } from "./canonical";
import { minimize } from "./minimize";
import type { Result } from "./result";
import { baseLetter, isNegated, splitLiterals } from "./term";

type Match<P> = [true, P] | [false, undefined?];

/** Destructors and constructors for a host expression tree. */
export type ExprConfig<T> = {
  dtorAnd: (expr: T) => Match<{ lhs: T, rhs: T }>;
  dtorOr: (expr: T) => Match<{ lhs: T, rhs: T }>;
  dtorNot: (expr: T) => Match<{ operand: T }>;
  dtorLiteral: (expr: T) => Match<{ value: boolean }>;
  equal: (lhs: T, rhs: T) => boolean;
  ctorAnd: (lhs: T, rhs: T) => T;
  ctorOr: (lhs: T, rhs: T) => T;
  ctorNot: (operand: T) => T;
  ctorLiteral: (value: boolean) => T;
}

function unwrap<V>(result: Result<V>): V {
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.out;
}

/**
 * Simplifier for any expression tree whose leaves are opaque atoms. The tree
 * is flattened to a sum of products, each distinct atom gets a variable
 * letter in order of first appearance, and the minimized cover is rebuilt
 * with the host constructors.
 *
 * `simplify` throws when the tree holds more distinct atoms than there are
 * variable letters (52).
 */
export function buildQM<T>(cfg: ExprConfig<T>) {

  type Literal = { atom: T, positive: boolean };
  type Conjunction = Literal[];
  type Sop = Conjunction[];

  const FALSE: Sop = [];
  const TRUE: Sop = [[]];

  function conjoin(left: Conjunction, right: Conjunction): Conjunction | null {
    const result = [...left];
    for (const literal of right) {
      const same = result.find(existing => cfg.equal(existing.atom, literal.atom));
      if (!same) {
        result.push(literal);
      } else if (same.positive !== literal.positive) {
        return null;
      }
    }
    return result;
  }

  // `left` implies `right` when every literal of `left` occurs in `right`
  function implies(left: Conjunction, right: Conjunction): boolean {
    return left.every(literal =>
      right.some(other => cfg.equal(literal.atom, other.atom) && literal.positive === other.positive));
  }

  function addDisjunct(sop: Sop, conjunction: Conjunction): Sop {
    return sop.some(existing => implies(existing, conjunction)) ? sop : [...sop, conjunction];
  }

  function and(left: Sop, right: Sop): Sop {
    let result: Sop = [];
    for (const l of left) {
      for (const r of right) {
        const conjunction = conjoin(l, r);
        if (conjunction) {
          result = addDisjunct(result, conjunction);
        }
      }
    }
    return result;
  }

  function or(left: Sop, right: Sop): Sop {
    return right.reduce(addDisjunct, [...left]);
  }

  // De Morgan: not(c1 + c2 + ...) = not(c1) . not(c2) . ...
  function not(sop: Sop): Sop {
    return sop.reduce<Sop>((acc, conjunction) =>
      and(acc, conjunction.map(literal => [{ atom: literal.atom, positive: !literal.positive }])), TRUE);
  }

  function from(expr: T): Sop {
    {
      const [ok, parts] = cfg.dtorAnd(expr);
      if (ok) return and(from(parts.lhs), from(parts.rhs));
    }
    {
      const [ok, parts] = cfg.dtorOr(expr);
      if (ok) return or(from(parts.lhs), from(parts.rhs));
    }
    {
      const [ok, parts] = cfg.dtorNot(expr);
      if (ok) return not(from(parts.operand));
    }
    {
      const [ok, parts] = cfg.dtorLiteral(expr);
      if (ok) return parts.value ? TRUE : FALSE;
    }
    return [[{ atom: expr, positive: true }]];
  }

  function to(sop: Sop): T {
    if (sop.length === 0) return cfg.ctorLiteral(false);
    const conjunctions = sop.map(conjunction => {
      if (conjunction.length === 0) return cfg.ctorLiteral(true);
      return conjunction
        .map(literal => literal.positive ? literal.atom : cfg.ctorNot(literal.atom))
        .reduce((acc, operand) => cfg.ctorAnd(acc, operand));
    });
    return conjunctions.reduce((acc, operand) => cfg.ctorOr(acc, operand));
  }

  function minimizeSop(sop: Sop): Sop {
    if (sop.length === 0 || sop.some(conjunction => conjunction.length === 0)) {
      return sop.length === 0 ? FALSE : TRUE;
    }

    const atoms: T[] = [];
    for (const conjunction of sop) {
      for (const { atom } of conjunction) {
        if (!atoms.some(known => cfg.equal(known, atom))) atoms.push(atom);
      }
    }
    if (atoms.length > ALPHABET.length) {
      throw new Error(`cannot minimize more than ${ALPHABET.length} distinct atoms`);
    }
    const letterOf = (atom: T) => ALPHABET[atoms.findIndex(known => cfg.equal(known, atom))] ?? "";

    const terms = sop.map(conjunction =>
      conjunction.map(literal => letterOf(literal.atom) + (literal.positive ? "" : "'")).join(""));
    const minimized = unwrap(minimize(unwrap(toCanonicalForm(terms))));
    if (minimized === "0") return FALSE;
    if (minimized === "1") return TRUE;

    return minimized.split(" + ").map(term => splitLiterals(term).flatMap(literal => {
      const atom = atoms[ALPHABET.indexOf(baseLetter(literal))];
      return atom === undefined ? [] : [{ atom, positive: !isNegated(literal) }];
    }));
  }

  return {
    simplify: (expr: T) => to(minimizeSop(from(expr))),
  };
}
