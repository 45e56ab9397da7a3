export type QmError =
  | { kind: "InvalidType"; message: string; input: unknown }
  | { kind: "InvalidTerm"; message: string; term: string }
  | { kind: "AlphabetMismatch"; message: string; term: string; expected: string }
  | { kind: "BudgetExceeded"; message: string; steps: number };

export type Result<T> = { ok: true; out: T } | { ok: false; error: QmError };

export function ok<T>(out: T): Result<T> {
  return { ok: true, out };
}

export function invalidType(input: unknown, message: string): { ok: false; error: QmError } {
  return { ok: false, error: { kind: "InvalidType", message, input } };
}

export function invalidTerm(term: string, message: string): { ok: false; error: QmError } {
  return { ok: false, error: { kind: "InvalidTerm", message, term } };
}

export function alphabetMismatch(term: string, expected: string): { ok: false; error: QmError } {
  return {
    ok: false,
    error: {
      kind: "AlphabetMismatch",
      message: `term "${term}" does not use the letters "${expected}"`,
      term,
      expected,
    },
  };
}

export function budgetExceeded(steps: number): { ok: false; error: QmError } {
  return {
    ok: false,
    error: {
      kind: "BudgetExceeded",
      message: `combination search gave up after ${steps} steps`,
      steps,
    },
  };
}
