export { canonical, toCanonicalForm, mintermsFromIndices, ALPHABET, type CanonicalOptions, type ExpandOptions } from "./canonical";
export { combinations } from "./combinations";
export { buildFirstGeneration, mergeGeneration, mergeToFixpoint, type Logger } from "./generation";
export { parseInput, resolveInput, type MinimizeInput, type RawInput, type TermList } from "./input";
export {
  minimize,
  formatCover,
  resultToInteger,
  alternatives,
  DEFAULT_MINIMIZE_OPTIONS,
  type MinimizeOptions,
  type MinimizeDetails,
} from "./minimize";
export { buildQM, type ExprConfig } from "./qm";
export type { QmError, Result } from "./result";
export { selectImplicants, type Alternatives, type SelectOptions } from "./selector";
export { renderTerm, parseTerm, type Term, type Disposition } from "./term";
