import { findCounterexample } from './CounterexampleUtil';
import type { Derivation } from './DerivationUtil';
import { createDerivation } from './DerivationUtil';
import type { Formula, Valuation } from './FormulaUtil';
import { formulaEquals, negate } from './FormulaUtil';
import { getLogger } from './LogUtil';
import type { NormalizeOptions } from './NormalizeUtil';
import { toDnf } from './NormalizeUtil';
import { stringifyFormula } from './ParseUtil';
import { assume, reductio } from './ReductioUtil';

const logger = getLogger('Decide');

export type DecideOptions = NormalizeOptions;

export type TautologyResult = {
  type: 'Tautology';
  proof: Derivation;
};

export type RefutableResult = {
  type: 'Refutable';
  // A valuation that makes the formula false
  valuation: Valuation;
};

export type DecideResult = TautologyResult | RefutableResult;

/**
 * Determines whether the formula is true on all valuations.
 * If it is, a derivation of the formula is returned,
 * otherwise a valuation that makes it false.
 */
export function decide(formula: Formula, options: DecideOptions = {}): DecideResult {
  const derivation = createDerivation();

  const dnf = toDnf(derivation, assume(derivation, negate(formula)), options);

  const counterexample = findCounterexample(dnf);
  if (counterexample.found) {
    logger.verbose(`${stringifyFormula(formula)} is not a tautology`);
    return { type: 'Refutable', valuation: counterexample.valuation };
  }

  const conclusion = reductio(derivation, dnf);
  if (!formulaEquals(conclusion, formula) || derivation.scopes.length > 0) {
    throw new Error(`Proof search for ${stringifyFormula(formula)} ended with ${stringifyFormula(conclusion)} and ${
      derivation.scopes.length} open assumptions`);
  }
  logger.verbose(`Derived ${stringifyFormula(formula)} in ${derivation.rows.length} rows`);
  return { type: 'Tautology', proof: derivation };
}

export function isTautology(formula: Formula, options?: DecideOptions): boolean {
  return decide(formula, options).type === 'Tautology';
}
