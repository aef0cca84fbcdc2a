import type { Formula, Literal, Valuation } from './FormulaUtil';
import { collectLetters, isBinary, isLiteral, literalLetter } from './FormulaUtil';
import { getLogger } from './LogUtil';
import { stringifyFormula, stringifyValuation } from './ParseUtil';

const logger = getLogger('Counterexample');

export type CounterexampleResult = { found: true; valuation: Valuation } | { found: false };

export function splitDisjuncts(formula: Formula): Formula[] {
  if (isBinary(formula, 'OR')) {
    return [ ...splitDisjuncts(formula.left), ...splitDisjuncts(formula.right) ];
  }
  return [ formula ];
}

export function splitConjuncts(formula: Formula): Literal[] {
  if (isBinary(formula, 'AND')) {
    return [ ...splitConjuncts(formula.left), ...splitConjuncts(formula.right) ];
  }
  if (!isLiteral(formula)) {
    throw new Error(`${stringifyFormula(formula)} is not in disjunctive normal form`);
  }
  return [ formula ];
}

/**
 * Finds a valuation that makes the given DNF formula true,
 * by looking for the first disjunct that does not contain both a letter and its negation.
 * All letters that are not affirmed in that disjunct are false.
 */
export function findCounterexample(dnf: Formula): CounterexampleResult {
  for (const disjunct of splitDisjuncts(dnf)) {
    const positives = new Set<string>();
    const negatives = new Set<string>();
    for (const literal of splitConjuncts(disjunct)) {
      const { letter, positive } = literalLetter(literal);
      (positive ? positives : negatives).add(letter);
    }

    if ([ ...positives ].some((letter): boolean => negatives.has(letter))) {
      continue;
    }

    const valuation: Valuation = {};
    for (const letter of collectLetters(dnf)) {
      valuation[letter] = positives.has(letter);
    }
    logger.debug(`${stringifyFormula(disjunct)} is satisfied by ${stringifyValuation(valuation).replaceAll('\n', ', ')}`);
    return { found: true, valuation };
  }
  return { found: false };
}
