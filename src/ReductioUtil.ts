import type { Derivation } from './DerivationUtil';
import {
  addIon,
  appendRow,
  currentScopeId,
  exchangeRow,
  getRow,
  lastRowIndex,
  popScope,
  RULES,
} from './DerivationUtil';
import type { Formula, Literal } from './FormulaUtil';
import { and, atom, formulaEquals, implies, isBinary, isLiteral, literalLetter, negate } from './FormulaUtil';
import { getLogger } from './LogUtil';
import { stringifyFormula } from './ParseUtil';

const logger = getLogger('Reductio');

/**
 * Works from a DNF formula without counterexample towards a contradiction,
 * discharging assumptions along the way.
 * The formula is expected to be the last row of the derivation.
 *
 * In case a `goal` is provided,
 * a found contradiction will be exchanged for that goal before discharging the assumption.
 *
 * Once all assumptions are discharged, the result is the negation of the first assumption.
 * If there are still open assumptions, the returned formula is the last implication that was derived,
 * or the input literal in case no contradiction could be found.
 */
export function reductio(derivation: Derivation, formula: Formula, goal?: Formula): Formula {
  if (isLiteral(formula)) {
    return contradictionCheck(derivation, formula, goal);
  }
  if (formula.kind === 'Binary') {
    switch (formula.operator) {
      case 'OR': {
        const conclusion = disjunctionElimination(derivation, formula.left, formula.right, goal);
        return reductio(derivation, arrowIntroduction(derivation, conclusion));
      }
      case 'AND':
        return conjunctionElimination(derivation, formula.left, formula.right, goal);
      case 'IMPLIES':
        if (derivation.scopes.length > 0) {
          return formula;
        }
        return negationElimination(derivation, formula.left);
      case 'IFF':
        break;
    }
  }
  throw new Error(`Unable to continue the proof from ${stringifyFormula(formula)}`);
}

/**
 * Stores the literal as an ion and compares it to all ions of the open scopes.
 * The oldest scopes get checked first.
 */
export function contradictionCheck(derivation: Derivation, literal: Literal, goal?: Formula): Formula {
  const row = lastRowIndex(derivation);
  const { letter, positive } = literalLetter(literal);
  addIon(derivation, { row, positive, letter });

  for (const scope of derivation.scopes) {
    for (const ion of scope.ions) {
      if (ion.letter !== letter || ion.positive === positive) {
        continue;
      }
      logger.debug(`Row ${row} contradicts row ${ion.row}`);

      let result = conjunctionIntroduction(derivation, letter, ion.row, row);
      if (goal && !formulaEquals(result, goal)) {
        exchangeRow(derivation, goal, RULES.anythingFromContradiction);
        result = goal;
      }
      return reductio(derivation, arrowIntroduction(derivation, result));
    }
  }

  return literal;
}

/**
 * (P & Q) => P, Q
 *
 * Only continues with Q if working on P did not discharge the current assumption.
 */
export function conjunctionElimination(derivation: Derivation, left: Formula, right: Formula, goal?: Formula): Formula {
  const conjunctionRow = lastRowIndex(derivation);
  appendRow(derivation, left, RULES.conjunctionElimination, [ conjunctionRow ]);

  const scopeId = currentScopeId(derivation);
  const result = reductio(derivation, left, goal);
  if (scopeId !== currentScopeId(derivation)) {
    return result;
  }

  appendRow(derivation, right, RULES.conjunctionElimination, [ conjunctionRow ]);
  return reductio(derivation, right, goal);
}

/**
 * P, ~P => (P & ~P)
 */
export function conjunctionIntroduction(derivation: Derivation, letter: string, first: number, second: number): Formula {
  const contradiction = and(atom(letter), negate(atom(letter)));
  appendRow(derivation, contradiction, RULES.conjunctionIntroduction, [ first, second ]);
  return contradiction;
}

/**
 * (P v Q), (P -> R), (Q -> R) => R
 *
 * Both sides get assumed in turn, the second one is forced to reach the same conclusion as the first one.
 * A goal that was already set is used for the first side as well.
 */
export function disjunctionElimination(derivation: Derivation, left: Formula, right: Formula, goal?: Formula): Formula {
  const disjunctionRow = lastRowIndex(derivation);

  const first = reductio(derivation, assume(derivation, left), goal);
  if (!isBinary(first, 'IMPLIES')) {
    throw new Error(`Assuming ${stringifyFormula(left)} did not lead to a contradiction`);
  }
  const firstRow = lastRowIndex(derivation);
  const conclusion = first.right;

  const second = reductio(derivation, assume(derivation, right), conclusion);
  if (!isBinary(second, 'IMPLIES')) {
    throw new Error(`Assuming ${stringifyFormula(right)} did not lead to a contradiction`);
  }
  const secondRow = lastRowIndex(derivation);

  appendRow(derivation, conclusion, RULES.disjunctionElimination, [ disjunctionRow, firstRow, secondRow ]);
  return conclusion;
}

/**
 * Discharges the innermost assumption P, with Q being the last derived formula:
 *
 * | P   Assume
 * | ...
 * | Q
 * (P -> Q)
 */
export function arrowIntroduction(derivation: Derivation, conclusion: Formula): Formula {
  const scope = popScope(derivation);
  const conclusionRow = lastRowIndex(derivation);
  const assumption = getRow(derivation, scope.assumptionRow).formula;

  const result = implies(assumption, conclusion);
  appendRow(derivation, result, RULES.arrowIntroduction, [ scope.assumptionRow, conclusionRow ]);
  logger.debug(`Discharged assumption of row ${scope.assumptionRow}`);
  return result;
}

export function assume(derivation: Derivation, formula: Formula): Formula {
  appendRow(derivation, formula, RULES.assume, []);
  return formula;
}

/**
 * (~P -> (Q & ~Q)) => P
 */
export function negationElimination(derivation: Derivation, assumption: Formula): Formula {
  if (assumption.kind !== 'Negation') {
    throw new Error(`Expected a negated assumption instead of ${stringifyFormula(assumption)}`);
  }
  exchangeRow(derivation, assumption.operand, RULES.negationElimination);
  return assumption.operand;
}
