import type { Derivation, Rule } from './DerivationUtil';
import { exchangeRow, RULES } from './DerivationUtil';
import type { Binary, Formula } from './FormulaUtil';
import { and, binary, isBinary, negate, or } from './FormulaUtil';
import { getLogger } from './LogUtil';
import { stringifyFormula } from './ParseUtil';

const logger = getLogger('Normalize');

export type Rewrite = {
  formula: Formula;
  rule: Rule;
};

/**
 * Rewrites at most one position of the formula.
 * Returns `undefined` if nothing could be rewritten.
 */
export type RewriteStep = (formula: Formula) => Rewrite | undefined;

export type NormalizeOptions = {
  // Maximum amount of rewrites per pass, 0 or less means there is no limit
  maxSteps?: number;
};

/**
 * Keeps applying the step function until it no longer changes anything.
 * Every intermediate result is added to the derivation.
 */
export function rewriteToFixpoint(derivation: Derivation, formula: Formula, step: RewriteStep, maxSteps = 0): Formula {
  let count = 0;
  let current = formula;
  for (let rewrite = step(current); rewrite; rewrite = step(current)) {
    if (maxSteps > 0 && count >= maxSteps) {
      throw new Error(`No fixpoint reached for ${stringifyFormula(formula)} within ${maxSteps} steps`);
    }
    const row = exchangeRow(derivation, rewrite.formula, rewrite.rule);
    logger.debug(`${row.index}: ${rewrite.rule} ${stringifyFormula(rewrite.formula)}`);
    current = rewrite.formula;
    count += 1;
  }
  return current;
}

// Probes left before right, the caller only looks at the node itself if both fail
function rewriteChildren(formula: Binary, step: RewriteStep): Rewrite | undefined {
  const left = step(formula.left);
  if (left) {
    return { formula: binary(formula.operator, left.formula, formula.right), rule: left.rule };
  }
  const right = step(formula.right);
  if (right) {
    return { formula: binary(formula.operator, formula.left, right.formula), rule: right.rule };
  }
}

export const removeArrowStep: RewriteStep = (formula): Rewrite | undefined => {
  if (formula.kind === 'Atom') {
    return;
  }
  if (formula.kind === 'Negation') {
    const rewrite = removeArrowStep(formula.operand);
    return rewrite && { formula: negate(rewrite.formula), rule: rewrite.rule };
  }

  const child = rewriteChildren(formula, removeArrowStep);
  if (child) {
    return child;
  }

  const { left, right } = formula;
  if (formula.operator === 'IMPLIES') {
    return { formula: or(negate(left), right), rule: RULES.arrowExchange };
  }
  if (formula.operator === 'IFF') {
    return {
      formula: or(and(left, right), and(negate(left), negate(right))),
      rule: RULES.biconditionalExchange,
    };
  }
};

// Assumes there are no more arrows in the formula
export const pushNegationStep: RewriteStep = (formula): Rewrite | undefined => {
  if (formula.kind === 'Atom') {
    return;
  }
  if (formula.kind === 'Binary') {
    return rewriteChildren(formula, pushNegationStep);
  }

  const body = formula.operand;
  if (body.kind === 'Atom') {
    return;
  }

  if (body.kind === 'Negation') {
    // The inner formula has to be stable before the double negation can go
    const inner = pushNegationStep(body.operand);
    if (inner) {
      return { formula: negate(negate(inner.formula)), rule: inner.rule };
    }
    return { formula: body.operand, rule: RULES.doubleNegationElimination };
  }

  const child = rewriteChildren(body, pushNegationStep);
  if (child) {
    return { formula: negate(child.formula), rule: child.rule };
  }

  if (body.operator === 'AND') {
    return { formula: or(negate(body.left), negate(body.right)), rule: RULES.deMorgan };
  }
  if (body.operator === 'OR') {
    return { formula: and(negate(body.left), negate(body.right)), rule: RULES.deMorgan };
  }
};

// Assumes the formula is in negation normal form
export const distributeStep: RewriteStep = (formula): Rewrite | undefined => {
  if (formula.kind !== 'Binary') {
    return;
  }

  const child = rewriteChildren(formula, distributeStep);
  if (child) {
    return child;
  }

  if (formula.operator !== 'AND') {
    return;
  }
  const { left, right } = formula;
  if (isBinary(left, 'OR')) {
    return { formula: or(and(left.left, right), and(left.right, right)), rule: RULES.distribution };
  }
  if (isBinary(right, 'OR')) {
    return { formula: or(and(left, right.left), and(left, right.right)), rule: RULES.distribution };
  }
};

export function removeArrows(derivation: Derivation, formula: Formula, maxSteps?: number): Formula {
  return rewriteToFixpoint(derivation, formula, removeArrowStep, maxSteps);
}

export function pushNegations(derivation: Derivation, formula: Formula, maxSteps?: number): Formula {
  return rewriteToFixpoint(derivation, formula, pushNegationStep, maxSteps);
}

export function distribute(derivation: Derivation, formula: Formula, maxSteps?: number): Formula {
  return rewriteToFixpoint(derivation, formula, distributeStep, maxSteps);
}

/**
 * Converts the formula to an equivalent one in disjunctive normal form.
 * The formula is expected to be the last row of the derivation,
 * every rewrite gets appended to it.
 */
export function toDnf(derivation: Derivation, formula: Formula, options: NormalizeOptions = {}): Formula {
  const { maxSteps } = options;
  let result = removeArrows(derivation, formula, maxSteps);
  result = pushNegations(derivation, result, maxSteps);
  result = distribute(derivation, result, maxSteps);
  logger.debug(`DNF of ${stringifyFormula(formula)} is ${stringifyFormula(result)}`);
  return result;
}
