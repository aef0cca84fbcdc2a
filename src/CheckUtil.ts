import type { Derivation, DerivationRow, Rule } from './DerivationUtil';
import { RULES } from './DerivationUtil';
import type { Formula } from './FormulaUtil';
import { and, formulaEquals, implies, isBinary, negate, or } from './FormulaUtil';
import { stringifyFormula } from './ParseUtil';

// All formulas a single rule application could produce at the root of the given formula
type LocalRewrite = (formula: Formula) => Formula[];

const EXCHANGES: Partial<Record<Rule, LocalRewrite>> = {
  [RULES.arrowExchange]: (formula): Formula[] =>
    isBinary(formula, 'IMPLIES') ? [ or(negate(formula.left), formula.right) ] : [],
  [RULES.biconditionalExchange]: (formula): Formula[] => isBinary(formula, 'IFF') ?
      [ or(and(formula.left, formula.right), and(negate(formula.left), negate(formula.right))) ] :
      [],
  [RULES.doubleNegationElimination]: (formula): Formula[] =>
    formula.kind === 'Negation' && formula.operand.kind === 'Negation' ? [ formula.operand.operand ] : [],
  [RULES.deMorgan]: (formula): Formula[] => {
    if (formula.kind !== 'Negation') {
      return [];
    }
    const body = formula.operand;
    if (body.kind !== 'Binary') {
      return [];
    }
    switch (body.operator) {
      case 'AND':
        return [ or(negate(body.left), negate(body.right)) ];
      case 'OR':
        return [ and(negate(body.left), negate(body.right)) ];
      default:
        return [];
    }
  },
  [RULES.distribution]: (formula): Formula[] => {
    if (!isBinary(formula, 'AND')) {
      return [];
    }
    const { left, right } = formula;
    const results: Formula[] = [];
    if (isBinary(left, 'OR')) {
      results.push(or(and(left.left, right), and(left.right, right)));
    }
    if (isBinary(right, 'OR')) {
      results.push(or(and(left, right.left), and(left, right.right)));
    }
    return results;
  },
};

/**
 * Checks if `to` can be obtained by rewriting exactly one subformula of `from`.
 */
export function rewritesOnce(from: Formula, to: Formula, rewrite: LocalRewrite): boolean {
  if (rewrite(from).some((result): boolean => formulaEquals(result, to))) {
    return true;
  }
  if (from.kind === 'Negation' && to.kind === 'Negation') {
    return rewritesOnce(from.operand, to.operand, rewrite);
  }
  if (from.kind === 'Binary' && to.kind === 'Binary' && from.operator === to.operator) {
    return (formulaEquals(from.right, to.right) && rewritesOnce(from.left, to.left, rewrite)) ||
      (formulaEquals(from.left, to.left) && rewritesOnce(from.right, to.right, rewrite));
  }
  return false;
}

export function isContradiction(formula: Formula): boolean {
  return isBinary(formula, 'AND') && formulaEquals(negate(formula.left), formula.right);
}

/**
 * Verifies every row of the derivation against the rule it claims to use.
 * Returns a list of problems, which is empty if the derivation is correct.
 * If a conclusion is provided, the derivation also has to end on it without open assumptions.
 */
export function checkDerivation(derivation: Derivation, conclusion?: Formula): string[] {
  const errors: string[] = [];
  // Assumption rows that are open, innermost last
  const open: number[] = [];
  // The open assumptions at the time of every row
  const contexts: number[][] = [];

  for (const [ idx, row ] of derivation.rows.entries()) {
    const problem = checkRow(derivation, row, idx + 1, open, contexts);
    if (problem) {
      errors.push(`Row ${idx + 1}: ${problem}`);
    }

    if (row.rule === RULES.assume) {
      open.push(row.index);
    } else if (row.rule === RULES.arrowIntroduction && open.at(-1) === row.cited[0]) {
      open.pop();
    }
    contexts.push([ ...open ]);

    if (row.openScopes !== open.length) {
      errors.push(`Row ${idx + 1}: has ${row.openScopes} open scopes instead of ${open.length}`);
    }
  }

  for (const assumption of open) {
    errors.push(`Assumption of row ${assumption} is never discharged`);
  }

  if (conclusion) {
    const last = derivation.rows.at(-1);
    if (!last || !formulaEquals(last.formula, conclusion)) {
      errors.push(`Derivation does not end with ${stringifyFormula(conclusion)}`);
    }
  }

  return errors;
}

function checkRow(
  derivation: Derivation,
  row: DerivationRow,
  expected: number,
  open: number[],
  contexts: number[][],
): string | undefined {
  if (row.index !== expected) {
    return `has index ${row.index}`;
  }

  for (const citation of row.cited) {
    if (citation < 1 || citation >= row.index) {
      return `cites row ${citation}`;
    }
    const context = contexts[citation - 1];
    if (context.length > open.length || context.some((assumption, i): boolean => open[i] !== assumption)) {
      return `cites row ${citation} which is no longer accessible`;
    }
  }

  const cited = row.cited.map((citation): Formula => derivation.rows[citation - 1].formula);
  return checkRule(row, cited, open);
}

function checkRule(row: DerivationRow, cited: Formula[], open: number[]): string | undefined {
  const { formula, rule } = row;
  const expectCitations = (count: number): string | undefined =>
    cited.length === count ? undefined : `${rule} needs ${count} citations`;

  const exchange = EXCHANGES[rule];
  if (exchange) {
    const problem = expectCitations(1);
    if (problem) {
      return problem;
    }
    return rewritesOnce(cited[0], formula, exchange) ? undefined : `${rule} does not produce ${stringifyFormula(formula)}`;
  }

  const problem = expectCitations(citationCount(rule));
  if (problem) {
    return problem;
  }

  switch (rule) {
    case RULES.assume:
      return;
    case RULES.conjunctionElimination: {
      const [ conjunction ] = cited;
      if (!isBinary(conjunction, 'AND') ||
        !(formulaEquals(conjunction.left, formula) || formulaEquals(conjunction.right, formula))) {
        return `${stringifyFormula(formula)} is not a side of ${stringifyFormula(conjunction)}`;
      }
      return;
    }
    case RULES.conjunctionIntroduction: {
      const [ first, second ] = cited;
      if (!isBinary(formula, 'AND') ||
        !((formulaEquals(formula.left, first) && formulaEquals(formula.right, second)) ||
          (formulaEquals(formula.left, second) && formulaEquals(formula.right, first)))) {
        return `${stringifyFormula(formula)} is not the conjunction of the cited rows`;
      }
      return;
    }
    case RULES.anythingFromContradiction:
      return isContradiction(cited[0]) ? undefined : `${stringifyFormula(cited[0])} is not a contradiction`;
    case RULES.arrowIntroduction: {
      if (open.at(-1) !== row.cited[0]) {
        return `row ${row.cited[0]} is not the innermost open assumption`;
      }
      const [ assumption, result ] = cited;
      return formulaEquals(formula, implies(assumption, result)) ?
        undefined :
        `${stringifyFormula(formula)} does not follow from the discharged assumption`;
    }
    case RULES.disjunctionElimination: {
      const [ disjunction, first, second ] = cited;
      if (!isBinary(disjunction, 'OR') ||
        !formulaEquals(first, implies(disjunction.left, formula)) ||
        !formulaEquals(second, implies(disjunction.right, formula))) {
        return `${stringifyFormula(formula)} does not follow from the cases of the cited disjunction`;
      }
      return;
    }
    case RULES.negationElimination: {
      const [ implication ] = cited;
      if (!isBinary(implication, 'IMPLIES') || !isContradiction(implication.right) ||
        !formulaEquals(implication.left, negate(formula))) {
        return `${stringifyFormula(formula)} can not be derived from ${stringifyFormula(implication)}`;
      }
      return;
    }
    default:
      return `unknown rule ${rule}`;
  }
}

function citationCount(rule: Rule): number {
  switch (rule) {
    case RULES.assume:
      return 0;
    case RULES.conjunctionIntroduction:
    case RULES.arrowIntroduction:
      return 2;
    case RULES.disjunctionElimination:
      return 3;
    default:
      return 1;
  }
}
