import type { Formula } from './FormulaUtil';
import { stringifyFormula } from './ParseUtil';

export const RULES = {
  assume: 'Assume',
  arrowExchange: '-> exch.',
  biconditionalExchange: '<-> exch.',
  doubleNegationElimination: '~~ elim.',
  deMorgan: 'De Morgan\'s',
  distribution: '&/v exch.',
  conjunctionElimination: '& elim.',
  conjunctionIntroduction: '& intro.',
  anythingFromContradiction: 'Any Contra.',
  arrowIntroduction: '-> intro.',
  disjunctionElimination: 'v elim.',
  negationElimination: '~ elim.',
} as const;

export type Rule = typeof RULES[keyof typeof RULES];

export type DerivationRow = {
  // 1-based
  index: number;
  // Number of undischarged assumptions at this row, including the one opened by it
  openScopes: number;
  formula: Formula;
  rule: Rule;
  cited: number[];
};

/**
 * A literal that was derived while a scope was open.
 */
export type Ion = {
  row: number;
  positive: boolean;
  letter: string;
};

export type Scope = {
  assumptionRow: number;
  id: number;
  ions: Ion[];
};

/**
 * The proof being built for a single decision attempt.
 * Only modified through the functions in this file.
 */
export type Derivation = {
  rows: DerivationRow[];
  // Innermost scope is last
  scopes: Scope[];
  nextScopeId: number;
};

export const NO_SCOPE = 0;

export function createDerivation(): Derivation {
  return {
    rows: [],
    scopes: [],
    nextScopeId: 1,
  };
}

export function lastRowIndex(derivation: Derivation): number {
  return derivation.rows.length === 0 ? 0 : derivation.rows[derivation.rows.length - 1].index;
}

export function getRow(derivation: Derivation, index: number): DerivationRow {
  const row = derivation.rows[index - 1];
  if (!row) {
    throw new Error(`Derivation has no row ${index}`);
  }
  return row;
}

export function appendRow(derivation: Derivation, formula: Formula, rule: Rule, cited: number[]): DerivationRow {
  const index = lastRowIndex(derivation) + 1;
  const invalid = cited.find((citation): boolean => citation < 1 || citation >= index);
  if (typeof invalid === 'number') {
    throw new Error(`Row ${index} can not cite row ${invalid}`);
  }

  if (rule === RULES.assume) {
    derivation.scopes.push({ assumptionRow: index, id: derivation.nextScopeId, ions: []});
    derivation.nextScopeId += 1;
  }

  const row: DerivationRow = {
    index,
    openScopes: derivation.scopes.length,
    formula,
    rule,
    cited,
  };
  derivation.rows.push(row);
  return row;
}

// Exchange rules only ever apply to the previous row
export function exchangeRow(derivation: Derivation, formula: Formula, rule: Rule): DerivationRow {
  const previous = lastRowIndex(derivation);
  if (previous === 0) {
    throw new Error(`Unable to apply ${rule} to an empty derivation`);
  }
  return appendRow(derivation, formula, rule, [ previous ]);
}

export function addIon(derivation: Derivation, ion: Ion): void {
  const scope = derivation.scopes.at(-1);
  if (!scope) {
    throw new Error(`Unable to store ion for row ${ion.row} as there is no open scope`);
  }
  scope.ions.push(ion);
}

export function currentScopeId(derivation: Derivation): number {
  return derivation.scopes.at(-1)?.id ?? NO_SCOPE;
}

export function popScope(derivation: Derivation): Scope {
  const scope = derivation.scopes.pop();
  if (!scope) {
    throw new Error('Unable to discharge an assumption as there is no open scope');
  }
  return scope;
}

export function stringifyRow(row: DerivationRow): string {
  const citations = row.cited.length > 0 ? ` ${row.cited.join(', ')}` : '';
  return `${row.index}.${' |'.repeat(row.openScopes)} ${stringifyFormula(row.formula)}    ${row.rule}${citations}`;
}

export function stringifyDerivation(derivation: Derivation): string {
  return derivation.rows.map(stringifyRow).join('\n');
}
