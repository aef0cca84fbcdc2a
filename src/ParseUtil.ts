import type { Formula, Operator, Valuation } from './FormulaUtil';
import { atom, binary, negate } from './FormulaUtil';

export type ParseError = {
  input: string;
  message: string;
};

export type ParseResult = { success: true; formula: Formula } | { success: false; error: ParseError };

type Attempt = { formula: Formula } | { message: string };

type MainConnective = {
  operator: Operator;
  start: number;
  end: number;
};

export const OPERATOR_SYMBOLS: Record<Operator, string> = {
  AND: '&',
  OR: 'v',
  IMPLIES: '->',
  IFF: '<->',
};

// Order matters: `<->` has to be tried before anything that could match its tail
const CONNECTIVE_TOKENS: { token: string; operator: Operator }[] = [
  { token: '<->', operator: 'IFF' },
  { token: '->', operator: 'IMPLIES' },
  { token: '&', operator: 'AND' },
  { token: 'v', operator: 'OR' },
];

/**
 * Parses an SL sentence such as `(P <-> ~(A & B))`.
 * All whitespace is ignored.
 * In case the input can not be parsed as is,
 * it gets parsed a second time wrapped in brackets,
 * so `A -> B` is accepted as well.
 */
export function parseFormula(text: string): ParseResult {
  const input = text.replace(/\s+/gu, '');
  const attempt = parseStripped(input);
  if ('formula' in attempt) {
    return { success: true, formula: attempt.formula };
  }

  const retry = parseStripped(`(${input})`);
  if ('formula' in retry) {
    return { success: true, formula: retry.formula };
  }

  // The retry error is only relevant if the input did not already look like a complete sentence
  const useAttempt = input.length <= 1 || input.startsWith('~') || (input.startsWith('(') && input.endsWith(')'));
  return { success: false, error: { input: text, message: useAttempt ? attempt.message : retry.message }};
}

function parseStripped(input: string): Attempt {
  if (input.length === 0) {
    return { message: 'Empty input' };
  }

  if (input.length === 1) {
    if (!/^[A-Z]$/u.test(input)) {
      return { message: `Invalid atom "${input}": atoms are single uppercase letters` };
    }
    return { formula: atom(input) };
  }

  if (input.startsWith('~')) {
    const operand = parseStripped(input.slice(1));
    return 'formula' in operand ? { formula: negate(operand.formula) } : operand;
  }

  if (input.startsWith('(') && input.endsWith(')')) {
    return parseBinary(input);
  }

  return { message: `Unexpected "${input}": expected an atom, a negation or a bracketed formula` };
}

function parseBinary(input: string): Attempt {
  const inner = input.slice(1, -1);
  const found = findMainConnective(input, inner);
  if ('message' in found) {
    return found;
  }

  const left = parseStripped(inner.slice(0, found.start));
  if ('message' in left) {
    return left;
  }
  const right = parseStripped(inner.slice(found.end));
  if ('message' in right) {
    return right;
  }
  return { formula: binary(found.operator, left.formula, right.formula) };
}

// Only connectives at bracket depth 0 are candidates, and there has to be exactly one of those
function findMainConnective(input: string, inner: string): MainConnective | { message: string } {
  const connectives: MainConnective[] = [];
  let depth = 0;
  for (let i = 0; i < inner.length; ++i) {
    const char = inner[i];
    if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      depth -= 1;
      if (depth < 0) {
        return { message: `Unbalanced brackets in "${input}"` };
      }
    } else if (depth === 0) {
      const match = CONNECTIVE_TOKENS.find(({ token }): boolean => inner.startsWith(token, i));
      if (match) {
        connectives.push({ operator: match.operator, start: i, end: i + match.token.length });
        i += match.token.length - 1;
      } else if (char === '-') {
        return { message: `Expected "->" after "-" in "${input}"` };
      } else if (char === '<') {
        return { message: `Expected "<->" after "<" in "${input}"` };
      }
    }
  }

  if (depth !== 0) {
    return { message: `Unbalanced brackets in "${input}"` };
  }
  if (connectives.length === 0) {
    return { message: `No main connective in "${input}"` };
  }
  if (connectives.length > 1) {
    return { message: `More than one main connective in "${input}"` };
  }
  return connectives[0];
}

export function stringifyFormula(formula: Formula): string {
  switch (formula.kind) {
    case 'Atom':
      return formula.letter;
    case 'Negation':
      return `~${stringifyFormula(formula.operand)}`;
    case 'Binary':
      return `(${stringifyFormula(formula.left)} ${OPERATOR_SYMBOLS[formula.operator]} ${
        stringifyFormula(formula.right)})`;
  }
}

export function stringifyValuation(valuation: Valuation, indent = ''): string {
  return Object.entries(valuation)
    .map(([ letter, value ]): string => `${indent}${letter}: ${value}`)
    .join('\n');
}
