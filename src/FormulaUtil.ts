export const OPERATORS = [ 'AND', 'OR', 'IMPLIES', 'IFF' ] as const;

export type Operator = typeof OPERATORS[number];

export type Atom = {
  kind: 'Atom';
  letter: string;
};

export type Negation = {
  kind: 'Negation';
  operand: Formula;
};

export type Binary = {
  kind: 'Binary';
  operator: Operator;
  left: Formula;
  right: Formula;
};

export type Formula = Atom | Negation | Binary;

export type NegatedAtom = Negation & { operand: Atom };

export type Literal = Atom | NegatedAtom;

export type Valuation = Record<string, boolean>;

export function atom(letter: string): Atom {
  if (!/^[A-Z]$/u.test(letter)) {
    throw new Error(`Invalid atom letter ${JSON.stringify(letter)}`);
  }
  return { kind: 'Atom', letter };
}

export function negate(operand: Atom): NegatedAtom;
export function negate(operand: Formula): Negation;
export function negate(operand: Formula): Negation {
  return { kind: 'Negation', operand };
}

export function binary(operator: Operator, left: Formula, right: Formula): Binary {
  return { kind: 'Binary', operator, left, right };
}

export function and(left: Formula, right: Formula): Binary {
  return binary('AND', left, right);
}

export function or(left: Formula, right: Formula): Binary {
  return binary('OR', left, right);
}

export function implies(left: Formula, right: Formula): Binary {
  return binary('IMPLIES', left, right);
}

export function iff(left: Formula, right: Formula): Binary {
  return binary('IFF', left, right);
}

export function isBinary<T extends Operator>(formula: Formula, operator: T): formula is Binary & { operator: T } {
  return formula.kind === 'Binary' && formula.operator === operator;
}

export function isLiteral(formula: Formula): formula is Literal {
  return formula.kind === 'Atom' || (formula.kind === 'Negation' && formula.operand.kind === 'Atom');
}

// The letter of a literal, together with whether it is the affirmed or the denied one
export function literalLetter(literal: Literal): { letter: string; positive: boolean } {
  if (literal.kind === 'Atom') {
    return { letter: literal.letter, positive: true };
  }
  return { letter: literal.operand.letter, positive: false };
}

export function formulaEquals(left: Formula, right: Formula): boolean {
  if (left === right) {
    return true;
  }
  switch (left.kind) {
    case 'Atom':
      return right.kind === 'Atom' && left.letter === right.letter;
    case 'Negation':
      return right.kind === 'Negation' && formulaEquals(left.operand, right.operand);
    case 'Binary':
      return right.kind === 'Binary' &&
        left.operator === right.operator &&
        formulaEquals(left.left, right.left) &&
        formulaEquals(left.right, right.right);
  }
}

/**
 * All atom letters of the formula, in the order they first appear when reading it left to right.
 */
export function collectLetters(formula: Formula, letters: string[] = []): string[] {
  switch (formula.kind) {
    case 'Atom':
      if (!letters.includes(formula.letter)) {
        letters.push(formula.letter);
      }
      break;
    case 'Negation':
      collectLetters(formula.operand, letters);
      break;
    case 'Binary':
      collectLetters(formula.left, letters);
      collectLetters(formula.right, letters);
      break;
  }
  return letters;
}

export function evaluateFormula(formula: Formula, valuation: Valuation): boolean {
  switch (formula.kind) {
    case 'Atom': {
      const value = valuation[formula.letter];
      if (typeof value !== 'boolean') {
        throw new Error(`No truth value for ${formula.letter}`);
      }
      return value;
    }
    case 'Negation':
      return !evaluateFormula(formula.operand, valuation);
    case 'Binary': {
      const left = evaluateFormula(formula.left, valuation);
      const right = evaluateFormula(formula.right, valuation);
      switch (formula.operator) {
        case 'AND':
          return left && right;
        case 'OR':
          return left || right;
        case 'IMPLIES':
          return !left || right;
        case 'IFF':
          return left === right;
      }
    }
  }
}

// 2^n entries, the first one has every letter false
export function* allValuations(letters: string[]): IterableIterator<Valuation> {
  const count = 2 ** letters.length;
  for (let mask = 0; mask < count; ++mask) {
    const valuation: Valuation = {};
    for (const [ idx, letter ] of letters.entries()) {
      valuation[letter] = (mask & (1 << (letters.length - idx - 1))) !== 0;
    }
    yield valuation;
  }
}
