import { checkDerivation } from '../../src/CheckUtil';
import { decide } from '../../src/DecideUtil';
import type { Derivation } from '../../src/DerivationUtil';
import { appendRow, createDerivation, popScope, RULES, stringifyDerivation } from '../../src/DerivationUtil';
import { and, atom, iff, implies, negate } from '../../src/FormulaUtil';
import {
  arrowIntroduction,
  assume,
  conjunctionIntroduction,
  contradictionCheck,
  negationElimination,
  reductio,
} from '../../src/ReductioUtil';
import { parse } from '../util/TestUtil';

describe('ReductioUtil', (): void => {
  const A = atom('A');
  const B = atom('B');
  let derivation: Derivation;

  beforeEach(async(): Promise<void> => {
    derivation = createDerivation();
  });

  describe('#contradictionCheck', (): void => {
    it('stores the literal as an ion and returns it if there is no contradiction.', async(): Promise<void> => {
      assume(derivation, negate(A));
      expect(contradictionCheck(derivation, negate(A))).toEqual(negate(A));
      expect(derivation.scopes[0].ions).toEqual([{ row: 1, positive: false, letter: 'A' }]);
      expect(derivation.rows).toHaveLength(1);
    });

    it('discharges the innermost assumption on a contradiction.', async(): Promise<void> => {
      reductio(derivation, assume(derivation, negate(A)));
      expect(reductio(derivation, assume(derivation, A))).toEqual(implies(A, and(A, negate(A))));
      expect(stringifyDerivation(derivation)).toBe([
        '1. | ~A    Assume',
        '2. | | A    Assume',
        '3. | | (A & ~A)    & intro. 1, 2',
        '4. | (A -> (A & ~A))    -> intro. 2, 3',
      ].join('\n'));
      expect(derivation.scopes).toHaveLength(1);
    });

    it('exchanges the contradiction for the goal.', async(): Promise<void> => {
      reductio(derivation, assume(derivation, negate(A)));
      const goal = and(B, negate(B));
      expect(reductio(derivation, assume(derivation, A), goal)).toEqual(implies(A, goal));
      expect(stringifyDerivation(derivation)).toBe([
        '1. | ~A    Assume',
        '2. | | A    Assume',
        '3. | | (A & ~A)    & intro. 1, 2',
        '4. | | (B & ~B)    Any Contra. 3',
        '5. | (A -> (B & ~B))    -> intro. 2, 4',
      ].join('\n'));
    });

    it('does not exchange if the contradiction already is the goal.', async(): Promise<void> => {
      reductio(derivation, assume(derivation, negate(A)));
      reductio(derivation, assume(derivation, A), and(A, negate(A)));
      expect(derivation.rows.map((row): string => row.rule)).toEqual([ 'Assume', 'Assume', '& intro.', '-> intro.' ]);
    });
  });

  describe('#reductio', (): void => {
    it('stops at the first side of a conjunction that leads to a contradiction.', async(): Promise<void> => {
      const formula = parse('((A & ~A) & B)');
      reductio(derivation, assume(derivation, negate(B)));
      expect(reductio(derivation, assume(derivation, formula))).toEqual(implies(formula, and(A, negate(A))));
      expect(derivation.rows.map((row): string => row.rule)).toEqual([
        'Assume',
        'Assume',
        '& elim.',
        '& elim.',
        '& elim.',
        '& intro.',
        '-> intro.',
      ]);
    });

    it('completes the derivation once all assumptions are discharged.', async(): Promise<void> => {
      const target = implies(A, A);
      assume(derivation, negate(target));
      appendRow(derivation, and(A, negate(A)), RULES.conjunctionIntroduction, [ 1 ]);
      popScope(derivation);
      expect(reductio(derivation, implies(negate(target), and(A, negate(A))))).toEqual(target);
      expect(derivation.rows.at(-1)).toEqual({ index: 3, openScopes: 0, formula: target, rule: '~ elim.', cited: [ 2 ]});
    });

    it('returns conditionals unchanged while assumptions are open.', async(): Promise<void> => {
      assume(derivation, A);
      expect(reductio(derivation, implies(A, B))).toEqual(implies(A, B));
      expect(derivation.rows).toHaveLength(1);
    });

    it('errors on formulas that can not occur in DNF.', async(): Promise<void> => {
      assume(derivation, A);
      expect((): unknown => reductio(derivation, iff(A, B))).toThrow('Unable to continue the proof from (A <-> B)');
      expect((): unknown => reductio(derivation, negate(negate(A)))).toThrow('Unable to continue the proof from ~~A');
    });

    it('errors if the first side of a disjunction has no contradiction.', async(): Promise<void> => {
      assume(derivation, parse('(A v (B & ~B))'));
      expect((): unknown => reductio(derivation, parse('(A v (B & ~B))')))
        .toThrow('Assuming A did not lead to a contradiction');
    });

    it('makes nested disjunctions converge on the same conclusion.', async(): Promise<void> => {
      const formula = parse('~((A & ~A) v ((B & ~B) v (C & ~C)))');
      const result = decide(formula);
      if (result.type !== 'Tautology') {
        throw new Error('Expected a proof');
      }
      expect(stringifyDerivation(result.proof)).toBe([
        '1. | ~~((A & ~A) v ((B & ~B) v (C & ~C)))    Assume',
        '2. | ((A & ~A) v ((B & ~B) v (C & ~C)))    ~~ elim. 1',
        '3. | | (A & ~A)    Assume',
        '4. | | A    & elim. 3',
        '5. | | ~A    & elim. 3',
        '6. | | (A & ~A)    & intro. 4, 5',
        '7. | ((A & ~A) -> (A & ~A))    -> intro. 3, 6',
        '8. | | ((B & ~B) v (C & ~C))    Assume',
        '9. | | | (B & ~B)    Assume',
        '10. | | | B    & elim. 9',
        '11. | | | ~B    & elim. 9',
        '12. | | | (B & ~B)    & intro. 10, 11',
        '13. | | | (A & ~A)    Any Contra. 12',
        '14. | | ((B & ~B) -> (A & ~A))    -> intro. 9, 13',
        '15. | | | (C & ~C)    Assume',
        '16. | | | C    & elim. 15',
        '17. | | | ~C    & elim. 15',
        '18. | | | (C & ~C)    & intro. 16, 17',
        '19. | | | (A & ~A)    Any Contra. 18',
        '20. | | ((C & ~C) -> (A & ~A))    -> intro. 15, 19',
        '21. | | (A & ~A)    v elim. 8, 14, 20',
        '22. | (((B & ~B) v (C & ~C)) -> (A & ~A))    -> intro. 8, 21',
        '23. | (A & ~A)    v elim. 2, 7, 22',
        '24. (~~((A & ~A) v ((B & ~B) v (C & ~C))) -> (A & ~A))    -> intro. 1, 23',
        '25. ~((A & ~A) v ((B & ~B) v (C & ~C)))    ~ elim. 24',
      ].join('\n'));
      expect(checkDerivation(result.proof, formula)).toEqual([]);
    });
  });

  describe('#conjunctionIntroduction', (): void => {
    it('cites both rows.', async(): Promise<void> => {
      assume(derivation, A);
      assume(derivation, negate(A));
      expect(conjunctionIntroduction(derivation, 'A', 1, 2)).toEqual(and(A, negate(A)));
      expect(derivation.rows[2].cited).toEqual([ 1, 2 ]);
    });
  });

  describe('#arrowIntroduction', (): void => {
    it('errors without open assumption.', async(): Promise<void> => {
      expect((): unknown => arrowIntroduction(derivation, A))
        .toThrow('Unable to discharge an assumption as there is no open scope');
    });
  });

  describe('#negationElimination', (): void => {
    it('only accepts negated assumptions.', async(): Promise<void> => {
      appendRow(derivation, A, RULES.assume, []);
      expect((): unknown => negationElimination(derivation, A))
        .toThrow('Expected a negated assumption instead of A');
    });
  });
});
