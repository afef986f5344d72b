/**
 * @file classifier.ts
 * @description Decides whether the two sides of a relation give a usable
 * equation, a redundant statement, or a contradiction.
 */

import { Classification, Expr } from './types';
import { AlgebraOracle, difference } from './algebra';
import { UnitSubstitution, evaluate, hasUnits, toBaseUnits } from './units';
import { numericLiterals } from './utils';

/**
 * Smallest nonzero magnitude among the constants seen so far. Zero comparisons
 * are scaled by it so that values far below the problem's natural scale are not
 * mistaken for nonzero ones. Before anything is observed the reference is 1.
 */
export class MinFloatTracker {
    private smallest = Infinity;

    observe(value: number): void {
        const magnitude = Math.abs(value);
        if (magnitude > 0 && Number.isFinite(magnitude) && magnitude < this.smallest) this.smallest = magnitude;
    }

    get value(): number {
        return Number.isFinite(this.smallest) ? this.smallest : 1;
    }

    reset(): void {
        this.smallest = Infinity;
    }
}

export interface ClassifierSettings {
    readonly epsilon: number;
    readonly oracle: AlgebraOracle;
    /** Two independent unit substitutions; constants must agree under both. */
    readonly substitutions: readonly [UnitSubstitution, UnitSubstitution];
    readonly tracker: MinFloatTracker;
}

export class EquationClassifier {
    constructor(private readonly settings: ClassifierSettings) {}

    get tracker(): MinFloatTracker {
        return this.settings.tracker;
    }

    isConstant(expr: Expr): boolean {
        return this.settings.oracle.freeVariables(expr).size === 0;
    }

    classify(lhs: Expr, rhs: Expr): Classification {
        const lhsConstant = this.isConstant(lhs);
        const rhsConstant = this.isConstant(rhs);
        if (lhsConstant && rhsConstant) {
            // Identical non-finite values (sqrt(-1), 10/0) only compare equal symbolically
            if (this.differenceIsZero(lhs, rhs)) return Classification.Redundant;
            return this.constantsAgree(lhs, rhs) ? Classification.Redundant : Classification.Contradiction;
        }
        // The non-constant side goes first
        const [first, second] = lhsConstant ? [rhs, lhs] : [lhs, rhs];
        return this.differenceIsZero(first, second) ? Classification.Redundant : Classification.Usable;
    }

    /** Feeds every numeric literal of a usable relation to the min-float tracker. */
    observe(...sides: Expr[]): void {
        for (const side of sides) numericLiterals(side).forEach(v => this.settings.tracker.observe(v));
    }

    private differenceIsZero(a: Expr, b: Expr): boolean {
        const { oracle } = this.settings;
        const diff = oracle.simplify(difference(a, b));
        if (isZero(diff)) return true;
        // Mixed units of one dimension (100*cm*x - m*x) only cancel in base units
        if (hasUnits(a) || hasUnits(b)) return isZero(oracle.simplify(toBaseUnits(diff)));
        return false;
    }

    private constantsAgree(lhs: Expr, rhs: Expr): boolean {
        return this.settings.substitutions.every(substitution =>
            this.numbersAgree(evaluate(lhs, substitution), evaluate(rhs, substitution)));
    }

    numbersAgree(a: number, b: number): boolean {
        const { epsilon, tracker } = this.settings;
        if (!Number.isFinite(a) || !Number.isFinite(b)) return false;
        if (a === 0 || b === 0) return Math.abs(a === 0 ? b : a) <= epsilon * tracker.value;
        return Math.abs(a - b) <= epsilon * Math.abs(a + b);
    }
}

function isZero(expr: Expr): boolean {
    return expr.tag === 'Num' && expr.value === 0;
}
