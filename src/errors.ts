/**
 * @file errors.ts
 * @description Error types raised by equation systems.
 */

import type { ContradictionRecord, Relation } from './types';
import { printExpr } from './utils';

/**
 * A malformed declaration: bad variable names, equation methods returning the
 * wrong number of sides, variables added after branching, invalid options.
 * The engine cannot recover from these; the declaration must be fixed.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export function printRelation(relation: Relation): string {
    return `${printExpr(relation.lhs)} = ${printExpr(relation.rhs)}`;
}

/**
 * Raised at the end of `solve()` when no branch holds a consistent assignment,
 * or when a provably unsolvable relation set was met and the pass changed nothing.
 */
export class UnsolvableSystemError extends Error {
    constructor(
        public readonly contradictions: readonly ContradictionRecord[],
        public readonly unsolvableSets: readonly (readonly Relation[])[] = []
    ) {
        const found = contradictions.map(c => `[${c.relations.map(printRelation).join(', ')}]`);
        const unsolvable = unsolvableSets.map(set => `[${set.map(printRelation).join(', ')}]`);
        let message = 'Given equations have no consistent solutions. Please check your equations and try again.';
        if (found.length > 0) message += `\nContradiction(s) found: ${found.join('; ')}`;
        if (unsolvable.length > 0) message += `\nUnsolvable relation set(s): ${unsolvable.join('; ')}`;
        super(message);
        this.name = 'UnsolvableSystemError';
    }
}

/**
 * Thrown by numeric reads of values that are not plain numbers yet. It is a
 * TypeError so that procedures reading unresolved inputs are skipped for the
 * current pass instead of failing the solve.
 */
export class UnresolvedValueError extends TypeError {
    constructor(public readonly variable: string, valueText: string) {
        super(`Variable ${variable} is not resolved to a number (current value: ${valueText})`);
        this.name = 'UnresolvedValueError';
    }
}
