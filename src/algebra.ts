/**
 * @file algebra.ts
 * @description The algebra oracle contract the solver consumes, and the
 * bundled polynomial implementation of it.
 */

import { Expr, Relation, Solution, SolutionSet, Sum, Product, Num } from './types';
import { exprToPoly, polyKey, polyToExpr, polyVariables, simplifyExpr } from './polynomial';
import { eliminate, UNDETERMINED, Assignment } from './elimination';

/**
 * Symbolic services the solver delegates to. Implementations decide how
 * expressions are normalized; the solver only relies on these three queries.
 */
export interface AlgebraOracle {
    simplify(expr: Expr): Expr;
    /** Unknowns the expression still depends on after simplification. Units are not variables. */
    freeVariables(expr: Expr): Set<string>;
    /**
     * Solves the relations for exactly the given unknowns.
     * A unique result may still mention unknowns; callers check completeness.
     */
    solve(relations: readonly Relation[], unknowns: readonly string[]): SolutionSet;
}

export function difference(lhs: Expr, rhs: Expr): Expr {
    return Sum(lhs, Product(Num(-1), rhs));
}

function assignmentKey(assignment: Assignment): string {
    return [...assignment.keys()].sort().map(name => {
        const value = assignment.get(name);
        return `${name}=${value ? polyKey(value) : ''}`;
    }).join(';');
}

function toSolution(assignment: Assignment): Solution {
    const solution = new Map<string, Expr>();
    for (const name of [...assignment.keys()].sort()) {
        const value = assignment.get(name);
        if (value) solution.set(name, polyToExpr(value));
    }
    return solution;
}

/**
 * Oracle backed by the canonical polynomial form: simplification is
 * normalization, and solving is elimination over real roots.
 */
export class PolynomialOracle implements AlgebraOracle {
    simplify(expr: Expr): Expr {
        return simplifyExpr(expr);
    }

    freeVariables(expr: Expr): Set<string> {
        return polyVariables(exprToPoly(expr));
    }

    solve(relations: readonly Relation[], unknowns: readonly string[]): SolutionSet {
        const polys = relations.map(r => exprToPoly(difference(r.lhs, r.rhs)));
        const outcome = eliminate(polys, new Set(unknowns));
        if (outcome === UNDETERMINED) return { kind: 'undetermined' };

        const seen = new Set<string>();
        const candidates: Solution[] = [];
        for (const assignment of outcome) {
            const key = assignmentKey(assignment);
            if (seen.has(key)) continue;
            seen.add(key);
            candidates.push(toSolution(assignment));
        }
        if (candidates.length === 0) return { kind: 'empty' };
        if (candidates.length === 1) return { kind: 'unique', solution: candidates[0] };
        return { kind: 'multiple', candidates };
    }
}

export const defaultOracle: AlgebraOracle = new PolynomialOracle();
