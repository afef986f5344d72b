/**
 * @file elimination.ts
 * @description Solves polynomial systems by eliminating one unknown at a time.
 * Linear occurrences are eliminated by substitution, dividing by a monomial
 * coefficient when no constant one exists; univariate relations are solved for
 * their real roots and every root is followed separately.
 */

import {
    Polynomial, PolyTerm, ZERO, makeMonomial, monoMul, monoPow, polyCoefficientsIn, polyDegreeIn,
    polyFromTerms, polyHasOpaqueIn, polyMinExponentIn, polyMul, polyMulTerm, polyPow, polyScale,
    polySubstitute, polyToExpr, polyVariables, exprToPoly, singleTerm, polyNumber
} from './polynomial';
import { realRoots } from './roots';
import { toBaseUnits } from './units';
import { substituteVariables } from './utils';
import type { Expr } from './types';
import { MAX_ELIMINATION_DEPTH } from './constants';

export const UNDETERMINED = 'undetermined';

/** Values of eliminated unknowns; unknowns left free are absent. */
export type Assignment = Map<string, Polynomial>;

export type EliminationOutcome = Assignment[] | typeof UNDETERMINED;

function intersect(names: ReadonlySet<string>, unknowns: ReadonlySet<string>): string[] {
    return [...names].filter(n => unknowns.has(n)).sort();
}

/**
 * Multiplies away negative powers of unknowns. Each unknown that appeared in a
 * denominator is recorded, since it may not be zero in a solution.
 */
function clearDenominators(p: Polynomial, unknowns: ReadonlySet<string>, nonzero: Set<string>): Polynomial {
    let result = p;
    for (const name of intersect(polyVariables(p), unknowns)) {
        const lowest = polyMinExponentIn(result, name);
        if (lowest < 0) {
            result = polyMulTerm(result, { coeff: 1, mono: makeMonomial([[{ kind: 'var', name }, -lowest]]) });
            nonzero.add(name);
        }
    }
    return result;
}

/** A coefficient as one term, collapsing mixed units of one dimension (cm + m) through base units. */
function asSingleTerm(coeff: Polynomial): PolyTerm | undefined {
    return singleTerm(coeff) ?? singleTerm(exprToPoly(toBaseUnits(polyToExpr(coeff))));
}

function invert(coeff: Polynomial): Polynomial | undefined {
    const term = asSingleTerm(coeff);
    if (!term) return undefined;
    return polyPow(polyFromTerms([term]), -1);
}

interface LinearStep {
    index: number;
    name: string;
    value: Polynomial;
    /** Unknowns in the coefficient that was divided out; none of them may be zero. */
    guards: string[];
}

/**
 * A relation linear in some unknown, solved for it. With `allowUnknownLead`, a
 * single-term coefficient mentioning other unknowns (the `y` of `x*y - 6`) may
 * be divided out, leaving negative powers for the next round.
 */
function findLinearStep(polys: readonly Polynomial[], unknowns: ReadonlySet<string>, allowUnknownLead: boolean): LinearStep | undefined {
    for (let index = 0; index < polys.length; index++) {
        const p = polys[index];
        for (const name of intersect(polyVariables(p), unknowns)) {
            if (polyDegreeIn(p, name) !== 1) continue;
            const coeffs = polyCoefficientsIn(p, name);
            const lead = coeffs.get(1);
            if (!lead) continue;
            const guards = intersect(polyVariables(lead), unknowns);
            if (guards.length > 0 && !(allowUnknownLead && singleTerm(lead))) continue;
            const inverse = invert(lead);
            if (!inverse) continue;
            const value = polyMul(polyScale(coeffs.get(0) ?? ZERO, -1), inverse);
            return { index, name, value, guards };
        }
    }
    return undefined;
}

function findUnivariateStep(polys: readonly Polynomial[], unknowns: ReadonlySet<string>): { index: number, name: string } | undefined {
    for (let index = 0; index < polys.length; index++) {
        const names = [...polyVariables(polys[index])];
        // Exactly one variable, and it is an unknown: coefficients carry at most units
        if (names.length === 1 && unknowns.has(names[0])) return { index, name: names[0] };
    }
    return undefined;
}

/**
 * Real roots of a polynomial in one unknown whose coefficients may carry
 * units. The unit of the unknown is factored out first, so `x^2 - 4*m^2`
 * yields `-2*m` and `2*m`. Returns `undefined` when the roots cannot be
 * expressed (e.g. they would need a fractional power of a unit).
 */
export function univariateRoots(p: Polynomial, name: string): Polynomial[] | undefined {
    const terms = new Map<number, PolyTerm>();
    for (const [k, coeff] of polyCoefficientsIn(p, name)) {
        const term = asSingleTerm(coeff);
        if (!term) return undefined;
        terms.set(k, term);
    }
    const degrees = [...terms.keys()];
    const n = Math.max(...degrees);
    const low = Math.min(...degrees);
    if (n === 0) return undefined;
    if (terms.size === 1) return [ZERO];

    const top = terms.get(n);
    const bottom = terms.get(low);
    if (!top || !bottom) return undefined;
    const span = n - low;
    const ratio = monoMul(bottom.mono, monoPow(top.mono, -1));
    if (ratio.factors.some(([, e]) => e % span !== 0)) return undefined;
    const unitOfRoot = makeMonomial(ratio.factors.map(([atom, e]) => [atom, Math.round(e / span)] as const));

    const numeric: number[] = new Array<number>(n + 1).fill(0);
    for (const [k, term] of terms) {
        const expected = monoMul(top.mono, monoPow(unitOfRoot, n - k));
        // Terms of different dimensions can never cancel
        if (expected.key !== term.mono.key) return [];
        numeric[k] = term.coeff;
    }
    return realRoots(numeric).map(root => polyFromTerms([{ coeff: root, mono: unitOfRoot }]));
}

function resolveAssignment(value: Polynomial, assignment: Assignment): Polynomial {
    if (assignment.size === 0) return value;
    const exprs = new Map<string, Expr>();
    for (const [name, v] of assignment) exprs.set(name, polyToExpr(v));
    return exprToPoly(substituteVariables(polyToExpr(value), exprs));
}

function substituteAll(polys: readonly Polynomial[], skip: number, name: string, value: Polynomial): Polynomial[] | undefined {
    const result: Polynomial[] = [];
    for (let i = 0; i < polys.length; i++) {
        if (i === skip) continue;
        const substituted = polySubstitute(polys[i], name, value);
        if (substituted === undefined) return undefined;
        result.push(substituted);
    }
    return result;
}

/**
 * Solves `polys = 0` for the given unknowns.
 * @returns Every solution found (possibly with unknowns left free), `[]` when
 * the system is provably inconsistent, or `UNDETERMINED` when the system is
 * outside what elimination can treat.
 */
export function eliminate(polys: readonly Polynomial[], unknowns: ReadonlySet<string>, depth = 0): EliminationOutcome {
    if (depth > MAX_ELIMINATION_DEPTH) throw new Error(`Elimination depth exceeded (depth: ${depth})`);

    const nonzero = new Set<string>();
    const prepared: Polynomial[] = [];
    for (const p of polys) {
        if (polyHasOpaqueIn(p, unknowns)) return UNDETERMINED;
        const cleared = clearDenominators(p, unknowns, nonzero);
        if (cleared.size === 0) continue;
        const variables = polyVariables(cleared);
        if (intersect(variables, unknowns).length === 0) {
            // A nonzero constant can never vanish; one mentioning only non-target variables is out of reach
            if (variables.size === 0) return [];
            return UNDETERMINED;
        }
        prepared.push(cleared);
    }
    if (prepared.length === 0) return [new Map()];

    let outcome: EliminationOutcome;
    const linear = findLinearStep(prepared, unknowns, false);
    const univariate = linear ? undefined : findUnivariateStep(prepared, unknowns);
    const divided = linear || univariate ? undefined : findLinearStep(prepared, unknowns, true);
    if (linear) {
        outcome = eliminateLinear(prepared, unknowns, linear, depth);
    } else if (univariate) {
        outcome = eliminateUnivariate(prepared, unknowns, univariate.index, univariate.name, depth);
    } else if (divided) {
        divided.guards.forEach(name => nonzero.add(name));
        outcome = eliminateLinear(prepared, unknowns, divided, depth);
    } else {
        return UNDETERMINED;
    }
    if (outcome === UNDETERMINED) return outcome;
    return outcome.filter(assignment => [...nonzero].every(name => {
        const value = assignment.get(name);
        return value === undefined || polyNumber(value) !== 0;
    }));
}

function eliminateLinear(polys: readonly Polynomial[], unknowns: ReadonlySet<string>, step: LinearStep, depth: number): EliminationOutcome {
    const rest = substituteAll(polys, step.index, step.name, step.value);
    if (rest === undefined) return UNDETERMINED;
    const remaining = new Set(unknowns);
    remaining.delete(step.name);
    const outcome = eliminate(rest, remaining, depth + 1);
    if (outcome === UNDETERMINED) return outcome;
    return outcome.map(assignment => {
        const result: Assignment = new Map(assignment);
        result.set(step.name, resolveAssignment(step.value, assignment));
        return result;
    });
}

function eliminateUnivariate(polys: readonly Polynomial[], unknowns: ReadonlySet<string>, index: number, name: string, depth: number): EliminationOutcome {
    const roots = univariateRoots(polys[index], name);
    if (roots === undefined) return UNDETERMINED;
    const remaining = new Set(unknowns);
    remaining.delete(name);

    const results: Assignment[] = [];
    for (const root of roots) {
        const rest = substituteAll(polys, index, name, root);
        if (rest === undefined) return UNDETERMINED;
        const outcome = eliminate(rest, remaining, depth + 1);
        if (outcome === UNDETERMINED) return outcome;
        for (const assignment of outcome) {
            const result: Assignment = new Map(assignment);
            result.set(name, root);
            results.push(result);
        }
    }
    return results;
}
