/**
 * @file polynomial.ts
 * @description Canonical form of expressions: sparse Laurent polynomials over
 * atoms (unknowns, unit tags, and opaque non-polynomial subterms), with
 * conversion to and from the expression tree.
 */

import { Expr, FunctionName, Num, Sym, Unit, Sum, Product, Power, Call } from './types';
import { CANCEL_TOLERANCE, MAX_EXPANSION_POWER } from './constants';
import { exprKey, exprVariables, exprUnits, formatNumber } from './utils';

export type Atom =
    | { kind: 'var', name: string }
    | { kind: 'unit', name: string }
    // Anything that is not a polynomial in its atoms, kept whole, e.g. sin(x) or 1/(x + 1)
    | { kind: 'opaque', expr: Expr, key: string };

export type MonomialFactor = readonly [Atom, number];

export interface Monomial {
    readonly key: string;
    readonly factors: readonly MonomialFactor[];
}

export interface PolyTerm {
    readonly coeff: number;
    readonly mono: Monomial;
}

/** Terms keyed by their monomial key. Never contains a zero coefficient. */
export type Polynomial = ReadonlyMap<string, PolyTerm>;

export const ONE_MONOMIAL: Monomial = { key: '', factors: [] };
export const ZERO: Polynomial = new Map();

export function atomKey(atom: Atom): string {
    switch (atom.kind) {
        case 'var': return atom.name;
        case 'unit': return `[${atom.name}]`;
        case 'opaque': return `{${atom.key}}`;
    }
}

function atomRank(atom: Atom): number {
    switch (atom.kind) {
        case 'var': return 0;
        case 'opaque': return 1;
        case 'unit': return 2;
    }
}

function compareFactors([a]: MonomialFactor, [b]: MonomialFactor): number {
    const rank = atomRank(a) - atomRank(b);
    if (rank !== 0) return rank;
    const ka = atomKey(a);
    const kb = atomKey(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
}

export function makeMonomial(factors: Iterable<MonomialFactor>): Monomial {
    const merged = new Map<string, [Atom, number]>();
    for (const [atom, exponent] of factors) {
        const key = atomKey(atom);
        const existing = merged.get(key);
        merged.set(key, [atom, (existing ? existing[1] : 0) + exponent]);
    }
    const sorted = [...merged.values()].filter(([, e]) => e !== 0).sort(compareFactors);
    const key = sorted.map(([atom, e]) => e === 1 ? atomKey(atom) : `${atomKey(atom)}^${e}`).join('*');
    return { key, factors: sorted };
}

export function monoMul(a: Monomial, b: Monomial): Monomial {
    if (a.factors.length === 0) return b;
    if (b.factors.length === 0) return a;
    return makeMonomial([...a.factors, ...b.factors]);
}

export function monoPow(m: Monomial, k: number): Monomial {
    return makeMonomial(m.factors.map(([atom, e]) => [atom, e * k] as const));
}

function mergeInto(target: Map<string, PolyTerm>, term: PolyTerm): void {
    if (term.coeff === 0) return;
    const key = term.mono.key;
    const existing = target.get(key);
    if (!existing) {
        target.set(key, term);
        return;
    }
    const sum = existing.coeff + term.coeff;
    if (Math.abs(sum) <= CANCEL_TOLERANCE * (Math.abs(existing.coeff) + Math.abs(term.coeff))) {
        target.delete(key);
    } else {
        target.set(key, { coeff: sum, mono: existing.mono });
    }
}

export function polyFromTerms(terms: Iterable<PolyTerm>): Polynomial {
    const result = new Map<string, PolyTerm>();
    for (const term of terms) mergeInto(result, term);
    return result;
}

export function polyConst(value: number): Polynomial {
    return polyFromTerms([{ coeff: value, mono: ONE_MONOMIAL }]);
}

export function polyAtom(atom: Atom): Polynomial {
    return polyFromTerms([{ coeff: 1, mono: makeMonomial([[atom, 1]]) }]);
}

export const polyVar = (name: string): Polynomial => polyAtom({ kind: 'var', name });
export const polyUnit = (name: string): Polynomial => polyAtom({ kind: 'unit', name });

function opaque(expr: Expr): Polynomial {
    return polyAtom({ kind: 'opaque', expr, key: exprKey(expr) });
}

export function polyAdd(a: Polynomial, b: Polynomial): Polynomial {
    const result = new Map(a);
    for (const term of b.values()) mergeInto(result, term);
    return result;
}

export function polyScale(p: Polynomial, factor: number): Polynomial {
    return polyFromTerms([...p.values()].map(t => ({ coeff: t.coeff * factor, mono: t.mono })));
}

export function polyMulTerm(p: Polynomial, term: PolyTerm): Polynomial {
    return polyFromTerms([...p.values()].map(t => ({ coeff: t.coeff * term.coeff, mono: monoMul(t.mono, term.mono) })));
}

export function polyMul(a: Polynomial, b: Polynomial): Polynomial {
    const result = new Map<string, PolyTerm>();
    for (const ta of a.values()) {
        for (const tb of b.values()) {
            mergeInto(result, { coeff: ta.coeff * tb.coeff, mono: monoMul(ta.mono, tb.mono) });
        }
    }
    return result;
}

export function singleTerm(p: Polynomial): PolyTerm | undefined {
    if (p.size !== 1) return undefined;
    const [term] = p.values();
    return term;
}

/**
 * Raises a polynomial to an integer power. Negative powers only exist for
 * single-term polynomials; `undefined` means the result is not a polynomial.
 */
export function polyPow(p: Polynomial, n: number): Polynomial | undefined {
    if (n === 0) return polyConst(1);
    const term = singleTerm(p);
    if (term) {
        return polyFromTerms([{ coeff: Math.pow(term.coeff, n), mono: monoPow(term.mono, n) }]);
    }
    if (n < 0 || n > MAX_EXPANSION_POWER) return undefined;
    if (p.size === 0) return ZERO;
    let result = p;
    for (let i = 1; i < n; i++) result = polyMul(result, p);
    return result;
}

/** The value of a polynomial without atoms, otherwise `undefined`. */
export function polyNumber(p: Polynomial): number | undefined {
    if (p.size === 0) return 0;
    const term = singleTerm(p);
    if (term && term.mono.factors.length === 0) return term.coeff;
    return undefined;
}

function atomVariables(atom: Atom): string[] {
    switch (atom.kind) {
        case 'var': return [atom.name];
        case 'unit': return [];
        case 'opaque': return [...exprVariables(atom.expr)];
    }
}

function atomUnits(atom: Atom): string[] {
    switch (atom.kind) {
        case 'var': return [];
        case 'unit': return [atom.name];
        case 'opaque': return [...exprUnits(atom.expr)];
    }
}

export function polyVariables(p: Polynomial): Set<string> {
    const names = new Set<string>();
    for (const term of p.values()) {
        for (const [atom] of term.mono.factors) atomVariables(atom).forEach(n => names.add(n));
    }
    return names;
}

export function polyUnits(p: Polynomial): Set<string> {
    const names = new Set<string>();
    for (const term of p.values()) {
        for (const [atom] of term.mono.factors) atomUnits(atom).forEach(n => names.add(n));
    }
    return names;
}

/** True when some opaque atom of `p` mentions one of the given unknowns. */
export function polyHasOpaqueIn(p: Polynomial, names: ReadonlySet<string>): boolean {
    for (const term of p.values()) {
        for (const [atom] of term.mono.factors) {
            if (atom.kind === 'opaque' && atomVariables(atom).some(n => names.has(n))) return true;
        }
    }
    return false;
}

function exponentOf(mono: Monomial, name: string): number {
    const factor = mono.factors.find(([atom]) => atom.kind === 'var' && atom.name === name);
    return factor ? factor[1] : 0;
}

export function polyDegreeIn(p: Polynomial, name: string): number {
    let degree = 0;
    for (const term of p.values()) degree = Math.max(degree, exponentOf(term.mono, name));
    return degree;
}

export function polyMinExponentIn(p: Polynomial, name: string): number {
    let lowest = 0;
    for (const term of p.values()) lowest = Math.min(lowest, exponentOf(term.mono, name));
    return lowest;
}

/** Splits `p` into coefficients of powers of one unknown: p = Σ coeff[k]·name^k. */
export function polyCoefficientsIn(p: Polynomial, name: string): Map<number, Polynomial> {
    const buckets = new Map<number, PolyTerm[]>();
    for (const term of p.values()) {
        const k = exponentOf(term.mono, name);
        const rest = makeMonomial(term.mono.factors.filter(([atom]) => !(atom.kind === 'var' && atom.name === name)));
        const bucket = buckets.get(k) ?? [];
        bucket.push({ coeff: term.coeff, mono: rest });
        buckets.set(k, bucket);
    }
    const result = new Map<number, Polynomial>();
    for (const [k, terms] of buckets) {
        const coeff = polyFromTerms(terms);
        if (coeff.size > 0) result.set(k, coeff);
    }
    return result;
}

/** Replaces one unknown by a polynomial. Negative powers need a single-term replacement. */
export function polySubstitute(p: Polynomial, name: string, value: Polynomial): Polynomial | undefined {
    let result: Polynomial = ZERO;
    const powers = new Map<number, Polynomial | undefined>();
    for (const [k, coeff] of polyCoefficientsIn(p, name)) {
        if (!powers.has(k)) powers.set(k, polyPow(value, k));
        const power = powers.get(k);
        if (power === undefined) return undefined;
        result = polyAdd(result, polyMul(coeff, power));
    }
    return result;
}

export function applyFunction(fn: FunctionName, x: number): number {
    switch (fn) {
        case 'sqrt': return Math.sqrt(x);
        case 'sin': return Math.sin(x);
        case 'cos': return Math.cos(x);
        case 'tan': return Math.tan(x);
        case 'exp': return Math.exp(x);
        case 'log': return Math.log(x);
        case 'abs': return Math.abs(x);
    }
}

function polyPower(base: Polynomial, exponent: Polynomial): Polynomial {
    const n = polyNumber(exponent);
    if (n === undefined) return opaque(Power(polyToExpr(base), polyToExpr(exponent)));
    const c = polyNumber(base);
    if (c !== undefined) {
        const value = Math.pow(c, n);
        return Number.isFinite(value) ? polyConst(value) : opaque(Power(Num(c), Num(n)));
    }
    if (Number.isInteger(n)) {
        return polyPow(base, n) ?? opaque(Power(polyToExpr(base), Num(n)));
    }
    // Fractional powers only distribute over positive unit monomials, e.g. sqrt(4*m^2) = 2*m
    const term = singleTerm(base);
    if (term && term.coeff > 0 && term.mono.factors.every(([atom, e]) => atom.kind === 'unit' && Number.isInteger(e * n))) {
        return polyFromTerms([{ coeff: Math.pow(term.coeff, n), mono: monoPow(term.mono, n) }]);
    }
    return opaque(Power(polyToExpr(base), Num(n)));
}

function polyCall(fn: FunctionName, arg: Polynomial): Polynomial {
    if (fn === 'sqrt') return polyPower(arg, polyConst(0.5));
    const c = polyNumber(arg);
    if (c !== undefined) {
        const value = applyFunction(fn, c);
        if (Number.isFinite(value)) return polyConst(value);
    }
    const term = singleTerm(arg);
    if (fn === 'abs' && term && term.mono.factors.every(([atom]) => atom.kind === 'unit')) {
        return polyFromTerms([{ coeff: Math.abs(term.coeff), mono: term.mono }]);
    }
    return opaque(Call(fn, polyToExpr(arg)));
}

export function exprToPoly(expr: Expr): Polynomial {
    switch (expr.tag) {
        case 'Num': return polyConst(expr.value);
        case 'Sym': return polyVar(expr.name);
        case 'Unit': return polyUnit(expr.name);
        case 'Sum': return expr.terms.reduce<Polynomial>((acc, t) => polyAdd(acc, exprToPoly(t)), ZERO);
        case 'Product': return expr.factors.reduce<Polynomial>((acc, f) => polyMul(acc, exprToPoly(f)), polyConst(1));
        case 'Power': return polyPower(exprToPoly(expr.base), exprToPoly(expr.exponent));
        case 'Call': return polyCall(expr.fn, exprToPoly(expr.arg));
    }
}

function atomToExpr(atom: Atom): Expr {
    switch (atom.kind) {
        case 'var': return Sym(atom.name);
        case 'unit': return Unit(atom.name);
        case 'opaque': return atom.expr;
    }
}

function variableDegree(mono: Monomial): number {
    return mono.factors.reduce((acc, [atom, e]) => atom.kind === 'unit' ? acc : acc + e, 0);
}

// Highest degree first; terms without unknowns last
function compareTerms(a: PolyTerm, b: PolyTerm): number {
    const degree = variableDegree(b.mono) - variableDegree(a.mono);
    if (degree !== 0) return degree;
    if (a.mono.key === '' || b.mono.key === '') return a.mono.key === '' ? 1 : -1;
    return a.mono.key < b.mono.key ? -1 : a.mono.key > b.mono.key ? 1 : 0;
}

function termToExpr(term: PolyTerm): Expr {
    const factors = term.mono.factors.map(([atom, e]) => e === 1 ? atomToExpr(atom) : Power(atomToExpr(atom), Num(e)));
    if (factors.length === 0) return Num(term.coeff);
    if (term.coeff === 1) return factors.length === 1 ? factors[0] : Product(...factors);
    return Product(Num(term.coeff), ...factors);
}

export function polyTerms(p: Polynomial): PolyTerm[] {
    return [...p.values()].sort(compareTerms);
}

export function polyToExpr(p: Polynomial): Expr {
    const terms = polyTerms(p).map(termToExpr);
    if (terms.length === 0) return Num(0);
    return terms.length === 1 ? terms[0] : Sum(...terms);
}

/** Canonical text of a polynomial; equal keys mean equal polynomials. */
export function polyKey(p: Polynomial): string {
    return polyTerms(p).map(t => `${formatNumber(t.coeff)}*${t.mono.key}`).join(' + ');
}

export function simplifyExpr(expr: Expr): Expr {
    return polyToExpr(exprToPoly(expr));
}
