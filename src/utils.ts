/**
 * @file utils.ts
 * @description Expression printing and structural traversal helpers.
 */

import { Expr, Num, Sum, Product, Power, Call } from './types';

export function formatNumber(value: number): string {
    // String(-0) is already "0"
    return String(value);
}

function isNegativeTerm(term: Expr): boolean {
    if (term.tag === 'Num') return term.value < 0;
    if (term.tag === 'Product' && term.factors.length > 0) {
        const first = term.factors[0];
        return first.tag === 'Num' && first.value < 0;
    }
    return false;
}

function negateTerm(term: Expr): Expr {
    if (term.tag === 'Num') return Num(-term.value);
    if (term.tag === 'Product' && term.factors.length > 0 && term.factors[0].tag === 'Num') {
        const coeff = -term.factors[0].value;
        const rest = term.factors.slice(1);
        if (coeff !== 1) return Product(Num(coeff), ...rest);
        return rest.length === 1 ? rest[0] : Product(...rest);
    }
    return Product(Num(-1), term);
}

function printFactor(factor: Expr, first: boolean): string {
    if (factor.tag === 'Sum') return `(${printExpr(factor)})`;
    if (factor.tag === 'Num' && factor.value < 0 && !first) return `(${printExpr(factor)})`;
    return printExpr(factor);
}

function printPowerBase(base: Expr): string {
    switch (base.tag) {
        case 'Sum':
        case 'Product':
        case 'Power':
            return `(${printExpr(base)})`;
        case 'Num':
            return base.value < 0 ? `(${printExpr(base)})` : printExpr(base);
        default:
            return printExpr(base);
    }
}

function printExponent(exponent: Expr): string {
    if (exponent.tag === 'Num' && exponent.value >= 0) return formatNumber(exponent.value);
    if (exponent.tag === 'Sym' || exponent.tag === 'Unit') return exponent.name;
    return `(${printExpr(exponent)})`;
}

/**
 * Pretty-prints an expression, e.g. `x^2 - 4` or `50*cm`.
 * The output is stable for a given tree and is used for hashing and diagnostics.
 */
export function printExpr(expr: Expr): string {
    switch (expr.tag) {
        case 'Num': return formatNumber(expr.value);
        case 'Sym': return expr.name;
        case 'Unit': return expr.name;
        case 'Sum': {
            if (expr.terms.length === 0) return '0';
            return expr.terms.map((term, i) => {
                if (i === 0) return printExpr(term);
                if (isNegativeTerm(term)) return ` - ${printExpr(negateTerm(term))}`;
                return ` + ${printExpr(term)}`;
            }).join('');
        }
        case 'Product': {
            if (expr.factors.length === 0) return '1';
            const [first, ...rest] = expr.factors;
            if (first.tag === 'Num' && first.value === -1 && rest.length > 0) {
                return `-${rest.map((f, i) => printFactor(f, i === 0)).join('*')}`;
            }
            return expr.factors.map((f, i) => printFactor(f, i === 0)).join('*');
        }
        case 'Power': return `${printPowerBase(expr.base)}^${printExponent(expr.exponent)}`;
        case 'Call': return `${expr.fn}(${printExpr(expr.arg)})`;
        default: {
            const exhaustiveCheck: never = expr;
            throw new Error(`printExpr: Unhandled expression: ${JSON.stringify(exhaustiveCheck)}`);
        }
    }
}

/**
 * Structural text of an expression, keeping apart what printing merges: the
 * unit `m` is `[m]` while the variable `m` is `m`.
 */
export function exprKey(expr: Expr): string {
    switch (expr.tag) {
        case 'Num': return formatNumber(expr.value);
        case 'Sym': return expr.name;
        case 'Unit': return `[${expr.name}]`;
        case 'Sum': return `(+ ${expr.terms.map(exprKey).join(' ')})`;
        case 'Product': return `(* ${expr.factors.map(exprKey).join(' ')})`;
        case 'Power': return `(^ ${exprKey(expr.base)} ${exprKey(expr.exponent)})`;
        case 'Call': return `(${expr.fn} ${exprKey(expr.arg)})`;
    }
}

/**
 * Rebuilds an expression bottom-up, replacing every `Sym` and `Unit` leaf for
 * which `replace` returns a value.
 */
export function replaceLeaves(expr: Expr, replace: (leaf: Expr) => Expr | undefined): Expr {
    switch (expr.tag) {
        case 'Num': return expr;
        case 'Sym':
        case 'Unit':
            return replace(expr) ?? expr;
        case 'Sum': return Sum(...expr.terms.map(t => replaceLeaves(t, replace)));
        case 'Product': return Product(...expr.factors.map(f => replaceLeaves(f, replace)));
        case 'Power': return Power(replaceLeaves(expr.base, replace), replaceLeaves(expr.exponent, replace));
        case 'Call': return Call(expr.fn, replaceLeaves(expr.arg, replace));
    }
}

export function substituteVariables(expr: Expr, values: ReadonlyMap<string, Expr>): Expr {
    return replaceLeaves(expr, leaf => leaf.tag === 'Sym' ? values.get(leaf.name) : undefined);
}

function collect(expr: Expr, visit: (node: Expr) => void): void {
    visit(expr);
    switch (expr.tag) {
        case 'Sum': expr.terms.forEach(t => collect(t, visit)); break;
        case 'Product': expr.factors.forEach(f => collect(f, visit)); break;
        case 'Power': collect(expr.base, visit); collect(expr.exponent, visit); break;
        case 'Call': collect(expr.arg, visit); break;
        default: break;
    }
}

/** Names of every unknown mentioned anywhere in the tree. */
export function exprVariables(expr: Expr): Set<string> {
    const names = new Set<string>();
    collect(expr, node => { if (node.tag === 'Sym') names.add(node.name); });
    return names;
}

export function exprUnits(expr: Expr): Set<string> {
    const names = new Set<string>();
    collect(expr, node => { if (node.tag === 'Unit') names.add(node.name); });
    return names;
}

export function numericLiterals(expr: Expr): number[] {
    const values: number[] = [];
    collect(expr, node => { if (node.tag === 'Num') values.push(node.value); });
    return values;
}
