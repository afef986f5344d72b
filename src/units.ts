/**
 * @file units.ts
 * @description The unit/quantity system: the bundled unit table, unit tags in
 * expressions, conversion to SI base units, and the randomized unit
 * substitutions used to compare dimensioned constants.
 */

import { z } from 'zod';
import unitData from './units.json';
import { Expr, Num, Unit, Product, Power } from './types';
import { ConfigurationError } from './errors';
import { applyFunction, simplifyExpr } from './polynomial';
import { exprUnits, replaceLeaves, printExpr } from './utils';
import { MAX_SUBSTITUTION_DRAWS } from './constants';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const UnitTableSchema = z.object({
    base: z.array(z.string().regex(IDENTIFIER)).min(1),
    derived: z.record(z.object({
        scale: z.number().positive(),
        dimensions: z.record(z.number().int()),
    })),
});

export interface UnitDefinition {
    readonly name: string;
    /** Size of one of this unit in SI base units. */
    readonly scale: number;
    /** Exponent of each base unit, e.g. N = kg·m·s⁻². */
    readonly dimensions: ReadonlyMap<string, number>;
}

export interface UnitTable {
    readonly baseUnits: readonly string[];
    readonly definitions: ReadonlyMap<string, UnitDefinition>;
}

/**
 * Validates raw table data and indexes it. Base units are their own
 * definitions; derived units may only refer to base units.
 */
export function loadUnitTable(data: unknown): UnitTable {
    const parsed = UnitTableSchema.safeParse(data);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid unit table: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const { base, derived } = parsed.data;
    const definitions = new Map<string, UnitDefinition>();
    for (const name of base) {
        definitions.set(name, { name, scale: 1, dimensions: new Map([[name, 1]]) });
    }
    for (const [name, def] of Object.entries(derived)) {
        if (!IDENTIFIER.test(name)) throw new ConfigurationError(`Invalid unit name '${name}'`);
        if (definitions.has(name)) throw new ConfigurationError(`Unit '${name}' is defined twice`);
        const unknownBase = Object.keys(def.dimensions).filter(b => !base.includes(b));
        if (unknownBase.length > 0) {
            throw new ConfigurationError(`Unit '${name}' refers to unknown base unit(s): ${unknownBase.join(', ')}`);
        }
        definitions.set(name, { name, scale: def.scale, dimensions: new Map(Object.entries(def.dimensions)) });
    }
    return { baseUnits: base, definitions };
}

export const UNITS: UnitTable = loadUnitTable(unitData);

export function isKnownUnit(name: string): boolean {
    return UNITS.definitions.has(name);
}

function definitionOf(name: string): UnitDefinition {
    const def = UNITS.definitions.get(name);
    if (!def) throw new ConfigurationError(`Unknown unit '${name}'`);
    return def;
}

/** A unit tag for a unit of the bundled table. */
export function unit(name: string): Expr {
    definitionOf(name);
    return Unit(name);
}

/** `value` of the named unit, e.g. `quantity(35, 'cm')`. */
export function quantity(value: number, unitName: string): Expr {
    return Product(Num(value), unit(unitName));
}

export function hasUnits(expr: Expr): boolean {
    return exprUnits(expr).size > 0;
}

function baseExpansion(def: UnitDefinition): Expr {
    const factors = [...def.dimensions].map(([base, e]) => Power(Unit(base), Num(e)));
    return Product(Num(def.scale), ...factors);
}

/** Rewrites every unit tag in terms of SI base units, e.g. `100*cm` becomes `1*m`. */
export function toBaseUnits(expr: Expr): Expr {
    return simplifyExpr(replaceLeaves(expr, leaf => leaf.tag === 'Unit' ? baseExpansion(definitionOf(leaf.name)) : undefined));
}

/**
 * A random numeric stand-in for every base unit. Derived units evaluate to
 * `scale × Π factor(base)^exponent`, so dimensionally equal quantities get
 * equal values while mismatched dimensions almost surely differ.
 */
export interface UnitSubstitution {
    readonly factors: ReadonlyMap<string, number>;
}

/**
 * Draws one factor per base unit from [1 − randRange, 1 + randRange], redrawing
 * any factor within `epsilon` of one already drawn.
 */
export function generateUnitSubstitution(random: () => number, randRange: number, epsilon: number): UnitSubstitution {
    const factors = new Map<string, number>();
    for (const base of UNITS.baseUnits) {
        let draws = 0;
        let factor = 1 - randRange + 2 * randRange * random();
        while ([...factors.values()].some(f => Math.abs(f - factor) < epsilon)) {
            if (++draws >= MAX_SUBSTITUTION_DRAWS) {
                throw new ConfigurationError(`Could not draw distinct unit substitution factors (randRange ${randRange}, epsilon ${epsilon})`);
            }
            factor = 1 - randRange + 2 * randRange * random();
        }
        factors.set(base, factor);
    }
    return { factors };
}

export function unitValue(substitution: UnitSubstitution, name: string): number {
    const def = definitionOf(name);
    let value = def.scale;
    for (const [base, e] of def.dimensions) {
        const factor = substitution.factors.get(base);
        if (factor === undefined) throw new ConfigurationError(`Unit substitution has no factor for base unit '${base}'`);
        value *= Math.pow(factor, e);
    }
    return value;
}

/**
 * Evaluates an expression without unknowns to a number, replacing unit tags
 * through the given substitution.
 */
export function evaluate(expr: Expr, substitution: UnitSubstitution): number {
    switch (expr.tag) {
        case 'Num': return expr.value;
        case 'Sym': throw new Error(`Cannot evaluate ${printExpr(expr)}: it is an unresolved variable`);
        case 'Unit': return unitValue(substitution, expr.name);
        case 'Sum': return expr.terms.reduce((acc, t) => acc + evaluate(t, substitution), 0);
        case 'Product': return expr.factors.reduce((acc, f) => acc * evaluate(f, substitution), 1);
        case 'Power': return Math.pow(evaluate(expr.base, substitution), evaluate(expr.exponent, substitution));
        case 'Call': return applyFunction(expr.fn, evaluate(expr.arg, substitution));
    }
}
