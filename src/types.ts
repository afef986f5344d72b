/**
 * @file types.ts
 * @description Defines the core data structures of the solver: expressions,
 * relations, oracle solution sets and the method registry entries.
 */

export type FunctionName = 'sqrt' | 'sin' | 'cos' | 'tan' | 'exp' | 'log' | 'abs';

export const FUNCTION_NAMES: readonly FunctionName[] = ['sqrt', 'sin', 'cos', 'tan', 'exp', 'log', 'abs'];

export type Expr =
    | { tag: 'Num', value: number }
    // An unknown quantity declared on a system
    | { tag: 'Sym', name: string }
    // A physical unit tag, e.g. `cm` in `50*cm`
    | { tag: 'Unit', name: string }
    | { tag: 'Sum', terms: readonly Expr[] }
    | { tag: 'Product', factors: readonly Expr[] }
    | { tag: 'Power', base: Expr, exponent: Expr }
    | { tag: 'Call', fn: FunctionName, arg: Expr };

export type ExprLike = Expr | number;

export const Num = (value: number): Expr => ({ tag: 'Num', value });
export const Sym = (name: string): Expr => ({ tag: 'Sym', name });
export const Unit = (name: string): Expr => ({ tag: 'Unit', name });
export const Sum = (...terms: Expr[]): Expr => ({ tag: 'Sum', terms });
export const Product = (...factors: Expr[]): Expr => ({ tag: 'Product', factors });
export const Power = (base: Expr, exponent: Expr): Expr => ({ tag: 'Power', base, exponent });
export const Call = (fn: FunctionName, arg: Expr): Expr => ({ tag: 'Call', fn, arg });

export function toExpr(value: ExprLike): Expr {
    return typeof value === 'number' ? Num(value) : value;
}

export function isFunctionName(name: string): name is FunctionName {
    return (FUNCTION_NAMES as readonly string[]).includes(name);
}

/** Two sides of an equation, in the order the equation method returned them. */
export interface Relation {
    readonly lhs: Expr;
    readonly rhs: Expr;
}

export enum Classification {
    Usable = 'usable',
    Redundant = 'redundant',
    Contradiction = 'contradiction',
}

/** One assignment of unknowns to values. Values may still mention other unknowns. */
export type Solution = ReadonlyMap<string, Expr>;

export type SolutionSet =
    | { kind: 'empty' }
    | { kind: 'unique', solution: Solution }
    | { kind: 'multiple', candidates: readonly Solution[] }
    // The oracle cannot decide this system (e.g. it is not polynomial in its unknowns)
    | { kind: 'undetermined' };

export type Bindings = Map<string, Expr>;

export interface Branch {
    readonly id: number;
    readonly bindings: Bindings;
}

/** Anything an equation side may be given as. Strings are parsed against the current branch. */
export type SideInput = Expr | number | string;

export type EquationMethod = () => ReadonlyArray<SideInput>;
export type ProcedureMethod = () => void;

export type MethodEntry =
    | { kind: 'equation', name: string, fn: EquationMethod }
    | { kind: 'procedure', name: string, fn: ProcedureMethod };

export type VariableDeclarations = readonly string[] | Readonly<Record<string, string>>;

export interface ContradictionRecord {
    /** Content hash of the branch the contradiction was found in. */
    readonly branchHash: string;
    readonly relations: readonly Relation[];
}
