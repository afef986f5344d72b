/**
 * @file index.ts
 * @description Public entry point of forkeq: a branching solver for systems of
 * equations whose solutions may be multi-valued.
 */

export { Num, Sym, Unit, Sum, Product, Power, Call, toExpr, Classification } from './src/types';
export type {
    Expr, ExprLike, FunctionName, Relation, Solution, SolutionSet,
    SideInput, EquationMethod, ProcedureMethod, MethodEntry, VariableDeclarations, ContradictionRecord,
} from './src/types';
export { add, sub, mul, div, pow, neg, sqrt } from './src/arith';
export { PolynomialOracle, defaultOracle, difference } from './src/algebra';
export type { AlgebraOracle } from './src/algebra';
export { EquationClassifier, MinFloatTracker } from './src/classifier';
export type { ClassifierSettings } from './src/classifier';
export { BranchStore, contentHash } from './src/branch_store';
export { MethodRegistry } from './src/registry';
export { BranchingSolver, combinations } from './src/solver';
export type { SolverContext } from './src/solver';
export { EquationSystem, isResolvedValue } from './src/system';
export { SolverOptionsSchema, resolveOptions } from './src/options';
export type { SolverOptions, ResolvedOptions } from './src/options';
export { parseExpr } from './src/parser';
export type { IdentifierResolver } from './src/parser';
export {
    UNITS, loadUnitTable, isKnownUnit, unit, quantity,
    hasUnits, toBaseUnits, generateUnitSubstitution, evaluate,
} from './src/units';
export type { UnitTable, UnitDefinition, UnitSubstitution } from './src/units';
export { ConfigurationError, UnsolvableSystemError, UnresolvedValueError, printRelation } from './src/errors';
export { printExpr } from './src/utils';
export { setDebugVerbose, getDebugVerbose, consoleLog } from './src/state';
export { EPSILON, RAND_RANGE } from './src/constants';
