/**
 * @file system.ts
 * @description The user-facing equation system: variable declarations,
 * registration of equations and procedures, per-variable access in the current
 * branch, and `solve()`.
 */

import { Expr, Num, Sym, Unit, SideInput, VariableDeclarations, EquationMethod, ProcedureMethod, isFunctionName } from './types';
import { BranchStore } from './branch_store';
import { MethodRegistry } from './registry';
import { EquationClassifier, MinFloatTracker } from './classifier';
import { AlgebraOracle, defaultOracle } from './algebra';
import { BranchingSolver } from './solver';
import { ResolvedOptions, SolverOptions, resolveOptions } from './options';
import { parseExpr } from './parser';
import { generateUnitSubstitution, isKnownUnit } from './units';
import { ConfigurationError, UnresolvedValueError } from './errors';
import { VerboseLogger, verboseLogger, warn } from './state';
import { printExpr } from './utils';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** True when the expression mentions no unknown, i.e. it is a number or a quantity. */
export function isResolvedValue(expr: Expr, oracle: AlgebraOracle = defaultOracle): boolean {
    return oracle.freeVariables(expr).size === 0;
}

function isNameList(declarations: VariableDeclarations): declarations is readonly string[] {
    return Array.isArray(declarations);
}

function normalizeDeclarations(declarations: VariableDeclarations, existing: ReadonlyMap<string, string>): Map<string, string> {
    const entries: [string, string][] = isNameList(declarations)
        ? declarations.map((name): [string, string] => [name, ''])
        : Object.entries(declarations);
    const result = new Map<string, string>();
    for (const [name, description] of entries) {
        if (!VARIABLE_NAME.test(name)) throw new ConfigurationError(`Invalid variable name '${name}'`);
        if (isFunctionName(name)) throw new ConfigurationError(`Variable name '${name}' is reserved for a function`);
        if (result.has(name) || existing.has(name)) throw new ConfigurationError(`Variable '${name}' is declared twice`);
        result.set(name, description);
    }
    return result;
}

export class EquationSystem {
    private readonly options: ResolvedOptions;
    private readonly descriptions: Map<string, string>;
    private readonly store: BranchStore;
    private readonly registry = new MethodRegistry();
    private readonly classifier: EquationClassifier;
    private readonly solver: BranchingSolver;
    private readonly log: VerboseLogger;
    private _solved = false;

    constructor(variables: VariableDeclarations, options: SolverOptions = {}) {
        this.options = resolveOptions(options);
        this.descriptions = normalizeDeclarations(variables, new Map());
        this.store = new BranchStore([...this.descriptions.keys()]);
        this.log = verboseLogger(this.options.verbose);

        const { random, randRange, epsilon, oracle } = this.options;
        this.classifier = new EquationClassifier({
            epsilon,
            oracle,
            substitutions: [
                generateUnitSubstitution(random, randRange, epsilon),
                generateUnitSubstitution(random, randRange, epsilon),
            ],
            tracker: new MinFloatTracker(),
        });
        this.solver = new BranchingSolver({
            store: this.store,
            registry: this.registry,
            classifier: this.classifier,
            oracle,
            log: this.log,
            toSide: input => this.toExpr(input),
        });
    }

    /** Registers an equation method. It must return the two sides of one relation. */
    equation(name: string, fn: EquationMethod): this {
        this.registry.addEquation(name, fn);
        return this;
    }

    procedure(name: string, fn: ProcedureMethod): this {
        this.registry.addProcedure(name, fn);
        return this;
    }

    get variables(): readonly string[] {
        return this.store.variables;
    }

    get locked(): boolean {
        return this.store.locked;
    }

    get solved(): boolean {
        return this._solved;
    }

    get currentBranch(): number {
        return this.store.currentIndex;
    }

    private requireVariable(name: string): void {
        if (!this.store.hasVariable(name)) throw new ConfigurationError(`Unknown variable '${name}'`);
    }

    describe(name: string): string {
        const description = this.descriptions.get(name);
        if (description === undefined) throw new ConfigurationError(`Unknown variable '${name}'`);
        return description;
    }

    /** The value of a variable in the current branch; an unresolved variable is its own symbol. */
    get(name: string): Expr {
        this.requireVariable(name);
        return this.store.get(name);
    }

    /**
     * Numeric value of a variable in the current branch.
     * @throws UnresolvedValueError when the value is not a plain number.
     */
    num(name: string): number {
        const value = this.get(name);
        if (value.tag !== 'Num') throw new UnresolvedValueError(name, printExpr(value));
        return value.value;
    }

    isResolved(name: string): boolean {
        return isResolvedValue(this.get(name), this.options.oracle);
    }

    /**
     * Writes a variable. Outside `solve()` the value applies to every branch;
     * inside a procedure it applies to the current branch, or with
     * `procedureWrites: 'uniform'` to every branch when all branches agreed on
     * the previous value.
     */
    set(name: string, value: SideInput): void {
        this.requireVariable(name);
        const expr = this.options.oracle.simplify(this.toExpr(value));
        if (this.solver.running) {
            if (this.options.procedureWrites === 'uniform' && this.store.isUniform(name)) {
                this.store.setAllBranches(name, expr);
            } else {
                this.store.set(name, expr);
            }
            return;
        }
        if (this._solved) warn(`Variable ${name} was changed after solving; results may be inconsistent`);
        this.store.setAllBranches(name, expr);
    }

    /** Resets a variable to unresolved in every branch. */
    clearVariable(name: string): void {
        this.requireVariable(name);
        if (this._solved) warn(`Variable ${name} was cleared after solving; results may be inconsistent`);
        this.store.setAllBranches(name, Sym(name));
    }

    addVariables(variables: VariableDeclarations): void {
        if (this.store.locked) throw new ConfigurationError('Cannot add variables after the branches have forked');
        const added = normalizeDeclarations(variables, this.descriptions);
        this.store.addVariables([...added.keys()]);
        for (const [name, description] of added) this.descriptions.set(name, description);
    }

    /** Parses an expression against the current branch: variables read their values, unit names become units. */
    expr(source: string): Expr {
        return parseExpr(source, name => {
            if (this.store.hasVariable(name)) return this.store.get(name);
            return isKnownUnit(name) ? Unit(name) : undefined;
        });
    }

    private toExpr(input: SideInput): Expr {
        if (typeof input === 'string') return this.expr(input);
        if (typeof input === 'number') return Num(input);
        return input;
    }

    /**
     * Removes the current branch. Inside a procedure the branch is only marked
     * and is removed when the pass ends.
     */
    deleteCurrentBranch(): void {
        if (this.solver.running) {
            this.solver.markCurrentDeleted();
            return;
        }
        this.store.remove(this.store.currentIndex);
    }

    switchBranch(index: number): void {
        if (this.solver.running) throw new ConfigurationError('Cannot switch branches while solving');
        this.store.setCurrent(index);
    }

    solve(): void {
        if (this._solved) warn('System has already been solved; solving again');
        this.log(`Solving ${this.registry.equations.length} equation(s) over ${this.store.count} branch(es)`);
        this.solver.solve();
        this._solved = true;
    }

    branchCount(): number {
        return this.store.count;
    }

    allBranchBindings(): Record<string, Expr>[] {
        return this.store.branches.map((_, index) =>
            Object.fromEntries(this.store.variables.map(name => [name, this.store.get(name, index)])));
    }

    /** Bindings of every branch, with plain numbers as numbers and everything else printed. */
    allBranchBindingsDecimal(): Record<string, number | string>[] {
        return this.allBranchBindings().map(bindings =>
            Object.fromEntries(Object.entries(bindings).map(([name, value]) => [name, decimal(value)])));
    }

    valuesAcrossBranches(name: string): Expr[] {
        this.requireVariable(name);
        return this.store.branches.map((_, index) => this.store.get(name, index));
    }

    valuesAcrossBranchesDecimal(name: string): (number | string)[] {
        return this.valuesAcrossBranches(name).map(decimal);
    }
}

function decimal(value: Expr): number | string {
    return value.tag === 'Num' ? value.value : printExpr(value);
}
