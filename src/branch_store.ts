/**
 * @file branch_store.ts
 * @description An ordered arena of branches. Each branch binds every declared
 * variable to either its own symbol (unresolved) or a resolved expression.
 * Forking appends a copy; there are no parent/child links between branches.
 */

import { createHash } from 'crypto';
import { Branch, Bindings, Expr, Sym } from './types';
import { exprKey } from './utils';
import { ConfigurationError } from './errors';

function freshBindings(names: readonly string[]): Bindings {
    return new Map(names.map(name => [name, Sym(name)]));
}

/** Canonical text of a set of bindings, in variable declaration order. */
export function canonicalBindings(bindings: Bindings, names: readonly string[]): string {
    return names.map(name => {
        const value = bindings.get(name);
        return `${JSON.stringify(name)}:${JSON.stringify(value ? exprKey(value) : null)}`;
    }).join(',');
}

export function contentHash(bindings: Bindings, names: readonly string[]): string {
    return `sha256:${createHash('sha256').update(canonicalBindings(bindings, names)).digest('hex')}`;
}

export class BranchStore {
    private readonly _branches: Branch[];
    private readonly _variables: string[];
    private _currentIndex = 0;
    private _locked = false;
    private nextId = 0;

    constructor(variables: readonly string[]) {
        this._variables = [...variables];
        this._branches = [{ id: this.nextId++, bindings: freshBindings(this._variables) }];
    }

    get count(): number {
        return this._branches.length;
    }

    get currentIndex(): number {
        return this._currentIndex;
    }

    /** Set once the first fork happens; variables can no longer be added. */
    get locked(): boolean {
        return this._locked;
    }

    get variables(): readonly string[] {
        return this._variables;
    }

    get branches(): readonly Branch[] {
        return this._branches;
    }

    hasVariable(name: string): boolean {
        return this._variables.includes(name);
    }

    private checkIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this._branches.length) {
            throw new RangeError(`Branch ${index} does not exist (there are ${this._branches.length} branches)`);
        }
    }

    private checkVariable(name: string): void {
        if (!this.hasVariable(name)) throw new RangeError(`Variable ${name} does not exist`);
    }

    branchAt(index: number): Branch {
        this.checkIndex(index);
        return this._branches[index];
    }

    getCurrent(): Branch {
        return this.branchAt(this._currentIndex);
    }

    setCurrent(index: number): void {
        this.checkIndex(index);
        this._currentIndex = index;
    }

    /**
     * Appends a deep copy of the branch at `fromIndex` (the current branch by default).
     * @returns The index of the new branch.
     */
    create(fromIndex: number = this._currentIndex): number {
        const source = this.branchAt(fromIndex);
        // Expressions are immutable, so copying the map copies the branch
        this._branches.push({ id: this.nextId++, bindings: new Map(source.bindings) });
        this._locked = true;
        return this._branches.length - 1;
    }

    /**
     * Deletes the branch at `index`, then clamps the current pointer into range.
     * The last remaining branch cannot be removed.
     */
    remove(index: number): void {
        this.checkIndex(index);
        if (this._branches.length === 1) throw new RangeError('Cannot remove the only remaining branch');
        this._branches.splice(index, 1);
        this._currentIndex = Math.min(this._currentIndex, this._branches.length - 1);
    }

    rotate(): void {
        this._currentIndex = (this._currentIndex + 1) % this._branches.length;
    }

    indexOfId(id: number): number {
        return this._branches.findIndex(b => b.id === id);
    }

    get(name: string, index: number = this._currentIndex): Expr {
        this.checkVariable(name);
        const value = this.branchAt(index).bindings.get(name);
        return value ?? Sym(name);
    }

    set(name: string, value: Expr, index: number = this._currentIndex): void {
        this.checkVariable(name);
        this.branchAt(index).bindings.set(name, value);
    }

    setAllBranches(name: string, value: Expr): void {
        this.checkVariable(name);
        for (const branch of this._branches) branch.bindings.set(name, value);
    }

    /** True when every branch holds the same value (by printed form) for `name`. */
    isUniform(name: string): boolean {
        const first = exprKey(this.get(name, 0));
        return this._branches.every((_, i) => exprKey(this.get(name, i)) === first);
    }

    addVariables(names: readonly string[]): void {
        if (this._locked) throw new ConfigurationError('Cannot add variables after the branches have forked');
        for (const name of names) {
            this._variables.push(name);
            for (const branch of this._branches) branch.bindings.set(name, Sym(name));
        }
    }

    contentHash(index: number = this._currentIndex): string {
        return contentHash(this.branchAt(index).bindings, this._variables);
    }

    /** Every binding of every branch, as one comparable string. */
    snapshot(): string {
        return this._branches.map(b => `{${canonicalBindings(b.bindings, this._variables)}}`).join('|');
    }
}
