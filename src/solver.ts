/**
 * @file solver.ts
 * @description The branching solver loop. One `solve()` is a single pass over
 * every branch: run procedures, collect and classify relations, then resolve the
 * smallest solvable subset of relations, forking one branch per extra candidate.
 * Contradictory and deleted branches are pruned when the pass ends.
 */

import { Classification, ContradictionRecord, Expr, Relation, SideInput, Solution, SolutionSet } from './types';
import type { BranchStore } from './branch_store';
import type { MethodRegistry } from './registry';
import type { EquationClassifier } from './classifier';
import type { AlgebraOracle } from './algebra';
import { ConfigurationError, UnsolvableSystemError, printRelation } from './errors';
import type { VerboseLogger } from './state';
import { printExpr } from './utils';
import { MAX_SOLVER_DEPTH } from './constants';

export interface SolverContext {
    readonly store: BranchStore;
    readonly registry: MethodRegistry;
    readonly classifier: EquationClassifier;
    readonly oracle: AlgebraOracle;
    readonly log: VerboseLogger;
    /** Turns an equation side into an expression, reading the current branch. */
    readonly toSide: (input: SideInput) => Expr;
}

type Mark = 'contradiction' | 'deleted';

/** Index combinations of size `k` out of `n`, in lexicographic order. */
export function* combinations(n: number, k: number): Generator<number[]> {
    if (k > n || k <= 0) return;
    const indices = Array.from({ length: k }, (_, i) => i);
    while (true) {
        yield [...indices];
        let i = k - 1;
        while (i >= 0 && indices[i] === n - k + i) i--;
        if (i < 0) return;
        indices[i]++;
        for (let j = i + 1; j < k; j++) indices[j] = indices[j - 1] + 1;
    }
}

export class BranchingSolver {
    // Keyed by branch id; indices shift when branches are removed
    private readonly marks = new Map<number, Mark>();
    private contradictions: ContradictionRecord[] = [];
    private unsolvableSets: Relation[][] = [];
    private unsolvable = false;
    private _running = false;

    constructor(private readonly context: SolverContext) {}

    /** True while a pass is in progress, i.e. while procedures and equations run. */
    get running(): boolean {
        return this._running;
    }

    markCurrentDeleted(): void {
        const { store, log } = this.context;
        log(`Procedure deleted branch ${store.currentIndex}`);
        this.marks.set(store.getCurrent().id, 'deleted');
    }

    private isCurrentMarked(): boolean {
        return this.marks.has(this.context.store.getCurrent().id);
    }

    private resetPass(): void {
        this.marks.clear();
        this.contradictions = [];
        this.unsolvableSets = [];
        this.unsolvable = false;
    }

    /**
     * Runs one pass over all branches, then prunes.
     * @throws UnsolvableSystemError when no branch survives, or when a provably
     * unsolvable relation set was met and the pass changed no binding.
     */
    solve(): void {
        const { store, log } = this.context;
        const before = store.snapshot();
        this.resetPass();
        const startId = store.getCurrent().id;

        this._running = true;
        try {
            const visited = new Set<number>();
            // Forks are appended, so the rotation reaches them before it wraps back to the start
            while (!visited.has(store.getCurrent().id)) {
                visited.add(store.getCurrent().id);
                log(`Solving branch ${store.currentIndex + 1} of ${store.count}`);
                this.solveBranch(0);
                store.rotate();
            }
        } finally {
            this._running = false;
        }
        store.setCurrent(store.indexOfId(startId));

        this.prune();
        if (this.unsolvable && store.snapshot() === before) {
            throw new UnsolvableSystemError(this.contradictions, this.unsolvableSets);
        }
        this.collapseDuplicates();
        log(`Pass finished with ${store.count} branch(es)`);
    }

    private prune(): void {
        const { store, log } = this.context;
        const marked = store.branches.filter(b => this.marks.has(b.id)).map(b => b.id);
        if (marked.length === 0) return;
        if (marked.length === store.count) {
            throw new UnsolvableSystemError(this.contradictions, this.unsolvableSets);
        }
        const currentId = store.getCurrent().id;
        for (const id of marked) store.remove(store.indexOfId(id));
        const current = store.indexOfId(currentId);
        if (current >= 0) store.setCurrent(current);
        this.marks.clear();
        log(`Pruned ${marked.length} branch(es)`);
    }

    /** Removes branches whose bindings are identical to an earlier branch. */
    private collapseDuplicates(): void {
        const { store } = this.context;
        const currentId = store.getCurrent().id;
        const seen = new Set<string>();
        let index = 0;
        while (index < store.count) {
            const hash = store.contentHash(index);
            if (seen.has(hash)) {
                store.remove(index);
            } else {
                seen.add(hash);
                index++;
            }
        }
        const current = store.indexOfId(currentId);
        if (current >= 0) store.setCurrent(current);
    }

    private solveBranch(depth: number): void {
        if (depth > MAX_SOLVER_DEPTH) throw new Error(`Solver depth exceeded (depth: ${depth})`);

        this.runProcedures();
        if (this.isCurrentMarked()) return;
        const relations = this.collectRelations();
        if (relations === undefined) return;

        for (let size = 1; size <= relations.length; size++) {
            for (const combo of combinations(relations.length, size)) {
                const subset = combo.map(i => relations[i]);
                const unknowns = this.unknownsOf(subset);
                const candidates = this.completeCandidates(this.context.oracle.solve(subset, unknowns), unknowns, subset);
                if (candidates.length === 0) continue;
                this.applyCandidates(candidates);
                this.solveBranch(depth + 1);
                return;
            }
        }
        // Nothing resolved; a procedure may still apply
        this.runProcedures();
    }

    private runProcedures(): void {
        const { registry, log } = this.context;
        for (const { name, fn } of registry.procedures) {
            if (this.isCurrentMarked()) return;
            try {
                fn();
            } catch (e) {
                if (e instanceof TypeError) {
                    log(`Procedure '${name}' skipped: ${e.message}`);
                    continue;
                }
                throw e;
            }
        }
    }

    /**
     * Evaluates every equation in the current branch.
     * @returns The distinct usable relations, or `undefined` when one is a contradiction.
     */
    private collectRelations(): Relation[] | undefined {
        const { registry, classifier, oracle, store, log, toSide } = this.context;
        const relations: Relation[] = [];
        const seen = new Set<string>();
        for (const { name, fn } of registry.equations) {
            const sides = fn();
            if (sides.length !== 2) {
                throw new ConfigurationError(`Equation '${name}' must return exactly two sides, got ${sides.length}`);
            }
            const relation: Relation = { lhs: oracle.simplify(toSide(sides[0])), rhs: oracle.simplify(toSide(sides[1])) };
            switch (classifier.classify(relation.lhs, relation.rhs)) {
                case Classification.Redundant:
                    break;
                case Classification.Contradiction:
                    log(`Contradiction in branch ${store.currentIndex}: ${name}: ${printRelation(relation)}`);
                    this.marks.set(store.getCurrent().id, 'contradiction');
                    this.contradictions.push({ branchHash: store.contentHash(), relations: [relation] });
                    return undefined;
                case Classification.Usable: {
                    const key = printRelation(relation);
                    if (seen.has(key)) break;
                    seen.add(key);
                    classifier.observe(relation.lhs, relation.rhs);
                    relations.push(relation);
                    break;
                }
            }
        }
        return relations;
    }

    private unknownsOf(relations: readonly Relation[]): string[] {
        const { oracle } = this.context;
        const names = new Set<string>();
        for (const { lhs, rhs } of relations) {
            oracle.freeVariables(lhs).forEach(n => names.add(n));
            oracle.freeVariables(rhs).forEach(n => names.add(n));
        }
        return [...names].sort();
    }

    private isComplete(solution: Solution, unknowns: readonly string[]): boolean {
        return unknowns.every(name => {
            const value = solution.get(name);
            return value !== undefined && this.context.oracle.freeVariables(value).size === 0;
        });
    }

    /** The candidates of an oracle result that bind every unknown to a value free of unknowns. */
    private completeCandidates(result: SolutionSet, unknowns: readonly string[], subset: Relation[]): Solution[] {
        switch (result.kind) {
            case 'undetermined':
                return [];
            case 'empty':
                this.context.log(`No solution for [${subset.map(printRelation).join(', ')}]`);
                this.unsolvable = true;
                this.unsolvableSets.push(subset);
                return [];
            case 'unique':
                return this.isComplete(result.solution, unknowns) ? [result.solution] : [];
            case 'multiple':
                return result.candidates.filter(c => this.isComplete(c, unknowns));
        }
    }

    /** Applies the first candidate to the current branch and each other one to a fresh fork of it. */
    private applyCandidates(candidates: readonly Solution[]): void {
        const { store, log } = this.context;
        const forks = candidates.slice(1).map(() => store.create());
        forks.forEach((index, k) => this.apply(candidates[k + 1], index));
        this.apply(candidates[0], store.currentIndex);
        if (forks.length > 0) log(`Forked ${forks.length} branch(es) from branch ${store.currentIndex}`);
    }

    private apply(solution: Solution, index: number): void {
        const { store, log } = this.context;
        for (const [name, value] of solution) {
            log(`Branch ${index}: ${name} = ${printExpr(value)}`);
            store.set(name, value, index);
        }
    }
}
