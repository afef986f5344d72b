/**
 * @file registry.ts
 * @description Registration of equation and procedure methods, in declaration order.
 */

import type { EquationMethod, MethodEntry, ProcedureMethod } from './types';
import { ConfigurationError } from './errors';

export class MethodRegistry {
    private readonly entries: MethodEntry[] = [];

    private checkName(name: string): void {
        if (name.length === 0) throw new ConfigurationError('Method names must not be empty');
        if (this.entries.some(e => e.name === name)) {
            throw new ConfigurationError(`A method named '${name}' is already registered`);
        }
    }

    addEquation(name: string, fn: EquationMethod): void {
        this.checkName(name);
        this.entries.push({ kind: 'equation', name, fn });
    }

    addProcedure(name: string, fn: ProcedureMethod): void {
        this.checkName(name);
        this.entries.push({ kind: 'procedure', name, fn });
    }

    get equations(): Extract<MethodEntry, { kind: 'equation' }>[] {
        return this.entries.filter((e): e is Extract<MethodEntry, { kind: 'equation' }> => e.kind === 'equation');
    }

    get procedures(): Extract<MethodEntry, { kind: 'procedure' }>[] {
        return this.entries.filter((e): e is Extract<MethodEntry, { kind: 'procedure' }> => e.kind === 'procedure');
    }

    get size(): number {
        return this.entries.length;
    }
}
