/**
 * @file options.ts
 * @description Solver options, validated on construction.
 */

import { z } from 'zod';
import { AlgebraOracle, defaultOracle } from './algebra';
import { ConfigurationError } from './errors';
import { EPSILON, RAND_RANGE } from './constants';

function isOracle(value: unknown): value is AlgebraOracle {
    if (typeof value !== 'object' || value === null) return false;
    return ['simplify', 'freeVariables', 'solve'].every(key => typeof Reflect.get(value, key) === 'function');
}

export const SolverOptionsSchema = z.object({
    epsilon: z.number().positive().default(EPSILON),
    // Unit substitution factors are drawn from [1 - randRange, 1 + randRange]
    randRange: z.number().positive().lt(1).default(RAND_RANGE),
    random: z.custom<() => number>(v => typeof v === 'function', 'random must be a function').optional(),
    oracle: z.custom<AlgebraOracle>(isOracle, 'oracle must implement simplify, freeVariables and solve').optional(),
    procedureWrites: z.enum(['branch', 'uniform']).default('branch'),
    verbose: z.boolean().default(false),
}).strict();

export type SolverOptions = z.input<typeof SolverOptionsSchema>;

export interface ResolvedOptions {
    readonly epsilon: number;
    readonly randRange: number;
    readonly random: () => number;
    readonly oracle: AlgebraOracle;
    readonly procedureWrites: 'branch' | 'uniform';
    readonly verbose: boolean;
}

export function resolveOptions(options: SolverOptions = {}): ResolvedOptions {
    const parsed = SolverOptionsSchema.safeParse(options);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid solver options: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`);
    }
    const { random, oracle, ...rest } = parsed.data;
    return { ...rest, random: random ?? Math.random, oracle: oracle ?? defaultOracle };
}
