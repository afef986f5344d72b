/**
 * @file tests/utils.ts
 * @description Assertion helpers shared by the test suites.
 */

import { Expr } from '../src/types';
import { printExpr } from '../src/utils';

// Helper function to assert equality for test cases
export function assertEqual(actual: string, expected: string, message: string) {
    if (actual !== expected) {
        console.error(`Assertion Failed: ${message}`);
        console.error(`Expected: ${expected}`);
        console.error(`Actual:   ${actual}`);
        throw new Error(`Assertion Failed: ${message}\nExpected: ${expected}\nActual:   ${actual}`);
    }
    console.log(`Assertion Passed: ${message}`);
}

export function assert(condition: boolean, message: string) {
    if (!condition) {
        console.error(`Assertion Failed: ${message}`);
        throw new Error(`Assertion Failed: ${message}`);
    }
    console.log(`Assertion Passed: ${message}`);
}

export function assertClose(actual: number, expected: number, message: string, tolerance = 1e-9) {
    const scale = Math.max(1, Math.abs(expected));
    assert(Math.abs(actual - expected) <= tolerance * scale, `${message} (expected ${expected}, got ${actual})`);
}

export function assertExpr(actual: Expr, expected: string, message: string) {
    assertEqual(printExpr(actual), expected, message);
}

/** Asserts that `fn` throws an instance of `errorType`, and returns it. */
export function assertThrows<E extends Error>(fn: () => unknown, errorType: new (...args: never[]) => E, message: string): E {
    try {
        fn();
    } catch (e) {
        if (e instanceof errorType) {
            console.log(`Assertion Passed: ${message}`);
            return e;
        }
        throw new Error(`Assertion Failed: ${message}\nUnexpected error: ${String(e)}`);
    }
    throw new Error(`Assertion Failed: ${message}\nNothing was thrown`);
}

/** A deterministic source of uniform numbers in [0, 1). */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state * 1664525 + 1013904223) >>> 0;
        return state / 4294967296;
    };
}
