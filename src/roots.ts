/**
 * @file roots.ts
 * @description Real roots of univariate polynomials with numeric coefficients.
 */

import { MAX_BISECTION_STEPS, ROOT_TOLERANCE } from './constants';

// Coefficients are indexed by degree: coeffs[k] multiplies x^k
function horner(coeffs: readonly number[], x: number): number {
    let value = 0;
    for (let k = coeffs.length - 1; k >= 0; k--) value = value * x + coeffs[k];
    return value;
}

function magnitude(coeffs: readonly number[], x: number): number {
    let value = 0;
    for (let k = coeffs.length - 1; k >= 0; k--) value = value * Math.abs(x) + Math.abs(coeffs[k]);
    return value;
}

function derivative(coeffs: readonly number[]): number[] {
    return coeffs.slice(1).map((c, k) => c * (k + 1));
}

function quadraticRoots(a: number, b: number, c: number): number[] {
    const disc = b * b - 4 * a * c;
    const scale = b * b + Math.abs(4 * a * c);
    if (disc < -ROOT_TOLERANCE * scale) return [];
    if (Math.abs(disc) <= ROOT_TOLERANCE * scale) return [-b / (2 * a)];
    const q = -0.5 * (b + (b >= 0 ? 1 : -1) * Math.sqrt(disc));
    return [q / a, c / q];
}

function bisect(coeffs: readonly number[], lo: number, hi: number): number {
    let flo = horner(coeffs, lo);
    for (let step = 0; step < MAX_BISECTION_STEPS; step++) {
        const mid = (lo + hi) / 2;
        if (mid <= lo || mid >= hi) break;
        const fmid = horner(coeffs, mid);
        if (fmid === 0) return mid;
        if ((fmid < 0) === (flo < 0)) {
            lo = mid;
            flo = fmid;
        } else {
            hi = mid;
        }
    }
    return (lo + hi) / 2;
}

/**
 * Roots of a polynomial of degree three or more: the real roots lie between
 * consecutive critical points (roots of the derivative), each interval holding
 * at most one sign change. Critical points that are themselves roots are the
 * repeated roots.
 */
function bracketedRoots(coeffs: readonly number[]): number[] {
    const n = coeffs.length - 1;
    const lead = coeffs[n];
    const bound = 1 + Math.max(...coeffs.slice(0, n).map(c => Math.abs(c / lead)));
    const critical = realRoots(derivative(coeffs)).filter(x => x > -bound && x < bound);

    const roots: number[] = [];
    for (const x of critical) {
        if (Math.abs(horner(coeffs, x)) <= ROOT_TOLERANCE * magnitude(coeffs, x)) roots.push(x);
    }
    const points = [-bound, ...critical, bound];
    for (let i = 0; i + 1 < points.length; i++) {
        const lo = points[i];
        const hi = points[i + 1];
        const flo = horner(coeffs, lo);
        const fhi = horner(coeffs, hi);
        if (flo !== 0 && fhi !== 0 && (flo < 0) !== (fhi < 0)) roots.push(bisect(coeffs, lo, hi));
    }
    return roots;
}

function dedupeSorted(roots: number[]): number[] {
    const sorted = [...roots].sort((a, b) => a - b);
    const result: number[] = [];
    for (const root of sorted) {
        const last = result[result.length - 1];
        if (result.length > 0 && Math.abs(root - last) <= ROOT_TOLERANCE * Math.max(1, Math.abs(root))) continue;
        result.push(root);
    }
    return result;
}

/**
 * Distinct real roots, ascending.
 * @param coeffs Coefficients by ascending degree. Must not all be zero.
 */
export function realRoots(coeffs: readonly number[]): number[] {
    let a = [...coeffs];
    while (a.length > 0 && a[a.length - 1] === 0) a.pop();
    if (a.length === 0) throw new Error('realRoots: the zero polynomial has no isolated roots');

    const roots: number[] = [];
    let lowest = 0;
    while (lowest < a.length - 1 && a[lowest] === 0) lowest++;
    if (lowest > 0) {
        roots.push(0);
        a = a.slice(lowest);
    }

    const degree = a.length - 1;
    if (degree === 1) roots.push(-a[0] / a[1]);
    else if (degree === 2) roots.push(...quadraticRoots(a[2], a[1], a[0]));
    else if (degree > 2) roots.push(...bracketedRoots(a));
    return dedupeSorted(roots);
}
