/**
 * @file tests/algebra_tests.ts
 * @description Tests for the bundled polynomial oracle.
 */
import { Expr, Num, Sym, Unit, Sum, Product, Power, Call, Relation, Solution } from '../src/types';
import { PolynomialOracle } from '../src/algebra';
import { printExpr } from '../src/utils';
import { assert, assertClose, assertEqual } from './utils';
import { describe, it } from 'node:test';

const x = Sym('x');
const y = Sym('y');
const oracle = new PolynomialOracle();

const rel = (lhs: Expr, rhs: Expr): Relation => ({ lhs, rhs });

function show(solution: Solution): string {
    return [...solution].map(([name, value]) => `${name}=${printExpr(value)}`).join(', ');
}

describe("Polynomial Oracle", () => {
    it("reports free variables but not units", () => {
        const free = oracle.freeVariables(Sum(Product(x, Unit('cm')), Num(3)));
        assertEqual([...free].join(','), "x", "free variables of x*cm + 3");
    });

    it("finds both roots of x^2 = 4", () => {
        const result = oracle.solve([rel(Power(x, Num(2)), Num(4))], ['x']);
        assert(result.kind === 'multiple', "two candidates");
        if (result.kind === 'multiple') {
            assertEqual(result.candidates.map(show).join(' | '), "x=-2 | x=2", "candidates in ascending order");
        }
    });

    it("solves a linear pair", () => {
        const result = oracle.solve([rel(Sum(x, y), Num(3)), rel(Sum(x, Product(Num(-1), y)), Num(1))], ['x', 'y']);
        assert(result.kind === 'unique', "one solution");
        if (result.kind === 'unique') assertEqual(show(result.solution), "x=2, y=1", "x + y = 3, x - y = 1");
    });

    it("leaves an underdetermined unknown in the solution", () => {
        const result = oracle.solve([rel(y, Product(Num(2), x))], ['x', 'y']);
        assert(result.kind === 'unique', "one parametric solution");
        if (result.kind === 'unique') assertEqual(show(result.solution), "x=0.5*y", "x in terms of y");
    });

    it("divides out an unknown coefficient", () => {
        const result = oracle.solve([rel(Product(x, y), Num(6))], ['x', 'y']);
        assert(result.kind === 'unique', "one parametric solution");
        if (result.kind === 'unique') assertEqual(show(result.solution), "x=6*y^(-1)", "x in terms of y");
    });

    it("solves a hyperbola against a circle", () => {
        const circle = rel(Sum(Power(x, Num(2)), Power(y, Num(2))), Num(13));
        const result = oracle.solve([rel(Product(x, y), Num(6)), circle], ['x', 'y']);
        assert(result.kind === 'multiple', "several candidates");
        if (result.kind !== 'multiple') return;
        const expected = [[-2, -3], [-3, -2], [3, 2], [2, 3]];
        assertEqual(String(result.candidates.length), "4", "four intersections");
        result.candidates.forEach((candidate, i) => {
            const xValue = candidate.get('x');
            const yValue = candidate.get('y');
            assert(xValue?.tag === 'Num' && yValue?.tag === 'Num', "numeric candidate");
            if (xValue?.tag !== 'Num' || yValue?.tag !== 'Num') return;
            assertClose(xValue.value, expected[i][0], `x of candidate ${i}`);
            assertClose(yValue.value, expected[i][1], `y of candidate ${i}`);
        });
    });

    it("reports parallel lines as empty", () => {
        const result = oracle.solve([rel(Sum(x, y), Num(1)), rel(Sum(x, y), Num(2))], ['x', 'y']);
        assertEqual(result.kind, "empty", "no intersection");
    });

    it("reports x^2 = -1 as empty", () => {
        assertEqual(oracle.solve([rel(Power(x, Num(2)), Num(-1))], ['x']).kind, "empty", "no real root");
    });

    it("cannot decide relations inside opaque functions", () => {
        assertEqual(oracle.solve([rel(Call('sin', x), Num(0.5))], ['x']).kind, "undetermined", "sin(x) = 0.5");
    });

    it("factors the unit out of a root", () => {
        const result = oracle.solve([rel(Power(x, Num(2)), Product(Num(4), Power(Unit('m'), Num(2))))], ['x']);
        assert(result.kind === 'multiple', "two candidates");
        if (result.kind === 'multiple') {
            assertEqual(result.candidates.map(show).join(' | '), "x=-2*m | x=2*m", "x^2 = 4*m^2");
        }
    });

    it("solves for a dimensioned value", () => {
        const result = oracle.solve([rel(y, Product(Num(10), Unit('cm'), Num(5)))], ['y']);
        assert(result.kind === 'unique', "one solution");
        if (result.kind === 'unique') assertEqual(show(result.solution), "y=50*cm", "y = 10*cm*5");
    });

    it("rejects a root that zeroes a denominator", () => {
        // x = y/x with y = 0 would need x = 0
        const result = oracle.solve([rel(y, Num(0)), rel(x, Product(y, Power(x, Num(-1))))], ['x', 'y']);
        assertEqual(result.kind, "empty", "x = 0 is excluded");
    });
});
