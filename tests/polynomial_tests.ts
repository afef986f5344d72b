/**
 * @file tests/polynomial_tests.ts
 * @description Tests for the canonical polynomial form: normalization, printing,
 * coefficient extraction and substitution.
 */
import { Num, Sym, Unit, Sum, Product, Power, Call } from '../src/types';
import {
    exprToPoly, polyToExpr, simplifyExpr, polyCoefficientsIn, polyDegreeIn, polySubstitute,
    polyConst, polyVariables, polyUnits, polyNumber,
} from '../src/polynomial';
import { assert, assertEqual, assertExpr } from './utils';
import { describe, it } from 'node:test';

const x = Sym('x');
const y = Sym('y');

describe("Polynomial Normal Form", () => {
    describe("Simplification", () => {
        it("collects x*x - 4 into x^2 - 4", () => {
            assertExpr(simplifyExpr(Sum(Product(x, x), Num(-4))), "x^2 - 4", "x*x - 4 normalizes");
        });

        it("expands (x + 1)^2", () => {
            assertExpr(simplifyExpr(Power(Sum(x, Num(1)), Num(2))), "x^2 + 2*x + 1", "square of a binomial");
        });

        it("cancels x - x to 0", () => {
            assertExpr(simplifyExpr(Sum(x, Product(Num(-1), x))), "0", "x - x is zero");
        });

        it("treats float residue as cancellation", () => {
            assertExpr(simplifyExpr(Sum(Num(0.1), Num(0.2), Num(-0.3))), "0", "0.1 + 0.2 - 0.3 is zero");
        });

        it("orders terms of equal degree by name", () => {
            assertExpr(simplifyExpr(Sum(Product(Num(3), y), Product(Num(2), x))), "2*x + 3*y", "x before y");
        });

        it("keeps negative powers as a Laurent term", () => {
            assertExpr(simplifyExpr(Power(x, Num(-1))), "x^(-1)", "1/x");
            assertExpr(simplifyExpr(Product(x, Power(x, Num(-1)))), "1", "x/x is one");
        });

        it("keeps non-polynomial subterms whole", () => {
            assertExpr(simplifyExpr(Sum(Call('sin', x), Call('sin', x))), "2*sin(x)", "sin(x) + sin(x)");
        });

        it("evaluates functions of constants", () => {
            assertExpr(simplifyExpr(Call('sqrt', Num(16))), "4", "sqrt(16)");
            assertExpr(simplifyExpr(Call('abs', Num(-3))), "3", "abs(-3)");
        });

        it("places unit tags after unknowns", () => {
            assertExpr(simplifyExpr(Product(Num(10), Unit('cm'), x)), "10*x*cm", "10*cm*x");
        });

        it("takes fractional powers of positive unit monomials", () => {
            assertExpr(simplifyExpr(Call('sqrt', Product(Num(4), Power(Unit('m'), Num(2))))), "2*m", "sqrt(4*m^2)");
        });
    });

    describe("Queries", () => {
        it("reports variables and units separately", () => {
            const p = exprToPoly(Sum(Product(x, Unit('m')), y));
            assertEqual([...polyVariables(p)].sort().join(','), "x,y", "variables of x*m + y");
            assertEqual([...polyUnits(p)].join(','), "m", "units of x*m + y");
        });

        it("splits coefficients by powers of one unknown", () => {
            const p = exprToPoly(Sum(Product(Power(x, Num(2)), y), Product(Num(3), Power(x, Num(2))), Num(2)));
            const coeffs = polyCoefficientsIn(p, 'x');
            assertEqual([...coeffs.keys()].sort().join(','), "0,2", "powers of x present");
            const square = coeffs.get(2);
            const constant = coeffs.get(0);
            assert(square !== undefined && constant !== undefined, "both coefficients exist");
            if (square && constant) {
                assertExpr(polyToExpr(square), "y + 3", "coefficient of x^2");
                assertExpr(polyToExpr(constant), "2", "constant coefficient");
            }
            assertEqual(String(polyDegreeIn(p, 'x')), "2", "degree in x");
            assertEqual(String(polyDegreeIn(p, 'y')), "1", "degree in y");
        });

        it("substitutes a value for an unknown", () => {
            const p = exprToPoly(Sum(Power(x, Num(2)), Num(-4)));
            const at2 = polySubstitute(p, 'x', polyConst(2));
            assert(at2 !== undefined && at2.size === 0, "x^2 - 4 vanishes at x = 2");
            const at3 = polySubstitute(p, 'x', polyConst(3));
            assert(at3 !== undefined && polyNumber(at3) === 5, "x^2 - 4 is 5 at x = 3");
        });

        it("refuses to invert a multi-term substitution", () => {
            const p = exprToPoly(Power(x, Num(-1)));
            assert(polySubstitute(p, 'x', exprToPoly(Sum(y, Num(1)))) === undefined, "1/x with x = y + 1 is not polynomial");
        });
    });
});
