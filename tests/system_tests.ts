/**
 * @file tests/system_tests.ts
 * @description End-to-end tests of equation systems: declarations, solving,
 * procedures, unit-carrying values and the re-solve warnings.
 */
import { EquationSystem, isResolvedValue } from '../src/system';
import { mul, pow } from '../src/arith';
import { Sym } from '../src/types';
import { quantity } from '../src/units';
import { ConfigurationError, UnsolvableSystemError, UnresolvedValueError } from '../src/errors';
import { printExpr } from '../src/utils';
import { setDebugVerbose } from '../src/state';
import { assert, assertClose, assertEqual, assertExpr, assertThrows, seededRandom } from './utils';
import { describe, it, mock, afterEach } from 'node:test';

function squareSystem(seed: number): EquationSystem {
    const sys = new EquationSystem(['x'], { random: seededRandom(seed) });
    sys.equation('square', () => [pow(sys.get('x'), 2), 4]);
    return sys;
}

describe("Equation System", () => {
    afterEach(() => {
        mock.restoreAll();
    });

    describe("Declarations", () => {
        it("accepts names with descriptions", () => {
            const sys = new EquationSystem({ d: 'diameter', r: 'radius' });
            assertEqual(sys.variables.join(','), "d,r", "declared variables");
            assertEqual(sys.describe('d'), "diameter", "description of d");
            assertThrows(() => sys.describe('q'), ConfigurationError, "unknown variable");
        });

        it("rejects invalid and duplicate names", () => {
            assertThrows(() => new EquationSystem(['1x']), ConfigurationError, "leading digit");
            assertThrows(() => new EquationSystem(['x', 'x']), ConfigurationError, "duplicate");
            assertThrows(() => new EquationSystem(['sqrt']), ConfigurationError, "function name");
        });

        it("rejects invalid options", () => {
            assertThrows(() => new EquationSystem(['x'], { epsilon: -1 }), ConfigurationError, "negative epsilon");
            assertThrows(() => new EquationSystem(['x'], { randRange: 2 }), ConfigurationError, "randRange above one");
        });

        it("rejects duplicate method names", () => {
            const sys = new EquationSystem(['x']);
            sys.equation('e', () => ['x', 1]);
            assertThrows(() => sys.procedure('e', () => undefined), ConfigurationError, "name taken by an equation");
        });

        it("adds variables until the first fork", () => {
            const sys = squareSystem(1);
            sys.addVariables(['y']);
            assertExpr(sys.get('y'), "y", "y starts unresolved");
            sys.solve();
            assert(sys.locked, "forking locks the system");
            assertThrows(() => sys.addVariables(['z']), ConfigurationError, "locked");
        });
    });

    describe("Solving", () => {
        it("splits x^2 = 4 into two branches", () => {
            const sys = squareSystem(2);
            sys.solve();
            assert(sys.solved, "solved flag");
            assertEqual(String(sys.branchCount()), "2", "two branches");
            assertEqual(sys.valuesAcrossBranches('x').map(printExpr).join(','), "-2,2", "x in each branch");
        });

        it("combines two quadratic ambiguities into four branches", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(3) });
            sys.equation('xSquare', () => ['x^2', 4]);
            sys.equation('ySquare', () => ['y^2', 16]);
            sys.solve();
            assertEqual(String(sys.branchCount()), "4", "four branches");
            const pairs = sys.allBranchBindingsDecimal().map(b => `${b.x}/${b.y}`);
            assertEqual(pairs.join(' '), "-2/-4 2/-4 -2/4 2/4", "every sign combination once");
        });

        it("solves a linear system in one branch", () => {
            const sys = new EquationSystem(['x', 'y', 'z'], { random: seededRandom(4) });
            sys.equation('a', () => ['x', 'y + z']);
            sys.equation('b', () => ['5*x + z', '-y']);
            sys.equation('c', () => ['x + y', 'z/4 + 10']);
            sys.solve();
            assertEqual(String(sys.branchCount()), "1", "unique solution");
            assertClose(sys.num('x'), 0, "x");
            assertClose(sys.num('y'), 8, "y");
            assertClose(sys.num('z'), -8, "z");
        });

        it("forks one branch per intersection of a hyperbola and a circle", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(24) });
            sys.equation('hyperbola', () => ['x*y', 6]);
            sys.equation('circle', () => ['x^2 + y^2', 13]);
            sys.solve();
            assertEqual(String(sys.branchCount()), "4", "four branches");
            const pairs = sys.allBranchBindingsDecimal()
                .map(b => `${Math.round(Number(b.x))}/${Math.round(Number(b.y))}`);
            assertEqual(pairs.join(' '), "-2/-3 -3/-2 3/2 2/3", "each intersection once");
        });

        it("raises when a fixed value contradicts the system", () => {
            const sys = new EquationSystem(['x', 'y', 'z'], { random: seededRandom(5) });
            sys.equation('a', () => ['x', 'y + z']);
            sys.equation('b', () => ['5*x + z', '-y']);
            sys.equation('c', () => ['x + y', 'z/4 + 10']);
            sys.set('x', 1);
            const error = assertThrows(() => sys.solve(), UnsolvableSystemError, "x = 1 is inconsistent");
            assertEqual(String(error.contradictions.length), "1", "the only branch contradicts itself");
        });

        it("raises when a fixed value divides by zero", () => {
            const sys = new EquationSystem(['v', 'd', 't'], { random: seededRandom(23) });
            sys.equation('speed', () => ['v', 'd/t']);
            sys.set('d', 10);
            sys.set('t', 0);
            sys.set('v', 5);
            const error = assertThrows(() => sys.solve(), UnsolvableSystemError, "5 = 10/0");
            assertEqual(String(error.contradictions.length), "1", "the only branch contradicts itself");
        });

        it("raises for parallel lines", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(6) });
            sys.equation('first', () => ['x + y', 1]);
            sys.equation('second', () => ['x + y', 2]);
            const error = assertThrows(() => sys.solve(), UnsolvableSystemError, "no intersection");
            assertEqual(String(error.unsolvableSets.length), "1", "the pair is reported");
            assert(error.message.includes("Unsolvable relation set(s): [x + y = 1, x + y = 2]"), "message lists the pair");
        });

        it("leaves an underdetermined system unresolved", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(7) });
            sys.equation('line', () => ['y', '2*x']);
            sys.solve();
            assertEqual(String(sys.branchCount()), "1", "no fork");
            assert(!sys.isResolved('x') && !sys.isResolved('y'), "both unresolved");
            assertThrows(() => sys.num('x'), UnresolvedValueError, "numeric read of an unresolved value");
        });

        it("carries units through the solution", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(8) });
            sys.equation('scale', () => ['y', '10*cm*x']);
            sys.set('x', 5);
            sys.solve();
            assertExpr(sys.get('y'), "50*cm", "y = 50 cm");
            assert(sys.isResolved('y'), "a quantity is resolved");
            assertEqual(sys.valuesAcrossBranchesDecimal('y').join(','), "50*cm", "decimal view prints quantities");
        });

        it("accepts quantities as equation sides", () => {
            const sys = new EquationSystem(['length'], { random: seededRandom(9) });
            sys.equation('total', () => [mul(2, sys.get('length')), quantity(1, 'm')]);
            sys.solve();
            assertExpr(sys.get('length'), "0.5*m", "half a metre");
        });

        it("rejects equations that do not return two sides", () => {
            const sys = new EquationSystem(['x'], { random: seededRandom(10) });
            sys.equation('bad', () => ['x']);
            assertThrows(() => sys.solve(), ConfigurationError, "one side");
        });

        it("is idempotent once resolved", () => {
            const warnMock = mock.method(console, 'warn', () => undefined);
            const sys = squareSystem(11);
            sys.solve();
            const before = sys.valuesAcrossBranchesDecimal('x').join(',');
            sys.solve();
            assertEqual(sys.valuesAcrossBranchesDecimal('x').join(','), before, "same bindings");
            assertEqual(String(sys.branchCount()), "2", "same branch count");
            assertEqual(String(warnMock.mock.callCount()), "1", "re-solving warns once");
        });
    });

    describe("Procedures", () => {
        it("deletes the branches a procedure rejects", () => {
            const sys = squareSystem(12);
            sys.procedure('positive', () => {
                if (sys.num('x') < 0) sys.deleteCurrentBranch();
            });
            sys.solve();
            assertEqual(String(sys.branchCount()), "1", "one branch left");
            assertEqual(String(sys.num('x')), "2", "the positive root");
        });

        it("collapses branches a procedure makes identical", () => {
            const sys = squareSystem(13);
            sys.procedure('magnitude', () => {
                sys.set('x', Math.abs(sys.num('x')));
            });
            sys.solve();
            assertEqual(String(sys.branchCount()), "1", "duplicates collapse");
            assertEqual(String(sys.num('x')), "2", "x = |x|");
        });

        it("writes to the current branch by default", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(14) });
            sys.equation('square', () => ['x^2', 4]);
            sys.procedure('derive', () => {
                if (sys.isResolved('x') && !sys.isResolved('y')) sys.set('y', mul(10, sys.get('x')));
            });
            sys.solve();
            assertEqual(sys.valuesAcrossBranchesDecimal('y').join(','), "-20,20", "each branch derives its own y");
        });

        it("propagates writes to uniform variables when asked to", () => {
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(15), procedureWrites: 'uniform' });
            sys.equation('square', () => ['x^2', 4]);
            sys.procedure('derive', () => {
                if (sys.isResolved('x') && !sys.isResolved('y')) sys.set('y', mul(10, sys.get('x')));
            });
            sys.solve();
            assertEqual(sys.valuesAcrossBranchesDecimal('y').join(','), "-20,-20", "the first write reaches every branch");
        });
    });

    describe("Access", () => {
        it("writes outside solve() reach every branch, with a warning after solving", () => {
            const warnMock = mock.method(console, 'warn', () => undefined);
            const sys = new EquationSystem(['x', 'y'], { random: seededRandom(16) });
            sys.equation('square', () => ['x^2', 4]);
            sys.solve();
            sys.set('y', 3);
            assertEqual(sys.valuesAcrossBranchesDecimal('y').join(','), "3,3", "y in every branch");
            assertEqual(String(warnMock.mock.callCount()), "1", "post-solve write warns");
            sys.clearVariable('y');
            assertEqual(sys.valuesAcrossBranchesDecimal('y').join(','), "y,y", "y cleared everywhere");
        });

        it("switches between branches", () => {
            const sys = squareSystem(17);
            sys.solve();
            sys.switchBranch(1);
            assertEqual(String(sys.currentBranch), "1", "current branch");
            assertEqual(String(sys.num('x')), "2", "x in branch 1");
            assertExpr(sys.expr('x + 1'), "2 + 1", "expressions read the current branch");
            assertThrows(() => sys.switchBranch(2), RangeError, "missing branch");
        });

        it("deletes the current branch outside solve()", () => {
            const sys = squareSystem(18);
            sys.solve();
            sys.deleteCurrentBranch();
            assertEqual(String(sys.branchCount()), "1", "one branch left");
            assertThrows(() => sys.deleteCurrentBranch(), RangeError, "the last branch stays");
        });

        it("reports all bindings", () => {
            const sys = squareSystem(19);
            sys.solve();
            const bindings = sys.allBranchBindings();
            assertEqual(bindings.map(b => printExpr(b.x)).join(','), "-2,2", "x per branch");
            assert(isResolvedValue(bindings[0].x), "bindings are resolved values");
            assert(!isResolvedValue(Sym('x')), "a symbol is not resolved");
        });
    });
    describe("Logging", () => {
        it("logs solver steps when verbose", () => {
            const logMock = mock.method(console, 'log', () => undefined);
            const sys = new EquationSystem(['x'], { random: seededRandom(20), verbose: true });
            sys.equation('square', () => ['x^2', 4]);
            sys.solve();
            const prefixes = logMock.mock.calls.map(call => call.arguments[0]);
            mock.restoreAll();
            assert(prefixes.length > 0, "something was logged");
            assert(prefixes.every(prefix => prefix === "[VERBOSE]"), "every line is tagged");
        });

        it("follows the global debug flag", () => {
            const logMock = mock.method(console, 'log', () => undefined);
            const quiet = squareSystem(21);
            quiet.solve();
            const silentCount = logMock.mock.callCount();
            setDebugVerbose(true);
            try {
                squareSystem(22).solve();
            } finally {
                setDebugVerbose(false);
            }
            const debugCount = logMock.mock.callCount();
            mock.restoreAll();
            assertEqual(String(silentCount), "0", "quiet by default");
            assert(debugCount > 0, "debug flag enables logging");
        });
    });
});
