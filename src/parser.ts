/**
 * @file parser.ts
 * @description Infix expression parser. Identifiers are resolved by the caller,
 * so the same source text reads differently in each branch.
 */

import * as P from 'parsimmon';
import { Expr, Num, Sum, Product, Power, Call, isFunctionName } from './types';
import { ConfigurationError } from './errors';

/** Maps an identifier to its expression, or `undefined` when the name is unknown. */
export type IdentifierResolver = (name: string) => Expr | undefined;

// Helper to create a parser that consumes trailing whitespace
function token<T>(parser: P.Parser<T>): P.Parser<T> {
    return parser.skip(P.optWhitespace);
}

type ExprLanguage = {
    Expr: Expr,
    Term: Expr,
    Unary: Expr,
    Power: Expr,
    Atom: Expr,
    Number: Expr,
    Identifier: string,
    Name: Expr,
    Parens: Expr,
};

type Signed = readonly [string, Expr];

function buildParser(resolve: IdentifierResolver) {
    return P.createLanguage<ExprLanguage>({
        Expr: r => P.seq(r.Term, P.seq(token(P.regexp(/[+-]/)), r.Term).many()).map(([head, tail]) => {
            if (tail.length === 0) return head;
            return Sum(head, ...tail.map(([op, term]: Signed) => op === '-' ? Product(Num(-1), term) : term));
        }),

        // A lone `*` is multiplication; `**` belongs to Power
        Term: r => P.seq(r.Unary, P.seq(token(P.regexp(/\*(?!\*)|\//)), r.Unary).many()).map(([head, tail]) => {
            if (tail.length === 0) return head;
            return Product(head, ...tail.map(([op, factor]: Signed) => op === '/' ? Power(factor, Num(-1)) : factor));
        }),

        Unary: r => P.alt(
            token(P.string('-')).then(r.Unary).map(e => e.tag === 'Num' ? Num(-e.value) : Product(Num(-1), e)),
            token(P.string('+')).then(r.Unary),
            r.Power
        ),

        // Right-associative, and binds tighter than unary minus: -x^2 is -(x^2)
        Power: r => P.seq(r.Atom, P.seq(token(P.alt(P.string('**'), P.string('^'))), r.Unary).atMost(1)).map(([base, rest]) =>
            rest.length === 0 ? base : Power(base, rest[0][1])),

        Atom: r => P.alt(r.Number, r.Name, r.Parens),

        Number: () => token(P.regexp(/(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/)).map(text => Num(Number(text))).desc('number'),

        Identifier: () => token(P.regexp(/[A-Za-z_][A-Za-z0-9_]*/)).desc('identifier'),

        Name: r => r.Identifier.chain<Expr>(name => {
            const fn = name;
            if (isFunctionName(fn)) return r.Parens.map(arg => Call(fn, arg));
            const resolved = resolve(name);
            return resolved ? P.succeed(resolved) : P.fail(`a known variable or unit (got '${name}')`);
        }),

        Parens: r => r.Expr.wrap(token(P.string('(')), token(P.string(')'))),
    });
}

/**
 * Parses an infix expression such as `5*x + z` or `10*cm*x`.
 * @throws ConfigurationError on malformed input or an unknown identifier.
 */
export function parseExpr(source: string, resolve: IdentifierResolver): Expr {
    const lang = buildParser(resolve);
    const result = P.optWhitespace.then(lang.Expr).parse(source);
    if (result.status) return result.value;
    throw new ConfigurationError(`Parsing failed: ${P.formatError(source, result)}`);
}
