/**
 * @file arith.ts
 * @description Arithmetic on expressions and plain numbers. Results are
 * unsimplified trees; the oracle normalizes them when they are compared.
 */

import { Expr, ExprLike, Num, Sum, Product, Power, Call, toExpr } from './types';

export const add = (...terms: ExprLike[]): Expr => Sum(...terms.map(toExpr));

export const sub = (a: ExprLike, b: ExprLike): Expr => Sum(toExpr(a), Product(Num(-1), toExpr(b)));

export const mul = (...factors: ExprLike[]): Expr => Product(...factors.map(toExpr));

export const div = (a: ExprLike, b: ExprLike): Expr => Product(toExpr(a), Power(toExpr(b), Num(-1)));

export const pow = (base: ExprLike, exponent: ExprLike): Expr => Power(toExpr(base), toExpr(exponent));

export const neg = (a: ExprLike): Expr => Product(Num(-1), toExpr(a));

export const sqrt = (a: ExprLike): Expr => Call('sqrt', toExpr(a));
