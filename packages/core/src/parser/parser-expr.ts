/**
 * Parser Extension: Expression Parsing
 * Primary expressions and precedence climbing for binary operators
 */

import { Parser, type ParseResult } from './parser.js';
import type { BinaryOpNode, ExprNode } from '../types.js';
import { makeSpan, ok } from '../types.js';
import { advance, checkChar, current, tokenPrecedence } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ParseResult<ExprNode>;
    parsePrimary(): ParseResult<ExprNode>;
    parseNumberExpr(): ParseResult<ExprNode>;
    parseParenExpr(): ParseResult<ExprNode>;
    parseIdentifierExpr(): ParseResult<ExprNode>;
    parseBinOpRhs(minPrecedence: number, lhs: ExprNode): ParseResult<ExprNode>;
  }
}

// ============================================================
// EXPRESSION PARSING
// ============================================================

/** expression ::= primary binoprhs */
Parser.prototype.parseExpression = function (
  this: Parser
): ParseResult<ExprNode> {
  const lhs = this.parsePrimary();
  if (!lhs.ok) return lhs;

  return this.parseBinOpRhs(0, lhs.value);
};

/**
 * primary ::= identifierexpr | numberexpr | parenexpr
 */
Parser.prototype.parsePrimary = function (this: Parser): ParseResult<ExprNode> {
  const token = current(this.state);

  if (token.type === 'IDENTIFIER') {
    return this.parseIdentifierExpr();
  }
  if (token.type === 'NUMBER') {
    return this.parseNumberExpr();
  }
  if (checkChar(this.state, '(')) {
    return this.parseParenExpr();
  }

  return this.fail('CALX-P001');
};

/** numberexpr ::= number */
Parser.prototype.parseNumberExpr = function (
  this: Parser
): ParseResult<ExprNode> {
  const token = current(this.state);
  if (token.type !== 'NUMBER') {
    return this.fail('CALX-P001');
  }
  advance(this.state);

  return ok({ type: 'NumberLiteral', value: token.value, span: token.span });
};

/** parenexpr ::= '(' expression ')' */
Parser.prototype.parseParenExpr = function (
  this: Parser
): ParseResult<ExprNode> {
  advance(this.state); // consume (

  const inner = this.parseExpression();
  if (!inner.ok) return inner;

  if (!checkChar(this.state, ')')) {
    return this.fail('CALX-P002');
  }
  advance(this.state); // consume )

  return inner;
};

/**
 * identifierexpr
 *   ::= identifier
 *   ::= identifier '(' (expression (',' expression)*)? ')'
 */
Parser.prototype.parseIdentifierExpr = function (
  this: Parser
): ParseResult<ExprNode> {
  const nameToken = current(this.state);
  if (nameToken.type !== 'IDENTIFIER') {
    return this.fail('CALX-P001');
  }
  advance(this.state);

  if (!checkChar(this.state, '(')) {
    return ok({
      type: 'VariableRef',
      name: nameToken.value,
      span: nameToken.span,
    });
  }
  advance(this.state); // consume (

  const args: ExprNode[] = [];
  if (!checkChar(this.state, ')')) {
    for (;;) {
      const arg = this.parseExpression();
      if (!arg.ok) return arg;
      args.push(arg.value);

      if (checkChar(this.state, ')')) break;
      if (!checkChar(this.state, ',')) {
        return this.fail('CALX-P003');
      }
      advance(this.state); // consume ,
    }
  }
  const close = advance(this.state); // consume )

  return ok({
    type: 'Call',
    callee: nameToken.value,
    args,
    span: makeSpan(nameToken.span.start, close.span.end),
  });
};

/**
 * binoprhs ::= (binop primary)*
 *
 * Consumes operators binding at least as tightly as `minPrecedence`.
 * A following operator that binds tighter is absorbed into the right
 * operand first; equal precedence folds left.
 */
Parser.prototype.parseBinOpRhs = function (
  this: Parser,
  minPrecedence: number,
  lhs: ExprNode
): ParseResult<ExprNode> {
  let left = lhs;

  for (;;) {
    const precedence = tokenPrecedence(this.state);
    const opToken = current(this.state);
    if (opToken.type !== 'CHAR' || precedence < minPrecedence) {
      return ok(left);
    }
    advance(this.state); // consume operator

    const rhs = this.parsePrimary();
    if (!rhs.ok) return rhs;
    let right = rhs.value;

    if (precedence < tokenPrecedence(this.state)) {
      const absorbed = this.parseBinOpRhs(precedence + 1, right);
      if (!absorbed.ok) return absorbed;
      right = absorbed.value;
    }

    const node: BinaryOpNode = {
      type: 'BinaryOp',
      operator: opToken.value,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
    left = node;
  }
};
