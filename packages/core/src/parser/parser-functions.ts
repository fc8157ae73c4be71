/**
 * Parser Extension: Function Parsing
 * Prototypes, definitions, extern declarations and top-level expressions
 */

import { Parser, type ParseResult } from './parser.js';
import type { FunctionNode, PrototypeNode } from '../types.js';
import { ANON_FUNCTION_NAME, makeSpan, ok } from '../types.js';
import { advance, checkChar, current } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrototype(): ParseResult<PrototypeNode>;
    parseDefinition(): ParseResult<FunctionNode>;
    parseExtern(): ParseResult<PrototypeNode>;
    parseTopLevelExpr(): ParseResult<FunctionNode>;
  }
}

// ============================================================
// PROTOTYPES
// ============================================================

/** prototype ::= identifier '(' identifier* ')' */
Parser.prototype.parsePrototype = function (
  this: Parser
): ParseResult<PrototypeNode> {
  const nameToken = current(this.state);
  if (nameToken.type !== 'IDENTIFIER') {
    return this.fail('CALX-P004');
  }
  advance(this.state);

  if (!checkChar(this.state, '(')) {
    return this.fail('CALX-P005');
  }
  advance(this.state); // consume (

  const params: string[] = [];
  for (;;) {
    const token = current(this.state);
    if (token.type !== 'IDENTIFIER') break;
    params.push(token.value);
    advance(this.state);
  }

  if (!checkChar(this.state, ')')) {
    return this.fail('CALX-P006');
  }
  const close = advance(this.state); // consume )

  return ok({
    type: 'Prototype',
    name: nameToken.value,
    params,
    span: makeSpan(nameToken.span.start, close.span.end),
  });
};

// ============================================================
// TOP-LEVEL CONSTRUCTS
// ============================================================

/** definition ::= 'def' prototype expression */
Parser.prototype.parseDefinition = function (
  this: Parser
): ParseResult<FunctionNode> {
  const defToken = current(this.state);
  if (defToken.type !== 'DEF') {
    return this.fail('CALX-P007', { keyword: 'def' });
  }
  advance(this.state);

  const prototype = this.parsePrototype();
  if (!prototype.ok) return prototype;

  const body = this.parseExpression();
  if (!body.ok) return body;

  return ok({
    type: 'Function',
    prototype: prototype.value,
    body: body.value,
    span: makeSpan(defToken.span.start, body.value.span.end),
  });
};

/** external ::= 'extern' prototype */
Parser.prototype.parseExtern = function (
  this: Parser
): ParseResult<PrototypeNode> {
  const externToken = current(this.state);
  if (externToken.type !== 'EXTERN') {
    return this.fail('CALX-P007', { keyword: 'extern' });
  }
  advance(this.state);

  const prototype = this.parsePrototype();
  if (!prototype.ok) return prototype;

  return ok({
    ...prototype.value,
    span: makeSpan(externToken.span.start, prototype.value.span.end),
  });
};

/** toplevelexpr ::= expression, wrapped as a nullary anonymous function */
Parser.prototype.parseTopLevelExpr = function (
  this: Parser
): ParseResult<FunctionNode> {
  const body = this.parseExpression();
  if (!body.ok) return body;

  return ok({
    type: 'Function',
    prototype: {
      type: 'Prototype',
      name: ANON_FUNCTION_NAME,
      params: [],
      span: body.value.span,
    },
    body: body.value,
    span: body.value.span,
  });
};
