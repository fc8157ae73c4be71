/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'parse' | 'lowering' | 'module' | 'runtime' | 'config';

/** ID prefix letter for each category */
export const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
  parse: 'P',
  lowering: 'G',
  module: 'M',
  runtime: 'R',
  config: 'C',
};

/**
 * Example demonstrating an error condition.
 * Shown by `calx --explain`.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: CALX-{prefix}{3-digit} (e.g., CALX-G001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      const expectedPrefix = `CALX-${CATEGORY_PREFIX[def.category]}`;
      if (!def.errorId.startsWith(expectedPrefix)) {
        throw new TypeError(
          `Error ID ${def.errorId} does not match category ${def.category}`
        );
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Parse Errors (CALX-P0xx)
  {
    errorId: 'CALX-P001',
    category: 'parse',
    description: 'Unknown token',
    messageTemplate: 'unknown token {found} when expecting an expression',
    cause:
      'An expression must start with a number, an identifier or an opening parenthesis.',
    resolution:
      'Remove the stray character or complete the expression before it.',
    examples: [
      { description: 'Closing parenthesis with no expression', code: ')' },
      { description: 'Operator with a missing operand', code: '1 + * 2' },
    ],
  },
  {
    errorId: 'CALX-P002',
    category: 'parse',
    description: 'Unclosed parenthesis',
    messageTemplate: "expected ')' but found {found}",
    cause: 'A parenthesized expression was not closed.',
    resolution: "Add the missing ')' after the inner expression.",
    examples: [{ description: 'Missing closing parenthesis', code: '(1 + 2' }],
  },
  {
    errorId: 'CALX-P003',
    category: 'parse',
    description: 'Malformed argument list',
    messageTemplate: "expected ')' or ',' in argument list but found {found}",
    cause: 'Call arguments must be separated by commas and closed with a parenthesis.',
    resolution: "Separate arguments with ',' and end the call with ')'.",
    examples: [{ description: 'Arguments without a comma', code: 'foo(1 2)' }],
  },
  {
    errorId: 'CALX-P004',
    category: 'parse',
    description: 'Missing function name',
    messageTemplate: 'expected function name in prototype but found {found}',
    cause: "'def' and 'extern' must be followed by the function's name.",
    resolution: 'Name the function: def name(params) body.',
    examples: [{ description: 'Definition without a name', code: 'def (x) x' }],
  },
  {
    errorId: 'CALX-P005',
    category: 'parse',
    description: "Missing '(' in prototype",
    messageTemplate: "expected '(' in prototype but found {found}",
    cause: 'The parameter list must follow the function name.',
    resolution: "Add '(' and ')' around the parameter names, even when empty.",
    examples: [{ description: 'Parameters without parentheses', code: 'def f x x' }],
  },
  {
    errorId: 'CALX-P006',
    category: 'parse',
    description: "Missing ')' in prototype",
    messageTemplate: "expected ')' in prototype but found {found}",
    cause:
      'Parameter names are bare identifiers separated by whitespace and closed with a parenthesis.',
    resolution: "Remove separators between parameter names and close the list with ')'.",
    examples: [{ description: 'Comma between parameters', code: 'def f(a, b) a' }],
  },
  {
    errorId: 'CALX-P007',
    category: 'parse',
    description: 'Expected keyword',
    messageTemplate: "expected '{keyword}' but found {found}",
    cause: 'A definition or extern production was entered on another token.',
    resolution: "Start definitions with 'def' and declarations with 'extern'.",
  },
  {
    errorId: 'CALX-P008',
    category: 'parse',
    description: 'Trailing input',
    messageTemplate: 'unexpected {found} after expression',
    cause: 'A single expression was expected but more input followed it.',
    resolution: 'Remove the trailing input or parse it as separate statements.',
    examples: [{ description: 'Two expressions', code: '1 2' }],
  },

  // Lowering Errors (CALX-G0xx)
  {
    errorId: 'CALX-G001',
    category: 'lowering',
    description: 'Unknown variable name',
    messageTemplate: 'unknown variable name: {name}',
    cause:
      "Variables are the enclosing function's parameters; other names are not in scope.",
    resolution: 'Add the name to the prototype or fix its spelling.',
    examples: [
      { description: 'Name not among the parameters', code: 'def f(x) y' },
      { description: 'Top-level expressions have no parameters', code: 'x + 1' },
    ],
  },
  {
    errorId: 'CALX-G002',
    category: 'lowering',
    description: 'Invalid binary operator',
    messageTemplate: 'invalid binary operator: {operator}',
    cause:
      'The operator is registered in the precedence table but has no lowering rule.',
    resolution:
      "Only '+', '-', '*' and '<' can be lowered; remove other operators from the precedence configuration.",
  },
  {
    errorId: 'CALX-G003',
    category: 'lowering',
    description: 'Unknown function referenced',
    messageTemplate: 'unknown function referenced: {name}',
    cause: "Calls must name a function introduced earlier by 'def' or 'extern'.",
    resolution: "Define the function first, or declare it with 'extern'.",
    examples: [{ description: 'Call before any declaration', code: 'bar(1, 2)' }],
  },
  {
    errorId: 'CALX-G004',
    category: 'lowering',
    description: 'Incorrect number of arguments',
    messageTemplate:
      'incorrect number of arguments: {name} expects {expected}, got {actual}',
    cause: 'The call passes a different number of arguments than the declaration takes.',
    resolution: 'Pass exactly one argument per declared parameter.',
    examples: [
      { description: 'Too few arguments', code: 'extern atan2(y x)\natan2(1)' },
    ],
  },
  {
    errorId: 'CALX-G005',
    category: 'lowering',
    description: 'Conflicting redeclaration',
    messageTemplate:
      'function redeclared with a different number of parameters: {name} has {expected}, got {actual}',
    cause: 'A function can only be declared once per arity.',
    resolution: 'Use the same parameter count as the earlier declaration, or pick a new name.',
    examples: [
      { description: 'Extern then def with another arity', code: 'extern f(a)\ndef f(a b) a' },
    ],
  },
  {
    errorId: 'CALX-G006',
    category: 'lowering',
    description: 'Function failed verification',
    messageTemplate: 'function {name} failed verification: {problems}',
    cause: 'The emitted IR is not well formed.',
    resolution: 'Report the input that produced this function.',
  },

  // Module Errors (CALX-M0xx)
  {
    errorId: 'CALX-M001',
    category: 'module',
    description: 'Function already declared',
    messageTemplate: 'function {name} is already declared in this module',
  },
  {
    errorId: 'CALX-M002',
    category: 'module',
    description: 'Block already terminated',
    messageTemplate: 'cannot emit {opcode} into terminated block {block} of {name}',
  },
  {
    errorId: 'CALX-M003',
    category: 'module',
    description: 'Function not in module',
    messageTemplate: 'function {name} is not in this module',
  },
  {
    errorId: 'CALX-M004',
    category: 'module',
    description: 'Parameter index out of range',
    messageTemplate: 'function {name} has no parameter {index}',
  },

  // Runtime Errors (CALX-R0xx)
  {
    errorId: 'CALX-R001',
    category: 'runtime',
    description: 'Undefined function',
    messageTemplate: 'function {name} is not defined',
    cause: 'The function is neither in the module nor provided by the host.',
  },
  {
    errorId: 'CALX-R002',
    category: 'runtime',
    description: 'Missing host function',
    messageTemplate: 'no host implementation for extern {name}',
    cause: "An 'extern' declaration was called but the host does not provide it.",
    resolution: 'Declare only externs the host provides (sin, cos, sqrt, putchard, ...).',
    examples: [{ description: 'Unknown extern', code: 'extern frob(x)\nfrob(1)' }],
  },
  {
    errorId: 'CALX-R003',
    category: 'runtime',
    description: 'Call depth exceeded',
    messageTemplate: 'call depth exceeded {limit}',
    cause: 'A function calls itself without end.',
  },
  {
    errorId: 'CALX-R004',
    category: 'runtime',
    description: 'Wrong argument count',
    messageTemplate: 'function {name} expects {expected} arguments, got {actual}',
  },
  {
    errorId: 'CALX-R005',
    category: 'runtime',
    description: 'Missing return',
    messageTemplate: 'function {name} ran off the end of block {block}',
    cause: 'The entry block ended without a ret instruction.',
  },

  // Config Errors (CALX-C0xx)
  {
    errorId: 'CALX-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'invalid configuration: {reason}',
    cause: 'The configuration file is not a mapping of known keys.',
    resolution:
      'Use keys precedence, printModule, evaluate, format and verbose with values of the documented types.',
  },
  {
    errorId: 'CALX-C002',
    category: 'config',
    description: 'Invalid operator precedence',
    messageTemplate: 'invalid precedence for {operator}: {value}',
    cause: 'Operators are single characters; precedences are integers.',
    resolution: "Register single-character operators with integer precedences, e.g. '<': 10.",
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template, replacing {name} with context values.
 * Missing values render as empty strings; an unclosed brace leaves the
 * template unchanged.
 *
 * @example
 * renderMessage('unknown variable name: {name}', { name: 'x' })
 * // Returns: "unknown variable name: x"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const end = template.indexOf('}', i + 1);
      if (end === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, end)];
      if (value !== undefined) {
        result += Array.isArray(value) ? value.join(', ') : String(value);
      }

      i = end + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
