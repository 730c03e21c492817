/**
 * Statement parser using Chevrotain
 *
 * Lexes and parses RECODE / TABLE statements into a CST, then walks the CST
 * into the AST types of ast.ts.
 *
 * Keywords are reserved: a variable named like one (`missing`, `by`,
 * `levels`, ...) is written in backticks: TABLE ROWS `by` COLS hand;
 * Inside quoted strings and backticked names a backslash escapes the next
 * character.
 */

import {
  createToken,
  Lexer,
  CstParser,
  type CstElement,
  type CstNode,
  type IToken,
} from 'chevrotain';
import type {
  ComparisonOperator,
  Matcher,
  Program,
  RecodeStatement,
  RuleNode,
  Statement,
  TableOptions,
  TableStatement,
  UnmappedClause,
} from './ast.js';
import { StatementParseError, type ParseIssue } from './errors.js';

// ---
// TOKEN DEFINITIONS
// ---

// Word boundary helper - matches when NOT followed by identifier chars
const WB = '(?![a-zA-Z0-9_])';

// Keywords - use word boundary to prevent matching as part of longer identifiers
const Recode = createToken({ name: 'Recode', pattern: new RegExp(`RECODE${WB}`, 'i') });
const Table = createToken({ name: 'Table', pattern: new RegExp(`TABLE${WB}`, 'i') });
const Rows = createToken({ name: 'Rows', pattern: new RegExp(`ROWS${WB}`, 'i') });
const Cols = createToken({ name: 'Cols', pattern: new RegExp(`COL(S|UMNS?)${WB}`, 'i') });
const By = createToken({ name: 'By', pattern: new RegExp(`BY${WB}`, 'i') });
const As = createToken({ name: 'As', pattern: new RegExp(`AS${WB}`, 'i') });
const Options = createToken({ name: 'Options', pattern: new RegExp(`OPTIONS${WB}`, 'i') });
const Unmapped = createToken({ name: 'Unmapped', pattern: new RegExp(`UNMAPPED${WB}`, 'i') });
const Levels = createToken({ name: 'Levels', pattern: new RegExp(`LEVELS${WB}`, 'i') });
const Missing = createToken({ name: 'Missing', pattern: new RegExp(`MISSING${WB}`, 'i') });
const ErrorKeyword = createToken({ name: 'ErrorKeyword', pattern: new RegExp(`ERROR${WB}`, 'i') });
const Drop = createToken({ name: 'Drop', pattern: new RegExp(`DROP${WB}`, 'i') });
const TrueKeyword = createToken({ name: 'TrueKeyword', pattern: new RegExp(`true${WB}`, 'i') });
const FalseKeyword = createToken({ name: 'FalseKeyword', pattern: new RegExp(`false${WB}`, 'i') });

// Identifier comes after all keywords
const Identifier = createToken({ name: 'Identifier', pattern: /[a-zA-Z_][a-zA-Z0-9_]*/ });
const QuotedIdentifier = createToken({
  name: 'QuotedIdentifier',
  pattern: /`(?:[^`\\]|\\[\s\S])+`/,
});

// Literals
const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"(?:[^"\\]|\\[\s\S])*"|'(?:[^'\\]|\\[\s\S])*'/,
});
const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /-?\d+(\.\d+)?/ });

// Operators and punctuation (=> before the comparison operators)
const Arrow = createToken({ name: 'Arrow', pattern: /=>/ });
const ComparisonOp = createToken({ name: 'ComparisonOp', pattern: />=|<=|!=|<>|>|<|=/ });
const LParen = createToken({ name: 'LParen', pattern: /\(/ });
const RParen = createToken({ name: 'RParen', pattern: /\)/ });
const CommaPunct = createToken({ name: 'CommaPunct', pattern: /,/ });
const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
const Colon = createToken({ name: 'Colon', pattern: /:/ });

// Whitespace (skipped)
const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// Token order matters! Keywords before Identifier
const allTokens = [
  WhiteSpace,
  // Keywords
  Recode,
  Table,
  Rows,
  Cols,
  By,
  As,
  Options,
  Unmapped,
  Levels,
  Missing,
  ErrorKeyword,
  Drop,
  TrueKeyword,
  FalseKeyword,
  // Identifier last among words
  Identifier,
  QuotedIdentifier,
  // Literals
  StringLiteral,
  NumberLiteral,
  // Operators
  Arrow,
  ComparisonOp,
  LParen,
  RParen,
  CommaPunct,
  Semicolon,
  Colon,
];

const StatementLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

class StatementParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // Main entry point
  public program = this.RULE('program', () => {
    this.MANY(() => {
      this.SUBRULE(this.statement, { LABEL: 'statements' });
    });
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.recodeStatement) },
      { ALT: () => this.SUBRULE(this.tableStatement) },
    ]);
  });

  // RECODE age AS "Age" (< 30 => 'Young', ...) UNMAPPED DROP LEVELS (...);
  private recodeStatement = this.RULE('recodeStatement', () => {
    this.CONSUME(Recode);
    this.SUBRULE(this.variableName, { LABEL: 'variable' });
    this.OPTION(() => {
      this.CONSUME(As);
      this.CONSUME(StringLiteral, { LABEL: 'label' });
    });
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: CommaPunct,
      DEF: () => this.SUBRULE(this.rule, { LABEL: 'rules' }),
    });
    this.CONSUME(RParen);
    this.OPTION2(() => {
      this.SUBRULE(this.unmappedClause);
    });
    this.OPTION3(() => {
      this.SUBRULE(this.levelsClause);
    });
    this.CONSUME(Semicolon);
  });

  // gender or `by`
  private variableName = this.RULE('variableName', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier, { LABEL: 'name' }) },
      { ALT: () => this.CONSUME(QuotedIdentifier, { LABEL: 'name' }) },
    ]);
  });

  private rule = this.RULE('rule', () => {
    this.SUBRULE(this.matcher);
    this.CONSUME(Arrow);
    this.CONSUME(StringLiteral, { LABEL: 'label' });
  });

  private matcher = this.RULE('matcher', () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'string' }) },
      { ALT: () => this.CONSUME(NumberLiteral, { LABEL: 'number' }) },
      {
        ALT: () => {
          this.CONSUME(ComparisonOp, { LABEL: 'op' });
          this.CONSUME2(NumberLiteral, { LABEL: 'bound' });
        },
      },
      { ALT: () => this.CONSUME(Missing) },
    ]);
  });

  private unmappedClause = this.RULE('unmappedClause', () => {
    this.CONSUME(Unmapped);
    this.OR([
      { ALT: () => this.CONSUME(ErrorKeyword) },
      { ALT: () => this.CONSUME(Drop) },
      { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'label' }) },
    ]);
  });

  private levelsClause = this.RULE('levelsClause', () => {
    this.CONSUME(Levels);
    this.CONSUME(LParen);
    this.AT_LEAST_ONE_SEP({
      SEP: CommaPunct,
      DEF: () => this.CONSUME(StringLiteral, { LABEL: 'levels' }),
    });
    this.CONSUME(RParen);
  });

  // TABLE ROWS gender COLS hand BY site OPTIONS margins:both pct:row;
  private tableStatement = this.RULE('tableStatement', () => {
    this.CONSUME(Table);
    this.CONSUME(Rows);
    this.SUBRULE(this.variableName, { LABEL: 'rowVar' });
    this.CONSUME(Cols);
    this.SUBRULE2(this.variableName, { LABEL: 'colVar' });
    this.OPTION(() => {
      this.CONSUME(By);
      this.SUBRULE3(this.variableName, { LABEL: 'stratVar' });
    });
    this.OPTION2(() => {
      this.CONSUME(Options);
      this.AT_LEAST_ONE(() => {
        this.SUBRULE(this.tableOption, { LABEL: 'options' });
      });
    });
    this.CONSUME(Semicolon);
  });

  // Individual option: key:value. Keys and values are checked while building the AST.
  private tableOption = this.RULE('tableOption', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier, { LABEL: 'key' }) },
      { ALT: () => this.CONSUME(Missing, { LABEL: 'key' }) },
    ]);
    this.CONSUME(Colon);
    this.OR2([
      { ALT: () => this.CONSUME2(Identifier, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(NumberLiteral, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(TrueKeyword, { LABEL: 'value' }) },
      { ALT: () => this.CONSUME(FalseKeyword, { LABEL: 'value' }) },
    ]);
  });
}

// Singleton parser instance (Chevrotain parsers are reusable)
const parserInstance = new StatementParser();

// ---
// CST → AST
// ---

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function isNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

function tokens(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

function nodes(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isNode);
}

function optionalToken(node: CstNode, key: string): IToken | undefined {
  const found = tokens(node, key);
  return found.length > 0 ? found[0] : undefined;
}

function optionalNode(node: CstNode, key: string): CstNode | undefined {
  const found = nodes(node, key);
  return found.length > 0 ? found[0] : undefined;
}

function requiredToken(node: CstNode, key: string): IToken {
  const token = optionalToken(node, key);
  if (!token) throw new Error(`Malformed '${node.name}': missing ${key}`);
  return token;
}

function requiredNode(node: CstNode, key: string): CstNode {
  const child = optionalNode(node, key);
  if (!child) throw new Error(`Malformed '${node.name}': missing ${key}`);
  return child;
}

/** Strip the surrounding quotes (or backticks) and resolve escapes */
function unquote(token: IToken): string {
  return token.image.slice(1, -1).replace(/\\([\s\S])/g, '$1');
}

function variableName(node: CstNode): string {
  const name = requiredToken(node, 'name');
  return name.tokenType === QuotedIdentifier ? unquote(name) : name.image;
}

function positionOf(token: IToken): Pick<ParseIssue, 'line' | 'column'> {
  const line = token.startLine;
  const column = token.startColumn;
  if (line === undefined || column === undefined || Number.isNaN(line)) return {};
  return { line, column };
}

class AstBuilder {
  readonly issues: ParseIssue[] = [];

  program(cst: CstNode): Program {
    return {
      type: 'program',
      statements: nodes(cst, 'statements').map(s => this.statement(s)),
    };
  }

  private statement(node: CstNode): Statement {
    const recode = optionalNode(node, 'recodeStatement');
    if (recode) return this.recodeStatement(recode);
    return this.tableStatement(requiredNode(node, 'tableStatement'));
  }

  private recodeStatement(node: CstNode): RecodeStatement {
    const label = optionalToken(node, 'label');
    const unmapped = optionalNode(node, 'unmappedClause');
    const levels = optionalNode(node, 'levelsClause');

    return {
      type: 'recode',
      variable: variableName(requiredNode(node, 'variable')),
      label: label ? unquote(label) : null,
      rules: nodes(node, 'rules').map(r => this.rule(r)),
      unmapped: unmapped ? this.unmappedClause(unmapped) : null,
      levels: levels ? tokens(levels, 'levels').map(unquote) : null,
    };
  }

  private rule(node: CstNode): RuleNode {
    return {
      matcher: this.matcher(requiredNode(node, 'matcher')),
      label: unquote(requiredToken(node, 'label')),
    };
  }

  private matcher(node: CstNode): Matcher {
    const str = optionalToken(node, 'string');
    if (str) return { type: 'literal', value: unquote(str) };

    const num = optionalToken(node, 'number');
    if (num) return { type: 'literal', value: Number(num.image) };

    const op = optionalToken(node, 'op');
    if (op) {
      return {
        type: 'comparison',
        op: toComparisonOperator(op.image),
        bound: Number(requiredToken(node, 'bound').image),
      };
    }

    requiredToken(node, 'Missing');
    return { type: 'missing' };
  }

  private unmappedClause(node: CstNode): UnmappedClause {
    if (optionalToken(node, 'ErrorKeyword')) return { type: 'error' };
    if (optionalToken(node, 'Drop')) return { type: 'drop' };
    return { type: 'label', label: unquote(requiredToken(node, 'label')) };
  }

  private tableStatement(node: CstNode): TableStatement {
    const stratVar = optionalNode(node, 'stratVar');
    const options: TableOptions = {};
    const seen = new Set<string>();

    for (const option of nodes(node, 'options')) {
      const key = requiredToken(option, 'key');
      const value = requiredToken(option, 'value');
      const name = key.image.toLowerCase();
      if (seen.has(name)) {
        this.issue(key, `Option '${key.image}' given more than once`);
        continue;
      }
      seen.add(name);
      this.tableOption(options, key, value);
    }

    return {
      type: 'table',
      rows: variableName(requiredNode(node, 'rowVar')),
      cols: variableName(requiredNode(node, 'colVar')),
      by: stratVar ? variableName(stratVar) : null,
      options,
    };
  }

  private tableOption(options: TableOptions, key: IToken, value: IToken): void {
    switch (key.image.toLowerCase()) {
      case 'margins':
        options.margins = this.keyword(value, key, ['none', 'row', 'col', 'both']);
        break;
      case 'pct':
        options.pct = this.keyword(value, key, ['row', 'col', 'cell', 'none']);
        break;
      case 'missing':
        options.missing = this.keyword(value, key, ['exclude', 'own']);
        break;
      case 'digits':
        options.digits = this.digits(value, key);
        break;
      case 'counts':
        options.counts = this.flag(value, key);
        break;
      case 'missinglabel':
        options.missingLabel = this.text(value, key);
        break;
      case 'total':
        options.total = this.text(value, key);
        break;
      default:
        this.issue(key, `Unknown option '${key.image}'`);
    }
  }

  private keyword<T extends string>(value: IToken, key: IToken, allowed: readonly T[]): T | undefined {
    const image = value.image.toLowerCase();
    const match = value.tokenType === Identifier
      ? allowed.find(a => a === image)
      : undefined;
    if (match === undefined) {
      this.invalid(value, key, allowed.join(', '));
    }
    return match;
  }

  private digits(value: IToken, key: IToken): number | undefined {
    if (value.tokenType === NumberLiteral && /^\d+$/.test(value.image)) {
      return Number(value.image);
    }
    this.invalid(value, key, 'a non-negative integer');
    return undefined;
  }

  private flag(value: IToken, key: IToken): boolean | undefined {
    if (value.tokenType === TrueKeyword) return true;
    if (value.tokenType === FalseKeyword) return false;
    this.invalid(value, key, 'true, false');
    return undefined;
  }

  private text(value: IToken, key: IToken): string | undefined {
    if (value.tokenType === StringLiteral) return unquote(value);
    this.invalid(value, key, 'a quoted string');
    return undefined;
  }

  private invalid(value: IToken, key: IToken, expected: string): void {
    this.issue(value, `Invalid value '${value.image}' for option '${key.image}' (expected ${expected})`);
  }

  private issue(token: IToken, message: string): void {
    this.issues.push({ kind: 'option', message, ...positionOf(token) });
  }
}

function toComparisonOperator(image: string): ComparisonOperator {
  switch (image) {
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '=':
    case '!=':
      return image;
    case '<>':
      return '!=';
    default:
      throw new Error(`Unknown comparison operator '${image}'`);
  }
}

// ---
// PUBLIC API
// ---

export interface ParseResult {
  /** null when any lexer, parser or option issue was found */
  ast: Program | null;
  issues: ParseIssue[];
}

/**
 * Parse a program, collecting every issue instead of throwing.
 */
export function parseProgramWithErrors(input: string): ParseResult {
  const lexResult = StatementLexer.tokenize(input);
  const issues: ParseIssue[] = lexResult.errors.map((e): ParseIssue => ({
    kind: 'lexer',
    message: e.message,
    ...(e.line !== undefined && e.column !== undefined ? { line: e.line, column: e.column } : {}),
  }));

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.program();

  for (const e of parserInstance.errors) {
    issues.push({ kind: 'parser', message: e.message, ...positionOf(e.token) });
  }
  if (issues.length > 0) {
    return { ast: null, issues };
  }

  const builder = new AstBuilder();
  const ast = builder.program(cst);
  if (builder.issues.length > 0) {
    return { ast: null, issues: builder.issues };
  }
  return { ast, issues: [] };
}

/**
 * Parse a program of RECODE and TABLE statements.
 *
 * @throws StatementParseError with every lexer, parser or option issue
 */
export function parseProgram(input: string): Program {
  const result = parseProgramWithErrors(input);
  if (result.ast === null) {
    throw new StatementParseError(result.issues);
  }
  return result.ast;
}

/**
 * Whether a variable name can be written without backticks.
 */
export function isPlainIdentifier(name: string): boolean {
  const { tokens, errors } = StatementLexer.tokenize(name);
  return errors.length === 0 && tokens.length === 1 &&
    tokens[0].tokenType === Identifier && tokens[0].image === name;
}

/**
 * Tokenize without parsing (for debugging)
 */
export function tokenize(input: string): { image: string; type: string }[] {
  return StatementLexer.tokenize(input).tokens.map(t => ({
    image: t.image,
    type: t.tokenType.name,
  }));
}

// Export for testing/debugging
export { StatementLexer, StatementParser };
