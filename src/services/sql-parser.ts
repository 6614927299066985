/**
 * Parser for the SELECT-shaped text the language model writes.
 *
 * The accepted language is deliberately small: one SELECT over one table,
 * a WHERE clause of ANDed terms (equality, IN, numeric comparison,
 * BETWEEN, IS [NOT] NULL, and OR groups over a single column), ORDER BY
 * and LIMIT, terminated by a semicolon. Anything else is a CompileError.
 */

import { CompileError } from '../types/errors.js';
import type { CompareOp, ParseResult, ParsedQuery, Predicate } from '../types/models.js';
import type { Literal, OrderSpec } from '../types/utils.js';

type Token =
  | { kind: 'word'; value: string; quoted: boolean }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number; text: string }
  | { kind: 'symbol'; value: string }
  | { kind: 'end' };

const COMPARE_OPS = new Map<string, CompareOp>([
  ['>', '>'],
  ['>=', '>='],
  ['<', '<'],
  ['<=', '<='],
  ['!=', '!='],
  ['<>', '!='],
]);

const SYMBOLS = ['<=', '>=', '!=', '<>', '=', '<', '>', '(', ')', ',', ';', '*', '.', '-'];

/** Verbs that write or change schema, rejected wherever they appear. */
const WRITE_VERBS = new Set([
  'UPDATE',
  'DELETE',
  'INSERT',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'REPLACE',
  'MERGE',
  'GRANT',
  'REVOKE',
  'EXEC',
  'EXECUTE',
  'ATTACH',
  'PRAGMA',
]);

const UNSUPPORTED = new Set([
  'JOIN',
  'GROUP',
  'HAVING',
  'UNION',
  'INTERSECT',
  'EXCEPT',
  'WITH',
  'DISTINCT',
  'OFFSET',
  'LIKE',
  'ILIKE',
  'NOT',
  'CASE',
]);

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '-' && sql[i + 1] === '-') {
      throw new CompileError('comments are not allowed', sql.slice(i, i + 12));
    }

    if (ch === "'") {
      let value = '';
      let j = i + 1;
      for (;;) {
        if (j >= sql.length) {
          throw new CompileError('unterminated string literal', sql.slice(i, i + 12));
        }
        if (sql[j] === "'") {
          if (sql[j + 1] === "'") {
            value += "'";
            j += 2;
            continue;
          }
          break;
        }
        value += sql[j];
        j++;
      }
      tokens.push({ kind: 'string', value });
      i = j + 1;
      continue;
    }

    if (ch === '"' || ch === '`') {
      const close = sql.indexOf(ch, i + 1);
      if (close < 0) {
        throw new CompileError('unterminated quoted identifier', sql.slice(i, i + 12));
      }
      tokens.push({ kind: 'word', value: sql.slice(i + 1, close), quoted: true });
      i = close + 1;
      continue;
    }

    const number = /^\d+(?:\.\d+)?|^\.\d+/.exec(sql.slice(i));
    if (number) {
      tokens.push({ kind: 'number', value: Number(number[0]), text: number[0] });
      i += number[0].length;
      continue;
    }

    const word = /^[\p{L}_][\p{L}\p{N}_]*/u.exec(sql.slice(i));
    if (word) {
      tokens.push({ kind: 'word', value: word[0], quoted: false });
      i += word[0].length;
      continue;
    }

    const symbol = SYMBOLS.find((candidate) => sql.startsWith(candidate, i));
    if (symbol) {
      tokens.push({ kind: 'symbol', value: symbol });
      i += symbol.length;
      continue;
    }

    throw new CompileError('unexpected character', sql.slice(i, i + 12));
  }

  tokens.push({ kind: 'end' });
  return tokens;
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'end':
      return 'end of input';
    case 'string':
      return `'${token.value}'`;
    case 'number':
      return token.text;
    default:
      return token.value;
  }
}

class Parser {
  private pos = 0;
  private readonly aliases = new Map<string, string>();

  constructor(private readonly tokens: Token[]) {}

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'end') this.pos++;
    return token;
  }

  private isKeyword(keyword: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.kind === 'word' && !token.quoted && token.value.toUpperCase() === keyword;
  }

  private acceptKeyword(keyword: string): boolean {
    if (!this.isKeyword(keyword)) return false;
    this.pos++;
    return true;
  }

  private expectKeyword(keyword: string): void {
    if (!this.acceptKeyword(keyword)) {
      throw new CompileError(`expected ${keyword}`, describe(this.peek()));
    }
  }

  private isSymbol(symbol: string): boolean {
    const token = this.peek();
    return token.kind === 'symbol' && token.value === symbol;
  }

  private acceptSymbol(symbol: string): boolean {
    if (!this.isSymbol(symbol)) return false;
    this.pos++;
    return true;
  }

  private expectSymbol(symbol: string): void {
    if (!this.acceptSymbol(symbol)) {
      throw new CompileError(`expected "${symbol}"`, describe(this.peek()));
    }
  }

  private identifier(): string {
    const token = this.next();
    if (token.kind !== 'word') {
      throw new CompileError('expected an identifier', describe(token));
    }
    if (!token.quoted && isReserved(token.value)) {
      throw new CompileError('expected an identifier', token.value);
    }
    return token.value;
  }

  /** `col`, `t.col` or `schema.t.col`; qualifiers are dropped. */
  private columnRef(): string {
    let name = this.identifier();
    while (this.acceptSymbol('.')) {
      name = this.identifier();
    }
    return name;
  }

  parse(raw: string): ParsedQuery {
    this.expectKeyword('SELECT');
    const columns = this.selectList();

    this.expectKeyword('FROM');
    const table = this.columnRef();
    if (this.acceptKeyword('AS') || this.peekPlainWord()) {
      this.identifier();
    }

    const predicates = this.acceptKeyword('WHERE') ? this.disjunction() : [];

    let order: OrderSpec | undefined;
    if (this.acceptKeyword('ORDER')) {
      this.expectKeyword('BY');
      order = this.orderItem();
      // Secondary sort keys are accepted and ignored.
      while (this.acceptSymbol(',')) {
        this.orderItem();
      }
    }

    let limit: number | undefined;
    if (this.acceptKeyword('LIMIT')) {
      const token = this.next();
      if (token.kind !== 'number' || !Number.isInteger(token.value) || token.value <= 0) {
        throw new CompileError('LIMIT must be a positive integer', describe(token));
      }
      limit = token.value;
    }

    if (!this.acceptSymbol(';')) {
      const token = this.peek();
      throw new CompileError(
        token.kind === 'end' ? 'statement must end with ";"' : 'unexpected token',
        describe(token)
      );
    }
    if (this.peek().kind !== 'end') {
      throw new CompileError('only a single statement is allowed', describe(this.peek()));
    }

    return { table, columns, predicates, order, limit, raw };
  }

  private peekPlainWord(): boolean {
    const token = this.peek();
    return token.kind === 'word' && (token.quoted || !isReserved(token.value));
  }

  private selectList(): string[] {
    if (this.acceptSymbol('*')) {
      return [];
    }

    const columns: string[] = [];
    do {
      if (this.peek().kind === 'word' && this.isOpenParen(1)) {
        throw new CompileError('functions and aggregates are not supported', describe(this.peek()));
      }
      let name = this.identifier();
      let star = false;
      while (this.acceptSymbol('.')) {
        if (this.acceptSymbol('*')) {
          star = true;
          break;
        }
        name = this.identifier();
      }
      if (star) {
        return [];
      }
      if (this.acceptKeyword('AS') || this.peekPlainWord()) {
        this.aliases.set(this.identifier().toLowerCase(), name);
      }
      columns.push(name);
    } while (this.acceptSymbol(','));

    return columns;
  }

  private isOpenParen(offset: number): boolean {
    const token = this.peek(offset);
    return token.kind === 'symbol' && token.value === '(';
  }

  private orderItem(): OrderSpec {
    const name = this.columnRef();
    const column = this.aliases.get(name.toLowerCase()) ?? name;
    let direction: OrderSpec['direction'] = 'asc';
    if (this.acceptKeyword('DESC')) {
      direction = 'desc';
    } else {
      this.acceptKeyword('ASC');
    }
    if (this.acceptKeyword('NULLS')) {
      if (!this.acceptKeyword('FIRST')) this.expectKeyword('LAST');
    }
    return { column, direction };
  }

  private disjunction(): Predicate[] {
    const branches = [this.conjunction()];
    while (this.acceptKeyword('OR')) {
      branches.push(this.conjunction());
    }
    if (branches.length === 1) {
      return branches[0];
    }

    // Only `a = 1 OR a = 2` shapes are expressible against the store.
    const values: Literal[] = [];
    let column: string | undefined;
    for (const branch of branches) {
      const [term] = branch;
      if (branch.length !== 1 || term.kind !== 'eq') {
        throw new CompileError('OR is only supported between values of one column');
      }
      if (column !== undefined && column.toLowerCase() !== term.column.toLowerCase()) {
        throw new CompileError('OR is only supported between values of one column', term.column);
      }
      column = term.column;
      values.push(...term.values);
    }
    return [{ kind: 'eq', column: column ?? '', values }];
  }

  private conjunction(): Predicate[] {
    const terms = this.primary();
    while (this.acceptKeyword('AND')) {
      terms.push(...this.primary());
    }
    return terms;
  }

  private primary(): Predicate[] {
    if (this.acceptSymbol('(')) {
      const inner = this.disjunction();
      this.expectSymbol(')');
      return inner;
    }
    return this.comparison();
  }

  private comparison(): Predicate[] {
    const column = this.columnRef();

    if (this.acceptSymbol('=')) {
      return [{ kind: 'eq', column, values: [this.literal()] }];
    }

    if (this.acceptKeyword('IN')) {
      this.expectSymbol('(');
      const values = [this.literal()];
      while (this.acceptSymbol(',')) {
        values.push(this.literal());
      }
      this.expectSymbol(')');
      return [{ kind: 'eq', column, values }];
    }

    if (this.acceptKeyword('IS')) {
      const negated = this.acceptKeyword('NOT');
      this.expectKeyword('NULL');
      return [{ kind: 'null', column, negated }];
    }

    if (this.acceptKeyword('BETWEEN')) {
      const low = this.numericLiteral();
      this.expectKeyword('AND');
      const high = this.numericLiteral();
      return [
        { kind: 'compare', column, op: '>=', value: low },
        { kind: 'compare', column, op: '<=', value: high },
      ];
    }

    const token = this.peek();
    const op = token.kind === 'symbol' ? COMPARE_OPS.get(token.value) : undefined;
    if (op) {
      this.pos++;
      const value = op === '!=' ? this.literal() : this.numericLiteral();
      return [{ kind: 'compare', column, op, value }];
    }

    throw new CompileError('unsupported condition', describe(token));
  }

  private numericLiteral(): number {
    const value = this.literal();
    if (typeof value !== 'number') {
      throw new CompileError('expected a number', String(value));
    }
    return value;
  }

  private literal(): Literal {
    const negative = this.acceptSymbol('-');
    const token = this.next();
    if (token.kind === 'number') {
      return negative ? -token.value : token.value;
    }
    if (!negative && token.kind === 'string') {
      return token.value;
    }
    if (!negative && token.kind === 'word' && !token.quoted) {
      const upper = token.value.toUpperCase();
      if (upper === 'TRUE') return true;
      if (upper === 'FALSE') return false;
    }
    throw new CompileError('expected a literal value', describe(token));
  }
}

const RESERVED = new Set([
  'SELECT',
  'FROM',
  'WHERE',
  'AND',
  'OR',
  'IN',
  'IS',
  'NULL',
  'ORDER',
  'BY',
  'ASC',
  'DESC',
  'LIMIT',
  'AS',
  'BETWEEN',
  'NULLS',
]);

function isReserved(word: string): boolean {
  const upper = word.toUpperCase();
  return RESERVED.has(upper) || WRITE_VERBS.has(upper) || UNSUPPORTED.has(upper);
}

/**
 * Reject write verbs and unsupported constructs before parsing.
 */
function screen(tokens: Token[]): void {
  for (const token of tokens) {
    if (token.kind !== 'word' || token.quoted) continue;
    const upper = token.value.toUpperCase();
    if (WRITE_VERBS.has(upper)) {
      throw new CompileError('only read-only SELECT statements are supported', token.value);
    }
  }

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.kind !== 'word' || token.quoted) continue;
    const upper = token.value.toUpperCase();
    if (upper === 'NOT' && isNullCheck(tokens, i)) continue;
    if (UNSUPPORTED.has(upper)) {
      throw new CompileError(`${upper} is not supported`, token.value);
    }
  }
}

function isNullCheck(tokens: Token[], notIndex: number): boolean {
  const before = tokens[notIndex - 1];
  const after = tokens[notIndex + 1];
  return (
    before !== undefined &&
    before.kind === 'word' &&
    before.value.toUpperCase() === 'IS' &&
    after !== undefined &&
    after.kind === 'word' &&
    after.value.toUpperCase() === 'NULL'
  );
}

/**
 * Parse pseudo-SQL into a ParsedQuery. Never throws for malformed input.
 */
export function parsePseudoSql(text: string): ParseResult {
  const raw = text.trim();
  try {
    const tokens = tokenize(raw);
    screen(tokens);
    return { ok: true, query: new Parser(tokens).parse(raw) };
  } catch (error) {
    if (error instanceof CompileError) {
      return { ok: false, error };
    }
    throw error;
  }
}
