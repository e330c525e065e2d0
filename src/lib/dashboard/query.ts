/**
 * Filter expressions over entity attributes
 *
 * A small boolean language, parsed into a closed set of node types and
 * evaluated by walking the tree. Nothing is ever turned into code.
 *
 *   attr.region == 'Europe' and attr.year > 2000
 *   not (`Genetic ID` in ['I001', 'I002']) || PC1 >= -0.05
 *
 * Fields: `attr.<name>`, a bare attribute name, a back-quoted name, or one
 * of the built-ins `id`, `time`, `lat`, `lon` and the PC axis names.
 */

import type { AttributeValue, Entity, EntityTable } from '@/types/dashboard';
import { InvalidQueryError } from './errors';

const MAX_QUERY_LENGTH = 4096;
const MAX_DEPTH = 64;

// ============= Tokens =============

type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=';

type Token =
  | { kind: 'number'; value: number; pos: number }
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'name'; value: string; quoted: boolean; attribute: boolean; pos: number }
  | { kind: 'op'; value: CompareOp; pos: number }
  | { kind: 'punct'; value: '(' | ')' | '[' | ']' | ',' | '-'; pos: number }
  | { kind: 'keyword'; value: 'and' | 'or' | 'not' | 'in' | 'true' | 'false' | 'null'; pos: number }
  | { kind: 'end'; pos: number };

const KEYWORDS: Record<string, Extract<Token, { kind: 'keyword' }>['value']> = {
  and: 'and',
  or: 'or',
  not: 'not',
  in: 'in',
  true: 'true',
  false: 'false',
  null: 'null',
  none: 'null',
};

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.]/;
const NUMBER = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  const fail = (message: string, pos: number): never => {
    throw new InvalidQueryError(expression, `${message} at position ${pos}`, pos);
  };

  const readQuoted = (start: number, quote: string): [string, number] => {
    let value = '';
    let i = start + 1;
    while (i < expression.length && expression[i] !== quote) {
      if (expression[i] === '\\' && quote !== '`') {
        const next = expression[i + 1];
        if (next === undefined) break;
        value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
        i += 2;
      } else {
        value += expression[i];
        i += 1;
      }
    }
    if (i >= expression.length) fail('Unterminated quote', start);
    return [value, i + 1];
  };

  let i = 0;
  while (i < expression.length) {
    const ch = expression[i];

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (/[0-9.]/.test(ch) && NUMBER.test(expression.slice(i))) {
      const match = NUMBER.exec(expression.slice(i));
      if (match) {
        tokens.push({ kind: 'number', value: Number(match[0]), pos: i });
        i += match[0].length;
        continue;
      }
    }

    if (ch === "'" || ch === '"') {
      const [value, next] = readQuoted(i, ch);
      tokens.push({ kind: 'string', value, pos: i });
      i = next;
      continue;
    }

    if (ch === '`') {
      const [value, next] = readQuoted(i, '`');
      tokens.push({ kind: 'name', value, quoted: true, attribute: false, pos: i });
      i = next;
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = i;
      // attr.`Name with spaces`
      if (expression.startsWith('attr.`', i)) {
        const [value, next] = readQuoted(i + 5, '`');
        tokens.push({ kind: 'name', value, quoted: true, attribute: true, pos: start });
        i = next;
        continue;
      }
      while (i < expression.length && IDENT_PART.test(expression[i])) i += 1;
      const word = expression.slice(start, i);
      const keyword = KEYWORDS[word.toLowerCase()];
      if (keyword) {
        tokens.push({ kind: 'keyword', value: keyword, pos: start });
      } else if (word.startsWith('attr.') && word.length > 5) {
        tokens.push({ kind: 'name', value: word.slice(5), quoted: false, attribute: true, pos: start });
      } else {
        tokens.push({ kind: 'name', value: word, quoted: false, attribute: false, pos: start });
      }
      continue;
    }

    const two = expression.slice(i, i + 2);
    if (two === '==' || two === '!=' || two === '<=' || two === '>=') {
      tokens.push({ kind: 'op', value: two, pos: i });
      i += 2;
      continue;
    }
    if (two === '&&') {
      tokens.push({ kind: 'keyword', value: 'and', pos: i });
      i += 2;
      continue;
    }
    if (two === '||') {
      tokens.push({ kind: 'keyword', value: 'or', pos: i });
      i += 2;
      continue;
    }
    if (ch === '<' || ch === '>') {
      tokens.push({ kind: 'op', value: ch, pos: i });
      i += 1;
      continue;
    }
    if (ch === '!') {
      tokens.push({ kind: 'keyword', value: 'not', pos: i });
      i += 1;
      continue;
    }
    if (ch === '(' || ch === ')' || ch === '[' || ch === ']' || ch === ',' || ch === '-') {
      tokens.push({ kind: 'punct', value: ch, pos: i });
      i += 1;
      continue;
    }
    if (ch === '=') {
      fail('Use == for comparison', i);
    }
    fail(`Unexpected character "${ch}"`, i);
  }

  tokens.push({ kind: 'end', pos: expression.length });
  return tokens;
}

// ============= Syntax Tree =============

type FieldRef =
  | { source: 'attribute'; name: string }
  | { source: 'id' | 'time' | 'lat' | 'lon' }
  | { source: 'axis'; index: number };

export type QueryNode =
  | { type: 'literal'; value: AttributeValue }
  | { type: 'field'; ref: FieldRef; label: string }
  | { type: 'compare'; op: CompareOp; left: QueryNode; right: QueryNode }
  | { type: 'in'; negated: boolean; operand: QueryNode; values: AttributeValue[] }
  | { type: 'and' | 'or'; left: QueryNode; right: QueryNode }
  | { type: 'not'; operand: QueryNode };

class Parser {
  private pos = 0;
  private depth = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[],
    private readonly table: EntityTable
  ) {}

  parse(): QueryNode {
    const node = this.parseOr();
    const token = this.peek();
    if (token.kind !== 'end') {
      this.fail('Unexpected input', token.pos);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (token.kind !== 'end') this.pos += 1;
    return token;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.kind === 'keyword' && token.value === value;
  }

  private isPunct(value: string): boolean {
    const token = this.peek();
    return token.kind === 'punct' && token.value === value;
  }

  private expectPunct(value: string): void {
    const token = this.next();
    if (token.kind !== 'punct' || token.value !== value) {
      this.fail(`Expected "${value}"`, token.pos);
    }
  }

  private fail(message: string, pos: number): never {
    throw new InvalidQueryError(this.expression, `${message} at position ${pos}`, pos);
  }

  private nested<T>(parse: () => T): T {
    this.depth += 1;
    if (this.depth > MAX_DEPTH) {
      this.fail('Expression is nested too deeply', this.peek().pos);
    }
    try {
      return parse();
    } finally {
      this.depth -= 1;
    }
  }

  private parseOr(): QueryNode {
    let left = this.parseAnd();
    while (this.isKeyword('or')) {
      this.next();
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): QueryNode {
    let left = this.parseNot();
    while (this.isKeyword('and')) {
      this.next();
      left = { type: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): QueryNode {
    if (this.isKeyword('not')) {
      this.next();
      return this.nested(() => ({ type: 'not', operand: this.parseNot() }));
    }
    return this.parseComparison();
  }

  private parseComparison(): QueryNode {
    const left = this.parseOperand();
    const token = this.peek();

    if (token.kind === 'op') {
      this.next();
      return { type: 'compare', op: token.value, left, right: this.parseOperand() };
    }

    if (this.isKeyword('in')) {
      this.next();
      return { type: 'in', negated: false, operand: left, values: this.parseList() };
    }

    if (this.isKeyword('not')) {
      const after = this.tokens[this.pos + 1];
      if (after?.kind === 'keyword' && after.value === 'in') {
        this.pos += 2;
        return { type: 'in', negated: true, operand: left, values: this.parseList() };
      }
    }

    return left;
  }

  private parseList(): AttributeValue[] {
    const open = this.next();
    if (open.kind !== 'punct' || (open.value !== '[' && open.value !== '(')) {
      this.fail('Expected a list after "in"', open.pos);
    }
    const close = open.value === '[' ? ']' : ')';
    const values: AttributeValue[] = [];
    if (this.isPunct(close)) {
      this.next();
      return values;
    }
    for (;;) {
      values.push(this.parseLiteral());
      if (this.isPunct(',')) {
        this.next();
        continue;
      }
      this.expectPunct(close);
      return values;
    }
  }

  private parseLiteral(): AttributeValue {
    const token = this.next();
    switch (token.kind) {
      case 'number':
        return token.value;
      case 'string':
        return token.value;
      case 'keyword':
        if (token.value === 'true') return true;
        if (token.value === 'false') return false;
        if (token.value === 'null') return null;
        break;
      case 'punct':
        if (token.value === '-') {
          const number = this.next();
          if (number.kind === 'number') return -number.value;
          this.fail('Expected a number after "-"', number.pos);
        }
        break;
      default:
        break;
    }
    return this.fail('Expected a literal value', token.pos);
  }

  private parseOperand(): QueryNode {
    const token = this.peek();

    if (token.kind === 'punct' && token.value === '(') {
      this.next();
      const inner = this.nested(() => this.parseOr());
      this.expectPunct(')');
      return inner;
    }

    if (token.kind === 'name') {
      this.next();
      return { type: 'field', ref: this.resolveField(token), label: token.value };
    }

    return { type: 'literal', value: this.parseLiteral() };
  }

  private resolveField(token: Extract<Token, { kind: 'name' }>): FieldRef {
    const name = token.value;
    if (!token.attribute) {
      if (name === 'id' || name === 'time' || name === 'lat' || name === 'lon') {
        return { source: name };
      }
      const axis = this.table.axisNames.indexOf(name);
      if (axis >= 0) return { source: 'axis', index: axis };
    }
    if (this.table.attribute(name)) {
      return { source: 'attribute', name };
    }
    return this.fail(`Unknown field "${name}"`, token.pos);
  }
}

// ============= Evaluation =============

type Evaluated = AttributeValue;

function readField(ref: FieldRef, entity: Entity): Evaluated {
  switch (ref.source) {
    case 'attribute':
      return entity.attributes[ref.name] ?? null;
    case 'id':
      return entity.id;
    case 'time':
      return entity.time ?? null;
    case 'lat':
      return entity.geo?.lat ?? null;
    case 'lon':
      return entity.geo?.lon ?? null;
    case 'axis': {
      const value = entity.coords[ref.index];
      return value === undefined || Number.isNaN(value) ? null : value;
    }
  }
}

function describe(value: Evaluated): string {
  return value === null ? 'null' : typeof value;
}

class Evaluator {
  constructor(private readonly expression: string) {}

  private fail(message: string): never {
    throw new InvalidQueryError(this.expression, message);
  }

  value(node: QueryNode, entity: Entity): Evaluated {
    switch (node.type) {
      case 'literal':
        return node.value;
      case 'field':
        return readField(node.ref, entity);
      default:
        return this.test(node, entity);
    }
  }

  test(node: QueryNode, entity: Entity): boolean {
    switch (node.type) {
      case 'and':
        return this.test(node.left, entity) && this.test(node.right, entity);
      case 'or':
        return this.test(node.left, entity) || this.test(node.right, entity);
      case 'not':
        return !this.test(node.operand, entity);
      case 'in': {
        const value = this.value(node.operand, entity);
        const found = node.values.some(candidate => candidate === value);
        return node.negated ? !found : found;
      }
      case 'compare':
        return this.compare(node.op, this.value(node.left, entity), this.value(node.right, entity));
      case 'literal':
      case 'field': {
        const value = this.value(node, entity);
        if (value === null) return false;
        if (typeof value !== 'boolean') {
          const label = node.type === 'field' ? `"${node.label}"` : 'literal';
          this.fail(`${label} is a ${typeof value}, not a condition`);
        }
        return value;
      }
    }
  }

  private compare(op: CompareOp, left: Evaluated, right: Evaluated): boolean {
    if (op === '==') return left === right;
    if (op === '!=') return left !== right;
    if (left === null || right === null) return false;
    if (typeof left !== typeof right || typeof left === 'boolean') {
      this.fail(`Cannot order ${describe(left)} against ${describe(right)} with "${op}"`);
    }
    switch (op) {
      case '<':
        return left < right;
      case '<=':
        return left <= right;
      case '>':
        return left > right;
      case '>=':
        return left >= right;
    }
  }
}

// ============= API =============

export interface CompiledQuery {
  expression: string;
  ast: QueryNode;
  matches(entity: Entity): boolean;
}

/**
 * Parse and bind an expression to a table's fields.
 *
 * @throws InvalidQueryError on syntax errors and unknown fields
 */
export function compileQuery(expression: string, table: EntityTable): CompiledQuery {
  if (expression.length > MAX_QUERY_LENGTH) {
    throw new InvalidQueryError(expression, `Expression is longer than ${MAX_QUERY_LENGTH} characters`);
  }
  const ast = new Parser(expression, tokenize(expression), table).parse();
  const evaluator = new Evaluator(expression);
  return {
    expression,
    ast,
    matches: (entity) => evaluator.test(ast, entity),
  };
}

export type QueryEvaluation =
  | { ok: true; ids: string[] }
  | { ok: false; error: InvalidQueryError };

/**
 * Evaluate an expression against every entity. Errors at any entity fail
 * the whole evaluation.
 */
export function evaluateQuery(expression: string, table: EntityTable): QueryEvaluation {
  try {
    const query = compileQuery(expression, table);
    const ids = table.entities.filter(entity => query.matches(entity)).map(entity => entity.id);
    return { ok: true, ids };
  } catch (error) {
    if (error instanceof InvalidQueryError) {
      return { ok: false, error };
    }
    throw error;
  }
}
