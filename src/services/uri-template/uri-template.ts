/**
 * URI Template
 *
 * RFC 6570 URI templates: parsing, variable discovery and expansion
 * for all eight expression operators, with explode and prefix modifiers.
 */

import { UriTemplateError } from '../../core/errors.js';

/**
 * Scalar values a template variable can take
 */
export type TemplateScalar = string | number | boolean;

/**
 * Any value accepted for a template variable
 */
export type TemplateValue =
  | TemplateScalar
  | null
  | undefined
  | readonly TemplateScalar[]
  | Readonly<Record<string, TemplateScalar>>;

/**
 * Values accepted positionally (records only bind by name)
 */
export type PositionalValue = TemplateScalar | null | undefined | readonly TemplateScalar[];

/**
 * Variable bindings for expansion
 */
export type TemplateVariables = Readonly<Record<string, TemplateValue>>;

/**
 * Expression operator characters
 */
export type Operator = '' | '+' | '#' | '.' | '/' | ';' | '?' | '&';

/**
 * Kind of a template variable, named after where it expands
 */
export type VariableKind =
  | 'simple'
  | 'reserved'
  | 'fragment'
  | 'label'
  | 'path-segment'
  | 'path-parameter'
  | 'query'
  | 'query-continued';

/**
 * A variable declared in a template expression
 */
export interface TemplateVariable {
  name: string;
  kind: VariableKind;
  explode: boolean;
  prefixLength?: number;
}

interface OperatorRules {
  kind: VariableKind;
  first: string;
  separator: string;
  named: boolean;
  ifEmpty: string;
  allowReserved: boolean;
}

const OPERATORS: Record<Operator, OperatorRules> = {
  '': { kind: 'simple', first: '', separator: ',', named: false, ifEmpty: '', allowReserved: false },
  '+': { kind: 'reserved', first: '', separator: ',', named: false, ifEmpty: '', allowReserved: true },
  '#': { kind: 'fragment', first: '#', separator: ',', named: false, ifEmpty: '', allowReserved: true },
  '.': { kind: 'label', first: '.', separator: '.', named: false, ifEmpty: '', allowReserved: false },
  '/': { kind: 'path-segment', first: '/', separator: '/', named: false, ifEmpty: '', allowReserved: false },
  ';': { kind: 'path-parameter', first: ';', separator: ';', named: true, ifEmpty: '', allowReserved: false },
  '?': { kind: 'query', first: '?', separator: '&', named: true, ifEmpty: '=', allowReserved: false },
  '&': { kind: 'query-continued', first: '&', separator: '&', named: true, ifEmpty: '=', allowReserved: false }
};

const VARNAME = /^(?:[A-Za-z0-9_]|%[0-9A-Fa-f]{2})(?:\.?(?:[A-Za-z0-9_]|%[0-9A-Fa-f]{2}))*$/;
const UNRESERVED = /^[A-Za-z0-9\-._~]$/;
const RESERVED = /^[:/?#[\]@!$&'()*+,;=]$/;
const PCT_TRIPLET = /^%[0-9A-Fa-f]{2}/;
const MAX_PREFIX = 9999;

interface Expression {
  operator: Operator;
  variables: TemplateVariable[];
  source: string;
}

type Part = string | Expression;

function isOperator(ch: string): ch is Exclude<Operator, ''> {
  return ch === '+' || ch === '#' || ch === '.' || ch === '/' || ch === ';' || ch === '?' || ch === '&';
}

/**
 * Percent-encodes a value, optionally keeping reserved characters
 * and existing percent-encoded triplets
 */
export function encodeValue(value: string, allowReserved: boolean): string {
  let result = '';
  const chars = Array.from(value);

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? '';

    if (UNRESERVED.test(ch)) {
      result += ch;
      continue;
    }

    if (allowReserved) {
      if (RESERVED.test(ch)) {
        result += ch;
        continue;
      }
      if (ch === '%' && PCT_TRIPLET.test(chars.slice(i, i + 3).join(''))) {
        result += ch;
        continue;
      }
    }

    const encoded = encodeURIComponent(ch);
    result += encoded === ch
      ? `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`
      : encoded;
  }

  return result;
}

function parseExpression(body: string, template: string, position: number): Expression {
  if (body.length === 0) {
    throw new UriTemplateError('Empty expression', template, position);
  }

  const head = body.charAt(0);
  let operator: Operator = '';
  let rest = body;

  if (isOperator(head)) {
    operator = head;
    rest = body.slice(1);
  } else if ('=,!@|'.includes(head)) {
    throw new UriTemplateError(`Reserved operator '${head}' is not supported`, template, position);
  }

  const rules = OPERATORS[operator];
  const variables = rest.split(',').map((raw): TemplateVariable => {
    let name = raw;
    let explode = false;
    let prefixLength: number | undefined;

    if (name.endsWith('*')) {
      explode = true;
      name = name.slice(0, -1);
    } else {
      const colon = name.indexOf(':');
      if (colon >= 0) {
        const digits = name.slice(colon + 1);
        if (!/^[1-9][0-9]{0,3}$/.test(digits) || Number(digits) > MAX_PREFIX) {
          throw new UriTemplateError(`Invalid prefix modifier in '${raw}'`, template, position);
        }
        prefixLength = Number(digits);
        name = name.slice(0, colon);
      }
    }

    if (!VARNAME.test(name)) {
      throw new UriTemplateError(`Invalid variable name '${raw}'`, template, position);
    }

    return prefixLength === undefined
      ? { name, kind: rules.kind, explode }
      : { name, kind: rules.kind, explode, prefixLength };
  });

  return { operator, variables, source: `{${body}}` };
}

function parse(template: string): Part[] {
  const parts: Part[] = [];
  let literal = '';
  let i = 0;

  while (i < template.length) {
    const ch = template.charAt(i);

    if (ch === '}') {
      throw new UriTemplateError('Unmatched closing brace', template, i);
    }

    if (ch !== '{') {
      literal += ch;
      i++;
      continue;
    }

    const end = template.indexOf('}', i + 1);
    if (end < 0) {
      throw new UriTemplateError('Unterminated expression', template, i);
    }

    const body = template.slice(i + 1, end);
    if (body.includes('{')) {
      throw new UriTemplateError('Nested expression', template, i);
    }

    if (literal) {
      parts.push(literal);
      literal = '';
    }
    parts.push(parseExpression(body, template, i));
    i = end + 1;
  }

  if (literal) {
    parts.push(literal);
  }

  return parts;
}

function isRecord(value: unknown): value is Readonly<Record<string, TemplateScalar>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositional(value: PositionalValue | TemplateVariables | undefined): value is PositionalValue {
  return value === null || value === undefined || typeof value !== 'object' || Array.isArray(value);
}

function isList(value: TemplateValue): value is readonly TemplateScalar[] {
  return Array.isArray(value);
}

function truncate(value: string, length: number | undefined): string {
  if (length === undefined) return value;
  return Array.from(value).slice(0, length).join('');
}

function expandVariable(variable: TemplateVariable, value: TemplateValue, rules: OperatorRules): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const encode = (raw: TemplateScalar) => encodeValue(String(raw), rules.allowReserved);
  const named = (encoded: string) =>
    rules.named ? `${variable.name}${encoded === '' ? rules.ifEmpty : `=${encoded}`}` : encoded;

  if (isList(value)) {
    if (value.length === 0) return undefined;

    if (variable.explode) {
      return value.map(item => named(encode(item))).join(rules.separator);
    }
    return named(value.map(encode).join(','));
  }

  if (isRecord(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0) return undefined;

    if (variable.explode) {
      return entries
        .map(([key, item]) => {
          const encoded = encode(item);
          return rules.named
            ? `${encodeValue(key, rules.allowReserved)}${encoded === '' ? rules.ifEmpty : `=${encoded}`}`
            : `${encodeValue(key, rules.allowReserved)}=${encoded}`;
        })
        .join(rules.separator);
    }
    return named(entries.map(([key, item]) => `${encodeValue(key, rules.allowReserved)},${encode(item)}`).join(','));
  }

  return named(encodeValue(truncate(String(value), variable.prefixLength), rules.allowReserved));
}

function expandExpression(expression: Expression, variables: TemplateVariables): string {
  const rules = OPERATORS[expression.operator];
  const expanded: string[] = [];

  for (const variable of expression.variables) {
    const value = Object.hasOwn(variables, variable.name) ? variables[variable.name] : undefined;
    const part = expandVariable(variable, value, rules);
    if (part !== undefined) {
      expanded.push(part);
    }
  }

  if (expanded.length === 0) {
    return '';
  }

  return rules.first + expanded.join(rules.separator);
}

/**
 * A parsed RFC 6570 URI template
 */
export class UriTemplate {
  private readonly parts: Part[];

  private constructor(private readonly template: string) {
    this.parts = parse(template);
  }

  /**
   * Parses a template
   *
   * @throws UriTemplateError if the template is malformed
   */
  static of(template: string): UriTemplate {
    return new UriTemplate(template);
  }

  /**
   * Parses a template, returning null for malformed input
   */
  static tryParse(template: string): UriTemplate | null {
    try {
      return new UriTemplate(template);
    } catch (error) {
      if (error instanceof UriTemplateError) return null;
      throw error;
    }
  }

  /**
   * True when the string is a well-formed template with at least one expression
   */
  static isTemplate(candidate: string): boolean {
    if (!candidate.includes('{')) return false;
    const parsed = UriTemplate.tryParse(candidate);
    return parsed !== null && parsed.getVariables().length > 0;
  }

  getVariables(): TemplateVariable[] {
    const result: TemplateVariable[] = [];
    for (const part of this.parts) {
      if (typeof part !== 'string') {
        result.push(...part.variables);
      }
    }
    return result;
  }

  /**
   * Distinct variable names in order of first appearance
   */
  getVariableNames(): string[] {
    return [...new Set(this.getVariables().map(v => v.name))];
  }

  /**
   * Expands the template with named bindings or positional values.
   * Positional values bind to variable names in order of appearance.
   */
  expand(variables?: TemplateVariables): string;
  expand(...positional: PositionalValue[]): string;
  expand(...args: Array<PositionalValue | TemplateVariables>): string {
    return this.expandWith(args);
  }

  /**
   * Expands with a single bindings record, or with positional values
   */
  expandWith(args: ReadonlyArray<PositionalValue | TemplateVariables>): string {
    const first = args[0];
    const bindings: TemplateVariables = args.length === 1 && isRecord(first)
      ? first
      : this.bindPositional(args);

    return this.parts
      .map(part => (typeof part === 'string' ? part : expandExpression(part, bindings)))
      .join('');
  }

  /**
   * Adds query variables, merging into a trailing query expression
   * or continuing a literal query string
   */
  with(...names: string[]): UriTemplate {
    const existing = new Set(this.getVariableNames());
    const added = names.filter(name => !existing.has(name));

    if (added.length === 0) {
      return this;
    }

    for (const name of added) {
      if (!VARNAME.test(name)) {
        throw new UriTemplateError(`Invalid variable name '${name}'`, this.template);
      }
    }

    const last = this.parts[this.parts.length - 1];
    if (last !== undefined && typeof last !== 'string' && (last.operator === '?' || last.operator === '&')) {
      const body = last.source.slice(1, -1);
      return UriTemplate.of(`${this.template.slice(0, -last.source.length)}{${body},${added.join(',')}}`);
    }

    const hasQuery = this.parts.some(part =>
      typeof part === 'string' ? part.includes('?') : part.operator === '?'
    );
    const operator = hasQuery ? '&' : '?';
    return UriTemplate.of(`${this.template}{${operator}${added.join(',')}}`);
  }

  toString(): string {
    return this.template;
  }

  private bindPositional(values: ReadonlyArray<PositionalValue | TemplateVariables>): TemplateVariables {
    const bindings: Record<string, TemplateValue> = {};
    this.getVariableNames().forEach((name, index) => {
      const value = values[index];
      if (isPositional(value)) {
        bindings[name] = value;
      }
    });
    return bindings;
  }
}
