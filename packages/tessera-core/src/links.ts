/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Link resolution: substitution of `@[KIND:BODY:FORMAT]@` tokens.
 *
 * Token kinds:
 * - `EVAL`: evaluate BODY as an expression
 *   - `.a.b` attribute path into the export context
 *   - `"text"` or `'text'` literal
 *   - `X if COND else Y` conditional on the truthiness of COND
 *   - anything else is taken as literal text
 * - `ENV`: value of the environment variable named by BODY
 *
 * FORMAT is empty or a run of `#`; N hashes zero-pad an integer to width N.
 *
 * Tokens nest. Resolution parses the whole template first and evaluates
 * innermost tokens first; substituted values are never scanned again, so
 * resolving already-resolved text returns it unchanged.
 *
 * @example
 * ```ts
 * resolveLinks('P@[EVAL:.currentPass:#####]@.rib', ctx); // 'P00001.rib'
 * ```
 */

import type { AttributeRecord, AttributeValue, ExportContext } from '@tessera/types';
import { ResolutionError } from './errors.js';

const OPEN = '@[';
const CLOSE = ']@';

type LinkNode =
  | { kind: 'text'; text: string }
  | { kind: 'token'; offset: number; children: LinkNode[] };

type Scalar = string | number | boolean | null;

/**
 * Resolve every token in `template` against `context`.
 *
 * @param template - Text containing tokens
 * @param context - Export context tokens resolve against
 * @param origin - Where the template came from, for error messages
 * @returns The resolved text
 * @throws {ResolutionError} If a token is malformed or cannot be resolved
 */
export function resolveLinks(template: string, context: ExportContext, origin: string = 'template'): string {
  if (!hasLinks(template)) return template;
  const nodes = parseLinks(template, origin);
  return nodes.map((node) => evaluateNode(node, context, origin)).join('');
}

/** Whether the text contains any token opener */
export function hasLinks(text: string): boolean {
  return text.includes(OPEN);
}

/**
 * Truthiness of resolved text.
 *
 * Empty text, `0`, `false` and `none` (any case) are false. Text is not
 * parsed as a number, so `0.0` or `00` are true.
 */
export function isTruthy(text: string): boolean {
  const value = text.trim().toLowerCase();
  return !(value === '' || value === '0' || value === 'false' || value === 'none');
}

/**
 * Parse a resolved flag attribute strictly.
 *
 * @throws {ResolutionError} If the value is not a recognised boolean
 */
export function parseFlag(text: string, origin: string): boolean {
  const value = text.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0' || value === '') return false;
  throw new ResolutionError(text, origin, 'is not True/False');
}

// =============================================================================
// Parsing
// =============================================================================

function parseLinks(template: string, origin: string): LinkNode[] {
  let pos = 0;

  const parseSequence = (nested: boolean): LinkNode[] => {
    const nodes: LinkNode[] = [];
    let text = '';

    while (pos < template.length) {
      if (template.startsWith(OPEN, pos)) {
        if (text) {
          nodes.push({ kind: 'text', text });
          text = '';
        }
        const offset = pos;
        pos += OPEN.length;
        const children = parseSequence(true);
        if (!template.startsWith(CLOSE, pos)) {
          throw new ResolutionError(snippet(template, offset), origin, 'is not terminated');
        }
        pos += CLOSE.length;
        nodes.push({ kind: 'token', offset, children });
      } else if (nested && template.startsWith(CLOSE, pos)) {
        break;
      } else {
        text += template[pos];
        pos += 1;
      }
    }

    if (text) nodes.push({ kind: 'text', text });
    return nodes;
  };

  return parseSequence(false);
}

function snippet(template: string, offset: number): string {
  const text = template.slice(offset, offset + 40);
  return text.length < template.length - offset ? `${text}...` : text;
}

// =============================================================================
// Evaluation
// =============================================================================

function evaluateNode(node: LinkNode, context: ExportContext, origin: string): string {
  if (node.kind === 'text') return node.text;
  const body = node.children.map((child) => evaluateNode(child, context, origin)).join('');
  return evaluateToken(body, context, origin);
}

function evaluateToken(body: string, context: ExportContext, origin: string): string {
  const colon = body.indexOf(':');
  if (colon === -1) {
    throw new ResolutionError(body, origin, 'has no kind (expected EVAL: or ENV:)');
  }
  const kind = body.slice(0, colon).trim().toUpperCase();
  const rest = body.slice(colon + 1);

  const formatAt = lastIndexOutsideQuotes(rest, ':');
  const expression = formatAt === -1 ? rest : rest.slice(0, formatAt);
  const format = formatAt === -1 ? '' : rest.slice(formatAt + 1).trim();

  let value: Scalar;
  switch (kind) {
    case 'EVAL':
      value = evaluateExpression(expression, context, origin);
      break;
    case 'ENV': {
      const name = expression.trim();
      const env = context.environment[name];
      if (typeof env !== 'string') {
        throw new ResolutionError(name, origin, 'is not a defined environment variable');
      }
      value = env;
      break;
    }
    default:
      throw new ResolutionError(kind, origin, 'is not a known token kind');
  }

  return formatValue(value, format, expression.trim(), origin);
}

function evaluateExpression(expression: string, context: ExportContext, origin: string): Scalar {
  const text = expression.trim();

  const ifAt = indexOutsideQuotes(text, ' if ');
  if (ifAt !== -1) {
    const elseAt = indexOutsideQuotes(text, ' else ', ifAt + 4);
    if (elseAt === -1) {
      throw new ResolutionError(text, origin, 'has "if" without "else"');
    }
    const condition = evaluateExpression(text.slice(ifAt + 4, elseAt), context, origin);
    return scalarTruthy(condition)
      ? evaluateExpression(text.slice(0, ifAt), context, origin)
      : evaluateExpression(text.slice(elseAt + 6), context, origin);
  }

  if (text.startsWith('.')) {
    return lookupPath(text, context, origin);
  }

  const quote = text[0];
  if (text.length >= 2 && (quote === '"' || quote === "'") && text.endsWith(quote)) {
    return text.slice(1, -1);
  }

  return text;
}

function lookupPath(path: string, context: ExportContext, origin: string): Scalar {
  const segments = path.slice(1).split('.');
  if (segments.some((segment) => segment === '')) {
    throw new ResolutionError(path, origin, 'is not a valid attribute path');
  }

  const scope: AttributeRecord = context;
  let current: AttributeValue | undefined = scope;
  for (const segment of segments) {
    if (current === null || current === undefined || typeof current !== 'object') {
      throw new ResolutionError(path, origin);
    }
    if (isAttributeList(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    }
  }

  if (current === undefined) {
    throw new ResolutionError(path, origin);
  }
  if (current !== null && typeof current === 'object') {
    throw new ResolutionError(path, origin, 'is not a scalar value');
  }
  return current;
}

function isAttributeList(value: AttributeRecord | readonly AttributeValue[]): value is readonly AttributeValue[] {
  return Array.isArray(value);
}

function scalarTruthy(value: Scalar): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return isTruthy(value);
}

function formatValue(value: Scalar, format: string, expression: string, origin: string): string {
  if (format === '') return scalarToString(value);

  if (!/^#+$/.test(format)) {
    throw new ResolutionError(expression, origin, `has unknown format '${format}'`);
  }

  const text = scalarToString(value).trim();
  if (!/^-?\d+$/.test(text)) {
    throw new ResolutionError(expression, origin, `is not an integer (got '${text}')`);
  }
  const negative = text.startsWith('-');
  const digits = (negative ? text.slice(1) : text).padStart(format.length, '0');
  return negative ? `-${digits}` : digits;
}

function scalarToString(value: Scalar): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return String(value);
}

// =============================================================================
// Quote-aware scanning
// =============================================================================

function indexOutsideQuotes(text: string, needle: string, from: number = 0): number {
  let quote: string | null = null;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (text.startsWith(needle, i)) {
      return i;
    }
  }
  return -1;
}

function lastIndexOutsideQuotes(text: string, needle: string): number {
  let found = -1;
  let from = 0;
  while (true) {
    const at = indexOutsideQuotes(text, needle, from);
    if (at === -1) return found;
    found = at;
    from = at + needle.length;
  }
}
