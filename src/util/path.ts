/**
 * Path expressions over parsed results.
 *
 * Service models address result members with a small subset of JMESPath:
 * `a.b.c`, indexes `a[0]` / `a[-1]`, flatten projections `a[].b`,
 * wildcard projections `a[*].b`, `length(expr)`, and `x || y` fallbacks.
 *
 * @module util/path
 */

type Step =
  | { readonly type: 'field'; readonly name: string }
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'flatten' }
  | { readonly type: 'wildcard' };

const compiled = new Map<string, Step[]>();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JMESPath truthiness: false, null, '', [] and {} are false.
 */
export function isTruthy(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === '') {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

function parse(expression: string): Step[] {
  const cached = compiled.get(expression);
  if (cached) {
    return cached;
  }

  const steps: Step[] = [];
  const pattern = /([A-Za-z_$][\w$-]*)|\[(-?\d+|\*|)\]|(\.)/y;
  let position = 0;
  let expectField = true;

  while (position < expression.length) {
    pattern.lastIndex = position;
    const match = pattern.exec(expression);
    if (!match) {
      throw new SyntaxError(`Invalid path expression "${expression}" at position ${position}`);
    }
    position = pattern.lastIndex;

    const [, field, bracket, dot] = match;
    if (field !== undefined) {
      if (!expectField) {
        throw new SyntaxError(`Invalid path expression "${expression}": unexpected "${field}"`);
      }
      steps.push({ type: 'field', name: field });
      expectField = false;
    } else if (dot !== undefined) {
      expectField = true;
    } else if (bracket === '') {
      steps.push({ type: 'flatten' });
      expectField = false;
    } else if (bracket === '*') {
      steps.push({ type: 'wildcard' });
      expectField = false;
    } else if (bracket !== undefined) {
      steps.push({ type: 'index', index: Number(bracket) });
      expectField = false;
    }
  }

  if (expectField && steps.length > 0) {
    throw new SyntaxError(`Invalid path expression "${expression}": trailing "."`);
  }

  compiled.set(expression, steps);
  return steps;
}

function applyStep(value: unknown, step: Step): unknown {
  switch (step.type) {
    case 'field':
      return isRecord(value) ? value[step.name] : undefined;
    case 'index':
      return Array.isArray(value) ? value.at(step.index) : undefined;
    default:
      return undefined;
  }
}

function flattenOnce(values: readonly unknown[]): unknown[] {
  const flattened: unknown[] = [];
  for (const value of values) {
    if (Array.isArray(value)) {
      flattened.push(...value);
    } else if (value !== undefined && value !== null) {
      flattened.push(value);
    }
  }
  return flattened;
}

function evaluate(data: unknown, steps: readonly Step[]): unknown {
  let current: unknown = data;
  let projected = false;

  for (const step of steps) {
    if (projected && Array.isArray(current)) {
      if (step.type === 'flatten') {
        current = flattenOnce(current);
      } else if (step.type !== 'wildcard') {
        current = current
          .map((element) => applyStep(element, step))
          .filter((element) => element !== undefined && element !== null);
      }
      continue;
    }

    if (step.type === 'flatten' || step.type === 'wildcard') {
      if (!Array.isArray(current)) {
        return undefined;
      }
      current = step.type === 'flatten' ? flattenOnce(current) : current.filter((e) => e !== undefined && e !== null);
      projected = true;
      continue;
    }

    current = applyStep(current, step);
    if (current === undefined || current === null) {
      return undefined;
    }
  }

  return current;
}

function splitTopLevel(expression: string): string[] {
  return expression.split('||').map((part) => part.trim());
}

function evaluateTerm(data: unknown, term: string): unknown {
  const lengthMatch = /^length\((.*)\)$/.exec(term);
  if (lengthMatch) {
    const inner = evaluateTerm(data, (lengthMatch[1] ?? '').trim());
    if (typeof inner === 'string' || Array.isArray(inner)) {
      return inner.length;
    }
    if (isRecord(inner)) {
      return Object.keys(inner).length;
    }
    return undefined;
  }

  if (term === '@' || term === '') {
    return data;
  }

  return evaluate(data, parse(term));
}

/**
 * Evaluate a path expression against parsed data.
 *
 * Returns `undefined` when the path does not resolve.
 *
 * @throws {SyntaxError} If the expression cannot be parsed
 *
 * @example
 * ```typescript
 * searchPath({ Table: { TableStatus: 'ACTIVE' } }, 'Table.TableStatus'); // 'ACTIVE'
 * searchPath({ Items: [{ id: 1 }, { id: 2 }] }, 'Items[].id');           // [1, 2]
 * searchPath({ NextMarker: 'b' }, 'NextToken || NextMarker');            // 'b'
 * ```
 */
export function searchPath(data: unknown, expression: string): unknown {
  const terms = splitTopLevel(expression);
  let last: unknown;

  for (const term of terms) {
    last = evaluateTerm(data, term);
    if (isTruthy(last)) {
      return last;
    }
  }

  return last;
}
