import type { HttpHeaders, HttpRequestOptions, QueryParams, QueryValue } from '@discovery-engine/http-core';
import { serviceBaseUrl, type ParameterNode } from './document';
import { BadArgumentError } from './errors';
import type { ResolvedMethod } from './methodTree';
import { sanitizeBody, sanitizeValue } from './sanitize';

export type CallArgs = Record<string, unknown>;

export interface BindOptions {
  auth?: string;
  headers?: HttpHeaders;
  /** API key added to the query unless the arguments already carry one. */
  key?: string;
  timeoutMs?: number;
}

export interface BoundCall {
  resolved: ResolvedMethod;
  /** Sanitized arguments; re-bound with a page token for later pages. */
  args: CallArgs;
  request: HttpRequestOptions;
  options: BindOptions;
}

// string parameters that carry 64-bit integers accept whole numbers too
const INTEGER_STRING_FORMATS = new Set(['int64', 'uint64']);

/**
 * Checks `rawArgs` against the method's parameters and builds the HTTP
 * request. Raises {@link BadArgumentError} for unknown, missing or mistyped
 * arguments.
 */
export function bindArguments(resolved: ResolvedMethod, rawArgs: CallArgs, options: BindOptions = {}): BoundCall {
  const { method, document } = resolved;
  const parameters: Record<string, ParameterNode> = { ...document.parameters, ...method.parameters };
  const args: CallArgs = {};

  for (const [name, value] of Object.entries(rawArgs)) {
    if (value === undefined) continue;

    if (name === 'body') {
      if (!method.request) {
        throw new BadArgumentError(
          'body',
          'this method takes no request body',
          `Remove "body" or check that "${resolved.dotPath}" is the intended method.`,
        );
      }
      args.body = sanitizeBody(value, { $ref: method.request.$ref }, document.schemas);
      continue;
    }

    const parameter = Object.hasOwn(parameters, name) ? parameters[name] : undefined;
    if (!parameter) {
      throw new BadArgumentError(name, 'unknown parameter', unknownParameterHint(name, resolved));
    }
    args[name] = checkParameter(name, parameter, sanitizeValue(value, parameter.format === 'date'));
  }

  for (const [name, parameter] of Object.entries(method.parameters)) {
    if (parameter.required && args[name] === undefined) {
      throw new BadArgumentError(
        name,
        `missing required ${parameter.location} parameter`,
        `"${resolved.dotPath}" takes ${method.parameterOrder.join(', ') || name} in that order.`,
      );
    }
  }

  const query: QueryParams = {};
  for (const [name, value] of Object.entries(args)) {
    if (name === 'body' || parameters[name].location !== 'query') continue;
    query[name] = toQueryParam(value);
  }
  if (options.key !== undefined && query.key === undefined) {
    query.key = options.key;
  }

  const request: HttpRequestOptions = {
    method: method.httpMethod,
    urlParts: { baseUrl: serviceBaseUrl(document), path: expandPath(method.path, args) },
    query,
    body: args.body,
    headers: options.headers,
    operation: method.id ?? `${resolved.service}.${resolved.dotPath}`,
    auth: options.auth,
    timeoutMs: options.timeoutMs,
  };

  return { resolved, args, request, options };
}

/**
 * Expands `{name}` and `{+name}` placeholders. The `+` form keeps reserved
 * characters such as `/` unescaped.
 */
export function expandPath(template: string, args: CallArgs): string {
  return template.replace(/\{(\+?)([^}]+)\}/g, (_match, reserved: string, name: string) => {
    const value = args[name];
    if (value === undefined) {
      throw new BadArgumentError(name, 'missing path parameter', `The path "${template}" needs a value for it.`);
    }
    const text = Array.isArray(value) ? value.map(String).join(',') : String(value);
    return reserved ? encodeURI(text) : encodeURIComponent(text);
  });
}

function checkParameter(name: string, parameter: ParameterNode, value: unknown): QueryValue | QueryValue[] {
  if (Array.isArray(value)) {
    if (!parameter.repeated) {
      throw new BadArgumentError(name, 'a list was given for a single-valued parameter', 'Pass one value.');
    }
    return value.map((entry) => checkScalar(name, parameter, entry));
  }
  return checkScalar(name, parameter, value);
}

function checkScalar(name: string, parameter: ParameterNode, value: unknown): QueryValue {
  const checked = coerceScalar(name, parameter, value);
  if (parameter.enum && !parameter.enum.includes(String(checked))) {
    throw new BadArgumentError(name, `"${String(checked)}" is not an allowed value`, `Use one of: ${parameter.enum.join(', ')}.`);
  }
  return checked;
}

function coerceScalar(name: string, parameter: ParameterNode, value: unknown): QueryValue {
  switch (parameter.type) {
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' && Number.isInteger(value) && INTEGER_STRING_FORMATS.has(parameter.format ?? '')) {
        return String(value);
      }
      if (typeof value === 'number') {
        throw new BadArgumentError(
          name,
          `expected a string but got the number ${value}`,
          `Identifiers are passed as strings: use "${value}" instead of ${value}.`,
        );
      }
      break;
    case 'integer':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      if (typeof value === 'string' && /^-?\d+$/.test(value)) return value;
      break;
    case 'number':
      if (typeof value === 'number') return value;
      if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return value;
      break;
    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 'true' || value === 'false') return value;
      break;
    default:
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  }
  throw new BadArgumentError(
    name,
    `expected ${parameter.type} but got ${describeValue(value)}`,
    `Check the value passed for "${name}".`,
  );
}

function toQueryParam(value: unknown): QueryValue | QueryValue[] | undefined {
  if (Array.isArray(value)) {
    return value.filter(isQueryValue);
  }
  return isQueryValue(value) ? value : undefined;
}

function isQueryValue(value: unknown): value is QueryValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function unknownParameterHint(name: string, resolved: ResolvedMethod): string {
  const normalized = normalizeName(name);
  const known = Object.keys(resolved.method.parameters);
  const match = known.find((candidate) => normalizeName(candidate) === normalized);
  if (match) {
    return `Did you mean "${match}"?`;
  }
  const accepted = resolved.method.request ? [...known, 'body'] : known;
  return accepted.length > 0
    ? `"${resolved.dotPath}" accepts: ${accepted.sort().join(', ')}.`
    : `"${resolved.dotPath}" takes no arguments.`;
}

function normalizeName(name: string): string {
  return name.replace(/[_-]/g, '').toLowerCase();
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  if (typeof value === 'object') return 'an object';
  return `${typeof value} ${JSON.stringify(value)}`;
}
