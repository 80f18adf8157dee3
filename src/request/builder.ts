import { z } from 'zod';
import type { ConnectionConfig } from '../config/types.js';
import { InvalidRequestError } from '../error/invalidRequestError.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { HeaderOptions, HttpRequest } from '../types/request.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { BindValue, BindVariables, EvalRequest, GetRequest } from './types.js';

/** Content type of `eval` bodies. */
export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8';

/** Options that only apply to the `items` format. */
const ITEMS_ONLY = ['mode', 'counting', 'count', 'first'] as const;

const bindVariableSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'invalid bind variable name'),
  value: z.union([z.string(), z.number().finite(), z.boolean()], {
    errorMap: () => ({ message: 'bind variable value must be a string, a finite number or a boolean' }),
  }),
});

const evalSchema = z
  .object({
    expression: z.string().refine((expression) => expression.trim().length > 0, 'must not be empty'),
    library: z.string().min(1).optional(),
    format: z.enum(['items', 'xml', 'html', 'xhtml']).optional(),
    mode: z.literal('profile').optional(),
    maxtime: z.number().int().nonnegative().optional(),
    counting: z.enum(['exact', 'estimated', 'none']).optional(),
    count: z.number().int().min(1).optional(),
    first: z.number().int().min(1).optional(),
    bindVariables: z.array(bindVariableSchema),
  })
  .superRefine((request, ctx) => {
    if (request.format === 'items') {
      return;
    }

    for (const key of ITEMS_ONLY) {
      if (request[key] !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'requires format "items"' });
      }
    }
  });

const getSchema = z.object({
  path: z.string().refine((path) => path.trim().length > 0, 'must not be empty'),
  library: z.string().min(1).optional(),
});

function isMap(variables: BindVariables): variables is ReadonlyMap<string, BindValue> {
  return variables instanceof Map;
}

function bindEntries(variables: BindVariables | undefined): Array<{ name: string; value: BindValue }> {
  if (!variables) {
    return [];
  }

  const entries = isMap(variables) ? [...variables.entries()] : Object.entries(variables);
  return entries.map(([name, value]) => ({ name, value }));
}

/**
 * Headers every request carries: Basic authentication when the connection has both a user
 * and a password, then the caller's headers.
 */
function baseHeaders(config: ConnectionConfig, headers?: HeaderOptions, extra?: Record<string, string>): Headers {
  const defaults: Record<string, string> = { ...extra };
  if (config.username && config.password) {
    const credentials = Buffer.from(`${config.username}:${config.password}`, 'utf8').toString('base64');
    defaults.Authorization = `Basic ${credentials}`;
  }

  return mergeHeaderOptions(defaults, headers);
}

/** Endpoint URL with the operation and its parameters in the query string. */
function operationUrl(config: ConnectionConfig, params: Array<[string, string | undefined]>): string {
  const url = new URL(config.endpoint);
  for (const [key, value] of params) {
    if (value !== undefined) {
      url.searchParams.append(key, value);
    }
  }

  return url.toString();
}

/**
 * Builds the `POST` for an `eval` call.
 *
 * Body fields, in order: `op`, `query`, `format`, `mode`, `maxtime`, `counting`, `count`, `first`,
 * `library`, then one `$name` field per bind variable. Absent options are left out.
 */
export async function buildEvalRequest(
  config: ConnectionConfig,
  request: EvalRequest,
  headers?: HeaderOptions,
): SafeWrapAsync<InvalidRequestError, HttpRequest> {
  const [errValidation, valid] = await validator(
    { ...request, bindVariables: bindEntries(request.bindVariables) },
    evalSchema,
    'error invalid eval request',
  );
  if (errValidation) {
    return [new InvalidRequestError(errValidation.message, { cause: errValidation }), null];
  }

  const fields: Array<[string, string | number | undefined]> = [
    ['op', 'eval'],
    ['query', valid.expression],
    ['format', valid.format],
    ['mode', valid.mode],
    ['maxtime', valid.maxtime],
    ['counting', valid.counting],
    ['count', valid.count],
    ['first', valid.first],
    ['library', valid.library ?? config.library],
  ];

  const body = new URLSearchParams();
  for (const [key, value] of fields) {
    if (value !== undefined) {
      body.append(key, String(value));
    }
  }

  for (const { name, value } of valid.bindVariables) {
    body.append(`$${name}`, String(value));
  }

  return [
    null,
    {
      method: 'POST',
      url: config.endpoint,
      headers: baseHeaders(config, headers, { 'Content-Type': FORM_CONTENT_TYPE }),
      body: body.toString(),
    },
  ];
}

/**
 * Builds the `GET` retrieving one document, `?op=get&path=…&library=…`.
 */
export async function buildGetRequest(
  config: ConnectionConfig,
  request: GetRequest,
  headers?: HeaderOptions,
): SafeWrapAsync<InvalidRequestError, HttpRequest> {
  const [errValidation, valid] = await validator(request, getSchema, 'error invalid get request');
  if (errValidation) {
    return [new InvalidRequestError(errValidation.message, { cause: errValidation }), null];
  }

  return [
    null,
    {
      method: 'GET',
      url: operationUrl(config, [
        ['op', 'get'],
        ['path', valid.path],
        ['library', valid.library ?? config.library],
      ]),
      headers: baseHeaders(config, headers),
    },
  ];
}

/**
 * Builds the `GET` for the server information properties, `?op=info`.
 */
export function buildInfoRequest(config: ConnectionConfig, headers?: HeaderOptions): HttpRequest {
  return { method: 'GET', url: operationUrl(config, [['op', 'info']]), headers: baseHeaders(config, headers) };
}

/**
 * Builds the `GET` listing the libraries, `?op=listlib`.
 */
export function buildListLibrariesRequest(config: ConnectionConfig, headers?: HeaderOptions): HttpRequest {
  return { method: 'GET', url: operationUrl(config, [['op', 'listlib']]), headers: baseHeaders(config, headers) };
}
