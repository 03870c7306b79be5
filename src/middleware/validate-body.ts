/**
 * Body validation middleware.
 * Parses the JSON body, unwraps the envelope key (`{ "article": {...} }`)
 * and checks the inner object field by field. Any failure is a 400 listing
 * every failing field; otherwise the handler sees the unwrapped object as
 * its request body.
 */

import type { BodySchema, FieldSchema, FieldType } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Returns the problems with one present (non-null) value. */
type FieldCheck = (field: string, value: unknown, schema: FieldSchema) => string[];

const checks: Record<FieldType, FieldCheck> = {
  string: (field, value, schema) => {
    if (typeof value !== 'string') return [`${field} must be a string`];

    const problems: string[] = [];
    if (schema.nonEmpty && value.trim().length === 0) {
      problems.push(`${field} must not be empty`);
    }
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      problems.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      problems.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
    return problems;
  },

  number: (field, value, { min, max }) => {
    if (typeof value !== 'number') return [`${field} must be a number`];
    if (min !== undefined && value < min) return [`${field} must be at least ${min}`];
    if (max !== undefined && value > max) return [`${field} must be at most ${max}`];
    return [];
  },

  boolean: (field, value) =>
    typeof value === 'boolean' ? [] : [`${field} must be a boolean`],

  array: (field, value, { items, maxItems }) => {
    if (!Array.isArray(value)) return [`${field} must be an array`];
    if (items !== undefined && !value.every((v) => matchesType(v, items))) {
      return [`${field} must be an array of ${items}s`];
    }
    if (maxItems !== undefined && value.length > maxItems) {
      return [`${field} must have at most ${maxItems} items`];
    }
    return [];
  },

  object: (field, value) =>
    isRecord(value) ? [] : [`${field} must be an object`],
};

export function validateBody(envelope: string, schema: BodySchema): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    let raw: unknown;
    try {
      raw = await req.json();
    } catch {
      return errorResponse('Request body must be valid JSON');
    }

    const body = isRecord(raw) ? raw[envelope] : undefined;
    if (!isRecord(body)) {
      return errorResponse(`Request body must be an object with an "${envelope}" object`);
    }

    const problems = Object.entries(schema).flatMap(([field, fieldSchema]) => {
      const value = body[field];
      if (value === undefined || value === null) {
        return fieldSchema.required ? [`${field} is required`] : [];
      }
      return checks[fieldSchema.type](field, value, fieldSchema);
    });

    if (problems.length > 0) {
      return errorResponse(problems.join('; '), { fields: problems });
    }

    // The original body stream is spent
    return next(
      new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: JSON.stringify(body),
      }),
      ctx
    );
  };
}

function matchesType(value: unknown, type: Exclude<FieldType, 'array'>): boolean {
  switch (type) {
    case 'object':
      return isRecord(value);
    default:
      return typeof value === type;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorResponse(message: string, details?: Record<string, unknown>): Response {
  const body: ApiErrorResponse = {
    error: {
      code: 'INVALID_REQUEST',
      message,
      ...(details && { details }),
    },
  };
  return new Response(JSON.stringify(body), { status: 400, headers: JSON_HEADERS });
}
