/**
 * Validation Schemas
 *
 * Zod schemas for endpoint configuration, OData payloads and the scalar
 * conventions NAV uses on the wire.
 *
 * IMPORTANT: every value read out of a SOAP response is text. The field
 * schemas below accept both the wire text and an already-typed value, so the
 * same entity definition binds XML and JSON records.
 */

import { z } from 'zod';
import { parseNavDate } from '../models/date-only.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Flatten zod issues into "path: message" lines for error context.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

// ============================================================================
// Endpoint Configuration
// ============================================================================

const SERVICE_TYPES: Record<string, 'ODataV4' | 'SOAP'> = {
  ODATAV4: 'ODataV4',
  SOAP: 'SOAP',
};

const OBJECT_TYPES: Record<string, 'Page' | 'Codeunit'> = {
  PAGE: 'Page',
  CODEUNIT: 'Codeunit',
};

/**
 * Service type, matched case-insensitively ("odatav4" → "ODataV4").
 */
export const ServiceTypeSchema = z.preprocess(
  (val) => (typeof val === 'string' ? SERVICE_TYPES[val.trim().toUpperCase()] ?? val : val),
  z.enum(['ODataV4', 'SOAP'], {
    errorMap: () => ({ message: 'serviceType must be ODataV4 or SOAP' }),
  })
);

/**
 * Object type addressed by SOAP services. Blank means Page.
 */
export const ObjectTypeSchema = z.preprocess(
  (val) => {
    if (typeof val !== 'string') return val;
    if (val.trim() === '') return undefined;
    return OBJECT_TYPES[val.trim().toUpperCase()] ?? val;
  },
  z.enum(['Page', 'Codeunit']).optional()
);

export const CredentialsSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('basic'),
    username: z.string().trim().min(1, 'username cannot be empty'),
    password: z.string(),
  }),
  z.object({
    kind: z.literal('bearer'),
    token: z.string().trim().min(1, 'token cannot be empty'),
  }),
  z.object({
    kind: z.literal('ambient'),
  }),
]);

export const NavServiceConfigSchema = z.object({
  host: z
    .string()
    .trim()
    .min(1, 'host cannot be empty')
    .refine((val) => URL.canParse(val), 'host must be an absolute URL such as http://nav-server'),
  port: z.coerce
    .number({ invalid_type_error: 'port must be a number or numeric string' })
    .int('port must be an integer')
    .min(1, 'port must be at least 1')
    .max(65535, 'port cannot exceed 65535'),
  serverInstance: z.string().trim().min(1, 'serverInstance cannot be empty'),
  company: z.string().trim().min(1, 'company cannot be empty'),
  serviceType: ServiceTypeSchema,
  objectType: ObjectTypeSchema,
  credentials: CredentialsSchema.default({ kind: 'ambient' }),
});

export const NavEndpointsConfigSchema = z.object({
  odata: NavServiceConfigSchema,
  soap: NavServiceConfigSchema,
});

// ============================================================================
// OData Payloads
// ============================================================================

/**
 * Collection envelope: `{ "@odata.context": ..., "value": [...] }`.
 * A missing `value` is an empty collection.
 */
export const ODataCollectionSchema = z.object({
  '@odata.context': z.string().optional(),
  value: z.array(z.record(z.string(), z.unknown())).nullish(),
});

export const ODataEntitySchema = z.record(z.string(), z.unknown());

// ============================================================================
// NAV Field Schemas
// ============================================================================

/**
 * Decimal/Integer field. Accepts "12.5" or 12.5; blank text counts as absent.
 */
export function navNumber() {
  return z.preprocess((val) => {
    if (typeof val !== 'string') return val;
    return val.trim() === '' ? undefined : Number(val);
  }, z.number({ invalid_type_error: 'expected a numeric value' }).optional());
}

/**
 * Boolean field. Accepts "true"/"false" (any case) or a boolean.
 */
export function navBoolean() {
  return z.preprocess((val) => {
    if (typeof val !== 'string') return val;
    const normalized = val.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    return val;
  }, z.boolean({ invalid_type_error: 'expected true or false' }));
}

/**
 * Date field in yyyy-MM-dd form. Unparseable text binds as undefined, the way
 * an empty NAV date does.
 */
export function navDate() {
  return z.preprocess(
    (val) => (val instanceof Date ? val : parseNavDate(typeof val === 'string' ? val : undefined)),
    z.date().optional()
  );
}
