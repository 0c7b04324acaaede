/**
 * Entity Records and Definitions
 *
 * A record is a plain object mirroring one NAV page's field set, keyed by the
 * wire field names. Its definition pairs the entity type name (which drives
 * element names and namespaces) with a zod schema that binds wire values.
 */

import { z } from 'zod';

// ============================================================================
// Record Base Shape
// ============================================================================

/**
 * Capability of carrying an optimistic-concurrency token. On OData the token
 * travels as `@odata.etag` and is sent back in `If-Match`; SOAP never sends it.
 */
export interface HasConcurrencyToken {
  ETag?: string;
}

/**
 * Shared record base. `Key` is the server-assigned SOAP record key; it is
 * never written into OData bodies.
 */
export interface NavRecord extends HasConcurrencyToken {
  Key?: string;
}

export const NavRecordSchema = z.object({
  ETag: z.string().optional(),
  Key: z.string().optional(),
});

/**
 * True when the record carries a non-empty concurrency token.
 */
export function hasConcurrencyToken(
  record: HasConcurrencyToken
): record is HasConcurrencyToken & { ETag: string } {
  return typeof record.ETag === 'string' && record.ETag.length > 0;
}

// ============================================================================
// Entity Definitions
// ============================================================================

export interface EntityDefinition<T extends NavRecord = NavRecord> {
  /** Entity type name, e.g. "Customer". Element name and namespace source. */
  readonly name: string;
  /** Declared field names, used for case-insensitive JSON binding */
  readonly fields: readonly string[];
  /** Binds raw wire values to a record; unknown fields are stripped */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Define an entity from its field schemas. `ETag` and `Key` are added.
 *
 * @example
 * ```typescript
 * const Customer = defineEntity('Customer', {
 *   No: z.string(),
 *   Name: z.string().optional(),
 *   Balance_LCY: navNumber().optional(),
 * });
 * type Customer = EntityRecord<typeof Customer>;
 * ```
 */
export function defineEntity<S extends z.ZodRawShape>(name: string, shape: S) {
  const schema = z.object(shape).merge(NavRecordSchema);
  return Object.freeze({
    name,
    fields: Object.freeze(Object.keys(schema.shape)),
    schema,
  });
}

/**
 * Record type produced by an entity definition.
 */
export type EntityRecord<D extends { readonly schema: z.ZodTypeAny }> = z.output<D['schema']>;
