import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineEntity, hasConcurrencyToken } from '../../../src/models/nav-record.js';
import {
  ObjectTypeSchema,
  ServiceTypeSchema,
  navBoolean,
  navDate,
  navNumber,
} from '../../../src/validation/schemas.js';

describe('defineEntity', () => {
  it('adds ETag and Key to the declared fields', () => {
    const Item = defineEntity('Item', { No: z.string(), Unit_Price: navNumber() });

    expect(Item.name).toBe('Item');
    expect(Item.fields).toEqual(['No', 'Unit_Price', 'ETag', 'Key']);
    expect(Object.isFrozen(Item)).toBe(true);
  });

  it('strips unknown fields when binding', () => {
    const Item = defineEntity('Item', { No: z.string() });

    expect(Item.schema.parse({ No: '1000', Extra: 'x', Key: 'k' })).toEqual({ No: '1000', Key: 'k' });
  });
});

describe('hasConcurrencyToken', () => {
  it('requires a non-empty ETag', () => {
    expect(hasConcurrencyToken({ ETag: 'W/"1"' })).toBe(true);
    expect(hasConcurrencyToken({ ETag: '' })).toBe(false);
    expect(hasConcurrencyToken({})).toBe(false);
  });
});

describe('NAV field schemas', () => {
  it('binds numbers from text and treats blank as absent', () => {
    const schema = navNumber();

    expect(schema.parse('12.50')).toBe(12.5);
    expect(schema.parse(3)).toBe(3);
    expect(schema.parse('  ')).toBeUndefined();
    expect(schema.safeParse('twelve').success).toBe(false);
  });

  it('binds booleans case-insensitively', () => {
    const schema = navBoolean();

    expect(schema.parse('True')).toBe(true);
    expect(schema.parse('false')).toBe(false);
    expect(schema.safeParse('yes').success).toBe(false);
  });

  it('binds dates and leaves unparseable text empty', () => {
    const schema = navDate();

    expect(schema.parse('2024-03-15')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
    expect(schema.parse('garbage')).toBeUndefined();
  });

  it('matches service and object types case-insensitively', () => {
    expect(ServiceTypeSchema.parse('odatav4')).toBe('ODataV4');
    expect(ObjectTypeSchema.parse('PAGE')).toBe('Page');
    expect(ObjectTypeSchema.parse('')).toBeUndefined();
  });
});
