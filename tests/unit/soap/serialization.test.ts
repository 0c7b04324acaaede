import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ParseError } from '../../../src/core/errors.js';
import { defineEntity } from '../../../src/models/nav-record.js';
import { pageNamespace } from '../../../src/soap/addressing.js';
import {
  codeunitOperation,
  deserializeEntity,
  pageOperation,
  serializeEntity,
  soapFilter,
} from '../../../src/soap/serialization.js';
import { element, serializeXml } from '../../../src/xml/xml-document.js';
import { Customer } from '../../fixtures/nav/entities.js';

const ns = pageNamespace('Customer');

describe('request fragments', () => {
  it('builds a ReadMultiple filter', () => {
    expect(serializeXml(soapFilter(ns, 'No', '10000..20000'))).toBe(
      '<filter xmlns="urn:microsoft-dynamics-schemas/page/customer"><Field>No</Field><Criteria>10000..20000</Criteria></filter>'
    );
  });

  it('escapes filter criteria', () => {
    expect(serializeXml(soapFilter('urn:f', 'Balance_LCY', '<>0'))).toBe(
      '<filter xmlns="urn:f"><Field>Balance_LCY</Field><Criteria>&lt;&gt;0</Criteria></filter>'
    );
  });

  it('wraps page operation children in the verb element', () => {
    const op = pageOperation(ns, 'Read', [element('No', ns, ['10000']), undefined]);

    expect(serializeXml(op)).toBe('<Read xmlns="urn:microsoft-dynamics-schemas/page/customer"><No>10000</No></Read>');
  });

  it('builds a codeunit method call in the codeunit namespace', () => {
    const op = codeunitOperation('PostingMgt', 'PostInvoice', { documentNo: 'SI-1', preview: 'false' });

    expect(serializeXml(op)).toBe(
      '<PostInvoice xmlns="urn:microsoft-dynamics-schemas/codeunit/PostingMgt">' +
        '<documentNo>SI-1</documentNo><preview>false</preview></PostInvoice>'
    );
  });
});

describe('serializeEntity', () => {
  it('writes fields in the service namespace, skipping ETag and empty values', () => {
    const record: Customer = {
      No: '10000',
      Name: 'Adatum',
      Balance_LCY: 12.5,
      Blocked: false,
      Last_Date_Modified: new Date(Date.UTC(2024, 2, 15)),
      Country_Region_Code: undefined,
      ETag: 'W/"etag"',
      Key: 'k1',
    };

    expect(serializeXml(serializeEntity(Customer, record))).toBe(
      '<Customer xmlns="urn:microsoft-dynamics-schemas/page/customer">' +
        '<Key>k1</Key><No>10000</No><Name>Adatum</Name><Balance_LCY>12.5</Balance_LCY><Blocked>false</Blocked>' +
        '<Last_Date_Modified>2024-03-15</Last_Date_Modified>' +
        '</Customer>'
    );
  });

  it('takes the namespace from the service name', () => {
    const record: Customer = { No: '1' };

    const el = serializeEntity(Customer, record, 'CustomerCard');

    expect(el.name).toBe('Customer');
    expect(el.namespace).toBe('urn:microsoft-dynamics-schemas/page/customercard');
  });

  it('writes Key first and declared fields in definition order', () => {
    const read = deserializeEntity(
      element('Customer', ns, [element('Key', ns, ['k1']), element('No', ns, ['1']), element('Name', ns, ['n'])]),
      Customer
    );
    const reordered: Customer = { Name: 'n2', Key: read.Key, No: read.No };

    expect(serializeXml(serializeEntity(Customer, read))).toBe(
      '<Customer xmlns="urn:microsoft-dynamics-schemas/page/customer"><Key>k1</Key><No>1</No><Name>n</Name></Customer>'
    );
    expect(serializeXml(serializeEntity(Customer, reordered))).toBe(
      '<Customer xmlns="urn:microsoft-dynamics-schemas/page/customer"><Key>k1</Key><No>1</No><Name>n2</Name></Customer>'
    );
  });
});

describe('deserializeEntity', () => {
  it('binds text values through the field schemas and drops unknown fields', () => {
    const el = element('Customer', ns, [
      element('No', ns, ['10000']),
      element('Balance_LCY', ns, ['1499.03']),
      element('Blocked', ns, ['TRUE']),
      element('Last_Date_Modified', ns, ['0001-01-01']),
      element('Unknown_Field', ns, ['x']),
    ]);

    const record = deserializeEntity(el, Customer);

    expect(record.No).toBe('10000');
    expect(record.Balance_LCY).toBe(1499.03);
    expect(record.Blocked).toBe(true);
    expect(record.Last_Date_Modified?.getUTCFullYear()).toBe(1);
    expect(record).not.toHaveProperty('Unknown_Field');
  });

  it('ignores children outside the given namespace', () => {
    const el = element('Customer', ns, [element('No', ns, ['1']), element('Name', 'urn:other', ['Elsewhere'])]);

    expect(deserializeEntity(el, Customer)).toEqual({ No: '1' });
  });

  it('collects repeated children into arrays and nested children into objects', () => {
    const orderNs = pageNamespace('SalesOrder');
    const SalesOrder = defineEntity('SalesOrder', {
      No: z.string(),
      SalesLines: z.object({ Line: z.array(z.object({ Item: z.string() })) }).optional(),
    });
    const el = element('SalesOrder', orderNs, [
      element('No', orderNs, ['SO-1']),
      element('SalesLines', orderNs, [
        element('Line', orderNs, [element('Item', orderNs, ['A'])]),
        element('Line', orderNs, [element('Item', orderNs, ['B'])]),
      ]),
    ]);

    expect(deserializeEntity(el, SalesOrder)).toEqual({
      No: 'SO-1',
      SalesLines: { Line: [{ Item: 'A' }, { Item: 'B' }] },
    });
  });

  it('throws ParseError when a value does not fit its field', () => {
    const el = element('Customer', ns, [element('No', ns, ['1']), element('Balance_LCY', ns, ['abc'])]);

    expect(() => deserializeEntity(el, Customer)).toThrow(ParseError);
    expect(() => deserializeEntity(el, Customer)).toThrow(
      'Could not bind <Customer> element: Balance_LCY: expected a numeric value'
    );
  });
});
