import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  EntityNotFoundError,
  NetworkError,
  ODataHttpError,
  ParseError,
  SoapFaultError,
  SoapHttpError,
  TimeoutError,
  errorMessage,
  isNavError,
  isProtocolError,
  isTransportError,
} from '../../../src/core/errors.js';

describe('NavError', () => {
  it('keeps the cause and tags context', () => {
    const cause = new Error('refused');
    const error = new NetworkError('HTTP request failed: refused', { cause, context: { url: 'http://nav.test/' } });

    expect(error.name).toBe('NetworkError');
    expect(error.code).toBe('NAV_NETWORK_ERROR');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ url: 'http://nav.test/', subtype: 'network' });
  });

  it('serializes to JSON', () => {
    const error = new ParseError('bad');
    const json = error.toJSON();

    expect(json).toMatchObject({ name: 'ParseError', code: 'NAV_PARSE_ERROR', message: 'bad' });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it('includes context in toString', () => {
    const error = new EntityNotFoundError('Customer', "No eq '1'");

    expect(error.toString()).toBe(
      `[NAV_ENTITY_NOT_FOUND] EntityNotFoundError: No entity found in 'Customer' matching filter: No eq '1' | Context: {"service":"Customer","filter":"No eq '1'"}`
    );
  });

  it('formats HTTP error messages', () => {
    expect(new SoapHttpError(500, undefined, 'raw body').message).toBe('SOAP Error: HTTP 500 - raw body');
    expect(new ODataHttpError(500, '', 'x').message).toBe('OData Error: HTTP 500');
    expect(new SoapFaultError(undefined).message).toBe('SOAP Fault: unknown fault');
  });
});

describe('type guards', () => {
  it('separates transport from protocol errors', () => {
    const transport = [
      new NetworkError('n'),
      new TimeoutError('t', 10),
      new SoapHttpError(500, 'f', 'b'),
      new ODataHttpError(404, 'Not Found', ''),
    ];
    const protocol = [new SoapFaultError('f'), new ParseError('p'), new EntityNotFoundError('Customer', 'x')];

    expect(transport.every(isTransportError)).toBe(true);
    expect(transport.some(isProtocolError)).toBe(false);
    expect(protocol.every(isProtocolError)).toBe(true);
    expect(protocol.some(isTransportError)).toBe(false);
  });

  it('recognizes only library errors as NavError', () => {
    expect(isNavError(new ConfigValidationError('c'))).toBe(true);
    expect(isNavError(new Error('plain'))).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
