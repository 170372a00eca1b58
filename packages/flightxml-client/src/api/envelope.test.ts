import { describe, it, expect } from 'vitest';
import { parseBody, remoteErrorOf, unwrapEnvelope } from './envelope';
import { ProtocolError, RemoteError } from '../types/client';

describe('unwrapEnvelope', () => {
  it('unwraps the method result and then its data', () => {
    expect(unwrapEnvelope('Foo', { FooResult: { data: [1, 2, 3] } })).toEqual([1, 2, 3]);
  });

  it('returns a scalar method result as is', () => {
    expect(unwrapEnvelope('Foo', { FooResult: 42 })).toBe(42);
  });

  it('returns the body unchanged when nothing matches', () => {
    const body = { unexpectedKey: 'value' };
    expect(unwrapEnvelope('Foo', body)).toEqual({ unexpectedKey: 'value' });
  });

  it('keeps the other fields out once data is taken', () => {
    expect(
      unwrapEnvelope('Arrived', { ArrivedResult: { next_offset: 15, data: ['UAL1'] } })
    ).toEqual(['UAL1']);
  });

  it('applies the data rule to the body when there is no method result', () => {
    expect(unwrapEnvelope('Foo', { data: { ident: 'UAL1' } })).toEqual({ ident: 'UAL1' });
  });

  it('does not unwrap data inside a list result', () => {
    expect(unwrapEnvelope('Foo', { FooResult: [{ data: 1 }] })).toEqual([{ data: 1 }]);
  });

  it('ignores results belonging to another method', () => {
    expect(unwrapEnvelope('Foo', { BarResult: 1 })).toEqual({ BarResult: 1 });
  });

  it('keeps null results', () => {
    expect(unwrapEnvelope('Foo', { FooResult: null })).toBeNull();
    expect(unwrapEnvelope('Foo', { FooResult: { data: null } })).toBeNull();
  });

  it('unwraps only one level of data', () => {
    expect(unwrapEnvelope('Foo', { FooResult: { data: { data: 7 } } })).toEqual({ data: 7 });
  });
});

describe('parseBody', () => {
  it('parses JSON bodies', () => {
    expect(parseBody('Foo', '{"FooResult":{"data":[1]}}')).toEqual({ FooResult: { data: [1] } });
  });

  it('throws ProtocolError for non-JSON bodies', () => {
    expect(() => parseBody('Foo', '<html>Service Unavailable</html>')).toThrow(ProtocolError);
  });

  it('keeps the raw body on the error', () => {
    try {
      parseBody('Foo', 'oops');
      expect.unreachable('parseBody should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      if (error instanceof ProtocolError) {
        expect(error.method).toBe('Foo');
        expect(error.data).toBe('oops');
      }
    }
  });
});

describe('remoteErrorOf', () => {
  it('recognises error objects', () => {
    const error = remoteErrorOf({ error: 'NO_DATA unknown airport' });

    expect(error).toBeInstanceOf(RemoteError);
    expect(error?.message).toBe('NO_DATA unknown airport');
    expect(error?.code).toBeUndefined();
    expect(error?.data).toEqual({ error: 'NO_DATA unknown airport' });
  });

  it('recognises alert rejection codes', () => {
    expect(remoteErrorOf('OVERLIMIT: too many enabled alerts')?.code).toBe('OVERLIMIT');
    expect(remoteErrorOf({ error: 'FLOODWARN: estimate exceeds max_weekly' })?.code).toBe(
      'FLOODWARN'
    );
  });

  it('returns undefined for ordinary results', () => {
    expect(remoteErrorOf(42)).toBeUndefined();
    expect(remoteErrorOf('KSFO')).toBeUndefined();
    expect(remoteErrorOf({ name: 'San Francisco Intl' })).toBeUndefined();
    expect(remoteErrorOf([{ error: 'inside a list' }])).toBeUndefined();
  });
});
