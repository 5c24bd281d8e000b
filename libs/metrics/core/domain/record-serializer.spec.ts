import { MetricsSerializationError } from './errors';
import { FieldObject } from './field-map';
import { formatForDiagnostics, serializeRecord } from './record-serializer';

class Point {
  x = 1;
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('serializeRecord', () => {
  it('should write a single JSON line with dates as ISO strings', () => {
    expect(
      serializeRecord({ a: 1, when: new Date(0), tags: ['x', null] }),
    ).toBe('{"a":1,"when":"1970-01-01T00:00:00.000Z","tags":["x",null]}');
  });

  it('should allow the same object in two places', () => {
    const shared = { x: 1 };
    expect(serializeRecord({ a: shared, b: shared })).toBe(
      '{"a":{"x":1},"b":{"x":1}}',
    );
  });

  it('should accept objects without a prototype', () => {
    const bare: Record<string, number> = Object.create(null);
    bare.x = 1;
    expect(serializeRecord({ bare })).toBe('{"bare":{"x":1}}');
  });

  it.each([
    [{ a: undefined }, 'Cannot serialize $.a: unsupported undefined value'],
    [{ n: NaN }, 'Cannot serialize $.n: non-finite number NaN'],
    [{ n: Infinity }, 'Cannot serialize $.n: non-finite number Infinity'],
    [{ big: 1n }, 'Cannot serialize $.big: unsupported bigint value'],
    [{ list: [1, () => 1] }, 'Cannot serialize $.list[1]: unsupported function value'],
    [{ p: new Point() }, 'Cannot serialize $.p: unsupported Point instance'],
    [{ m: new Map() }, 'Cannot serialize $.m: unsupported Map instance'],
    [{ d: new Date(NaN) }, 'Cannot serialize $.d: invalid date'],
  ])('should reject %p', (record, message) => {
    expect(() => serializeRecord(record)).toThrow(message);
  });

  it('should reject cycles with the path of the repeat', () => {
    const loop: FieldObject = {};
    loop.self = loop;

    const error = thrownBy(() => serializeRecord({ loop }));

    expect(error).toBeInstanceOf(MetricsSerializationError);
    expect(error).toMatchObject({
      code: 'SERIALIZATION_FAILURE',
      path: '$.loop.self',
      reason: 'circular reference',
    });
  });
});

describe('formatForDiagnostics', () => {
  it('should render on one line', () => {
    expect(formatForDiagnostics({ f: 9, name: 'bar', start: 100 })).toBe(
      "{ f: 9, name: 'bar', start: 100 }",
    );
  });
});
