import { PreconditionError, TRUNCATED } from '@querylog/shared';
import {
  ErrorEvent,
  FormatLimits,
  RequestLogFormatter,
  SimpleStatement,
  renderValue,
  summarizeError,
} from '../../src';
import {
  MS,
  boundInsert,
  errorEvent,
  simpleSelect,
  successEvent,
  unloggedBatch,
} from '../fixtures/mockRequests';

function limits(overrides: Partial<FormatLimits> = {}): FormatLimits {
  return {
    maxQueryLength: 500,
    showValues: false,
    maxValues: 0,
    maxValueLength: 0,
    showStackTraces: false,
    ...overrides,
  };
}

describe('RequestLogFormatter', () => {
  let formatter: RequestLogFormatter;

  beforeEach(() => {
    formatter = new RequestLogFormatter();
  });

  describe('format', () => {
    it('should format a successful request', () => {
      const record = formatter.format(successEvent(50 * MS), 'success', limits(), 's0');

      expect(record).toEqual({
        text: '[s0|10.0.0.1:9042] [Success] (50 ms) SELECT * FROM ks.users WHERE id = ?',
        severity: 'INFO',
      });
    });

    it('should format a slow request', () => {
      const record = formatter.format(successEvent(150 * MS), 'slow', limits(), 's0');

      expect(record.text).toBe('[s0|10.0.0.1:9042] [Slow] (150 ms) SELECT * FROM ks.users WHERE id = ?');
      expect(record.severity).toBe('INFO');
      expect(record.error).toBeUndefined();
    });

    it('should embed the error summary when stack traces are off', () => {
      const record = formatter.format(errorEvent(), 'error', limits(), 's0');

      expect(record.text).toBe(
        '[s0|10.0.0.1:9042] [Error] (12 ms) SELECT * FROM ks.users WHERE id = ? [Error: Read timeout]'
      );
      expect(record.severity).toBe('ERROR');
      expect(record.error).toBeUndefined();
    });

    it('should attach the error instead of embedding it when stack traces are on', () => {
      const event = errorEvent();
      const record = formatter.format(event, 'error', limits({ showStackTraces: true }), 's0');

      expect(record.text).toBe('[s0|10.0.0.1:9042] [Error] (12 ms) SELECT * FROM ks.users WHERE id = ?');
      expect(record.text).not.toContain('Read timeout');
      expect(record.severity).toBe('ERROR');
      expect(record.error).toBe(event.error);
    });

    it('should render a missing node', () => {
      const event: ErrorEvent = {
        kind: 'error',
        request: simpleSelect,
        latencyNanos: 800,
        error: new Error('No node was available'),
      };

      expect(formatter.format(event, 'error', limits(), 'session1').text).toBe(
        '[session1|N/A] [Error] (800 ns) SELECT * FROM ks.users WHERE id = ? [Error: No node was available]'
      );
    });

    it('should keep the error summary on one line', () => {
      const record = formatter.format(
        errorEvent(new Error('first line\nsecond line')),
        'error',
        limits(),
        's0'
      );

      expect(record.text).toBe(
        '[s0|10.0.0.1:9042] [Error] (12 ms) SELECT * FROM ks.users WHERE id = ? ' +
          '[Error: first line second line]'
      );
    });

    it('should omit the query when maxQueryLength is 0', () => {
      const record = formatter.format(
        successEvent(50 * MS),
        'success',
        limits({ maxQueryLength: 0 }),
        's0'
      );

      expect(record.text).toBe('[s0|10.0.0.1:9042] [Success] (50 ms)');
    });

    it('should include values after the query', () => {
      const record = formatter.format(
        successEvent(2 * MS, boundInsert),
        'success',
        limits({ showValues: true, maxValues: 10, maxValueLength: 50 }),
        's0'
      );

      expect(record.text).toBe(
        '[s0|10.0.0.1:9042] [Success] (2 ms) [3 values] ' +
          'INSERT INTO ks.users (id, name, email) VALUES (?, ?, ?) ' +
          "[id=7, name='alice', email='alice@example.com']"
      );
    });

    it('should reject negative limits', () => {
      expect(() =>
        formatter.format(successEvent(MS), 'success', limits({ maxQueryLength: -1 }), 's0')
      ).toThrow(PreconditionError);
      expect(() =>
        formatter.format(successEvent(MS), 'success', limits({ maxValues: -1 }), 's0')
      ).toThrow('maxValues must be non-negative, got -1');
      expect(() =>
        formatter.format(successEvent(MS), 'success', limits({ maxValueLength: -3 }), 's0')
      ).toThrow(PreconditionError);
    });
  });

  describe('describeRequest', () => {
    const INSERT = 'INSERT INTO ks.users (id, name, email) VALUES (?, ?, ?)';
    const BATCH =
      'BEGIN UNLOGGED BATCH UPDATE ks.t SET v = ? WHERE k = ?; DELETE FROM ks.t WHERE k = ?; APPLY BATCH';

    function showing(maxValues: number, maxValueLength: number): FormatLimits {
      return limits({ showValues: true, maxValues, maxValueLength });
    }

    it('should return a query shorter than the limit unchanged', () => {
      const description = formatter.describeRequest(simpleSelect, limits());

      expect(description).toBe('SELECT * FROM ks.users WHERE id = ?');
    });

    it('should cut a long query to the limit and append the marker', () => {
      const longQuery: SimpleStatement = { kind: 'simple', query: 'q'.repeat(600) };
      const description = formatter.describeRequest(longQuery, limits({ maxQueryLength: 500 }));

      expect(description).toBe('q'.repeat(500) + TRUNCATED);
      expect(description.slice(0, 500)).toBe(longQuery.query.slice(0, 500));
    });

    it('should show full text with an unbounded limit', () => {
      const longQuery: SimpleStatement = { kind: 'simple', query: 'q'.repeat(600) };
      const description = formatter.describeRequest(longQuery, limits({ maxQueryLength: Infinity }));

      expect(description).toBe(longQuery.query);
    });

    it('should hide values when maxValues is 0 even if showValues is on', () => {
      const description = formatter.describeRequest(boundInsert, showing(0, 50));

      expect(description).toBe(INSERT);
    });

    it('should hide values when showValues is off', () => {
      const description = formatter.describeRequest(
        boundInsert,
        limits({ showValues: false, maxValues: 10, maxValueLength: 50 })
      );

      expect(description).toBe(INSERT);
    });

    it('should mark values beyond maxValues', () => {
      const description = formatter.describeRequest(boundInsert, showing(2, 50));

      expect(description).toBe(
        `[3 values] ${INSERT} [id=7, name='alice', ...<further values truncated>]`
      );
    });

    it('should truncate each value individually', () => {
      const description = formatter.describeRequest(boundInsert, showing(3, 3));

      expect(description).toBe(
        `[3 values] ${INSERT} [id=7, name='ali'...<truncated>, email='ali'...<truncated>]`
      );
    });

    it('should name positional values of a simple statement', () => {
      const description = formatter.describeRequest(simpleSelect, showing(5, 10));

      expect(description).toBe('[1 values] SELECT * FROM ks.users WHERE id = ? [v0=42]');
    });

    it('should show named values of a simple statement', () => {
      const named: SimpleStatement = {
        kind: 'simple',
        query: 'SELECT * FROM ks.users WHERE id = :id',
        namedValues: { id: 9 },
      };

      expect(formatter.describeRequest(named, showing(5, 10))).toBe(
        '[1 values] SELECT * FROM ks.users WHERE id = :id [id=9]'
      );
    });

    it('should omit the value count for requests without values', () => {
      const noValues: SimpleStatement = { kind: 'simple', query: 'SELECT now() FROM system.local' };

      expect(formatter.describeRequest(noValues, showing(5, 10))).toBe(
        'SELECT now() FROM system.local'
      );
    });

    it('should describe a batch', () => {
      expect(formatter.describeRequest(unloggedBatch, limits())).toBe(`[2 statements] ${BATCH}`);
    });

    it('should describe batch values across statements', () => {
      const description = formatter.describeRequest(unloggedBatch, showing(10, 10));

      expect(description).toBe(`[2 statements, 3 values] ${BATCH} [v0=1, v1='a', v2='b']`);
    });

    it('should cut a long batch at the limit like any other query', () => {
      const statements: SimpleStatement[] = Array.from({ length: 1000 }, (_, index) => ({
        kind: 'simple',
        query: `INSERT INTO ks.t (k) VALUES (${index})`,
      }));
      const description = formatter.describeRequest(
        { kind: 'batch', batchType: 'LOGGED', statements },
        limits({ maxQueryLength: 40 })
      );

      expect(description).toBe(
        '[1000 statements] BEGIN BATCH INSERT INTO ks.t (k) VALUES ' + TRUNCATED
      );
    });

    it('should keep statistics and values when the query is omitted', () => {
      const description = formatter.describeRequest(
        simpleSelect,
        limits({ maxQueryLength: 0, showValues: true, maxValues: 1, maxValueLength: 5 })
      );

      expect(description).toBe('[1 values] [v0=42]');
    });
  });
});

describe('renderValue', () => {
  it('should render null and undefined as NULL', () => {
    expect(renderValue(null, 10)).toBe('NULL');
    expect(renderValue(undefined, 10)).toBe('NULL');
  });

  it('should quote strings and double embedded quotes', () => {
    expect(renderValue("it's", 10)).toBe("'it''s'");
  });

  it('should truncate the raw string before quoting', () => {
    expect(renderValue('abcdef', 3)).toBe("'abc'...<truncated>");
    expect(renderValue("o'clock", 2)).toBe("'o'''...<truncated>");
  });

  it('should render scalars', () => {
    expect(renderValue(12345, 10)).toBe('12345');
    expect(renderValue(12345, 3)).toBe('123...<truncated>');
    expect(renderValue(10n, 10)).toBe('10');
    expect(renderValue(true, 10)).toBe('true');
  });

  it('should render dates as ISO-8601', () => {
    expect(renderValue(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)), 100)).toBe('2024-01-02T03:04:05.000Z');
    expect(renderValue(new Date(NaN), 100)).toBe('Invalid Date');
  });

  it('should render bytes as hex', () => {
    expect(renderValue(new Uint8Array([0xca, 0xfe]), 10)).toBe('0xcafe');
    expect(renderValue(Buffer.from([1, 2]), 10)).toBe('0x0102');
  });

  it('should render collections as JSON', () => {
    expect(renderValue([1, 'a'], 50)).toBe('[1,"a"]');
    expect(renderValue({ count: 1n }, 50)).toBe('{"count":"1"}');
  });

  it('should render maps as entry lists and sets as arrays', () => {
    expect(renderValue(new Map([['k', 1]]), 50)).toBe('[["k",1]]');
    expect(renderValue(new Map([[2, 'two']]), 50)).toBe('[[2,"two"]]');
    expect(renderValue(new Set([1, 2]), 50)).toBe('[1,2]');
    expect(renderValue({ tags: new Set(['a']) }, 50)).toBe('{"tags":["a"]}');
  });

  it('should fall back when JSON has no text for the value', () => {
    expect(renderValue({ toJSON: () => undefined }, 50)).toBe('[object Object]');
  });

  it('should fall back for circular structures without a prototype', () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare.self = bare;

    expect(renderValue(bare, 50)).toBe('[object Object]');
  });

  it('should only hex-encode the bytes needed for the limit', () => {
    const blob = new Uint8Array(1_000_000).fill(0xab);

    expect(renderValue(blob, 6)).toBe('0xabab...<truncated>');
    expect(renderValue(new Uint8Array([1, 2, 3]), 6)).toBe('0x0102...<truncated>');
    expect(renderValue(new Uint8Array([1, 2]), 6)).toBe('0x0102');
  });

  it('should fall back for circular structures', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(renderValue(circular, 50)).toBe('[object Object]');
  });
});

describe('summarizeError', () => {
  it('should use the error name and message', () => {
    expect(summarizeError(new TypeError('bad value'))).toBe('TypeError: bad value');
  });

  it('should fold line breaks', () => {
    expect(summarizeError(new Error('a\r\n  b\nc'))).toBe('Error: a b c');
  });
});
