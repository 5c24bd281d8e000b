import { Test, TestingModule } from '@nestjs/testing';
import {
  ContextAlreadyActiveError,
  ContextStateError,
  InvalidEventError,
  MetricsSerializationError,
} from '@metrics/domain';
import {
  FakeClock,
  RecordingSink,
  metricsTestingProviders,
  MetricsTestingOptions,
} from '@metrics/testing';
import { NestingPolicy, Severity } from '@metrics/value-objects';
import { MetricsService } from './metrics.service';

describe('MetricsService', () => {
  let metrics: MetricsService;
  let clock: FakeClock;
  let sink: RecordingSink;

  const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

  async function createService(
    options: MetricsTestingOptions = {},
  ): Promise<MetricsService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: metricsTestingProviders({ clock, sink, ...options }),
    }).compile();
    return module.get<MetricsService>(MetricsService);
  }

  beforeEach(async () => {
    clock = new FakeClock(100);
    sink = new RecordingSink();
    metrics = await createService();
  });

  it('should be defined', () => {
    expect(metrics).toBeDefined();
  });

  describe('runInContext', () => {
    it('should emit fields, timed and instant events in one record', () => {
      metrics.runInContext({ a: 5 }, (fields) => {
        fields.b = 6;
        clock.advance(1);
        metrics.timer('foo', { d: 7 }, (timerFields) => {
          timerFields.e = 8;
          clock.advance(2);
        });
        clock.advance(0.5);
        metrics.recordEvent('bar', { f: 9 });
        clock.advance(0.25);
      });

      expect(sink.records()).toEqual([
        {
          a: 5,
          b: 6,
          start: 100,
          duration: 3.75,
          events: [
            { d: 7, e: 8, name: 'foo', start: 101, duration: 2 },
            { f: 9, name: 'bar', start: 103.5 },
          ],
        },
      ]);
      expect(sink.entries.map((entry) => entry.severity)).toEqual([
        Severity.DEBUG,
        Severity.INFO,
        Severity.DEBUG,
      ]);
      expect(sink.messages(Severity.DEBUG)).toEqual([
        'thread-1: entering new context, replacing null',
        'thread-1: leaving context',
      ]);
    });

    it('should emit a record with no events', () => {
      const result = metrics.runInContext({ job: 'noop' }, () => {
        clock.advance(1);
        return 'done';
      });

      expect(result).toBe('done');
      expect(sink.records()).toEqual([
        { job: 'noop', events: [], start: 100, duration: 1 },
      ]);
    });

    it('should emit a record and rethrow when the body throws', () => {
      expect(() =>
        metrics.runInContext({}, () => {
          metrics.recordEvent('before_failure');
          throw new Error('body failed');
        }),
      ).toThrow('body failed');

      expect(sink.records()).toEqual([
        {
          events: [{ name: 'before_failure', start: 100 }],
          start: 100,
          duration: 0,
        },
      ]);
      expect(metrics.currentFields()).toBeUndefined();
    });

    it('should cover an async body until it settles', async () => {
      const result = await metrics.runInContext({ job: 'async' }, async () => {
        await tick();
        clock.advance(2);
        metrics.recordEvent('after_await');
        return 7;
      });

      expect(result).toBe(7);
      expect(sink.records()).toEqual([
        {
          job: 'async',
          events: [{ name: 'after_await', start: 102 }],
          start: 100,
          duration: 2,
        },
      ]);
    });

    it('should emit a record when an async body rejects', async () => {
      await expect(
        metrics.runInContext({}, async () => {
          await tick();
          throw new Error('async failure');
        }),
      ).rejects.toThrow('async failure');

      expect(sink.records()).toHaveLength(1);
    });

    it('should keep concurrent units of work apart', async () => {
      await Promise.all([
        metrics.runInContext({ req: 'a' }, async () => {
          await tick();
          metrics.recordEvent('a1');
          await tick();
          metrics.recordEvent('a2');
        }),
        metrics.runInContext({ req: 'b' }, async () => {
          await tick();
          metrics.recordEvent('b1');
        }),
      ]);

      const records = sink.records();
      expect(records).toHaveLength(2);
      expect(
        records
          .find((record) => record.req === 'a')
          ?.events.map((event) => event.name),
      ).toEqual(['a1', 'a2']);
      expect(
        records
          .find((record) => record.req === 'b')
          ?.events.map((event) => event.name),
      ).toEqual(['b1']);
    });

    it('should round-trip field values through the emitted JSON', () => {
      const fields = {
        s: 'text',
        n: 1.5,
        b: false,
        z: null,
        list: [1, 'two', [3]],
        nested: { k: { deep: 'v' } },
      };

      metrics.runInContext({ ...fields, when: new Date(Date.UTC(2024, 0, 2)) }, () => undefined);

      expect(sink.records()[0]).toEqual({
        ...fields,
        when: '2024-01-02T00:00:00.000Z',
        events: [],
        start: 100,
        duration: 0,
      });
    });
  });

  describe('timer', () => {
    it('should record the event when the body throws', () => {
      metrics.runInContext({}, () => {
        expect(() =>
          metrics.timer('step', {}, () => {
            clock.advance(1);
            throw new Error('boom');
          }),
        ).toThrow('boom');
      });

      expect(sink.records()[0].events).toEqual([
        { name: 'step', start: 100, duration: 1 },
      ]);
    });

    it('should record the event when an async body rejects', async () => {
      await metrics.runInContext({}, async () => {
        await expect(
          metrics.timer('step', {}, async () => {
            await tick();
            clock.advance(2);
            throw new Error('boom');
          }),
        ).rejects.toThrow('boom');
      });

      expect(sink.records()[0].events).toEqual([
        { name: 'step', start: 100, duration: 2 },
      ]);
    });

    it('should warn instead of throwing outside a context', () => {
      const result = metrics.timer('foo', {}, () => 'value');

      expect(result).toBe('value');
      expect(sink.entries).toEqual([
        {
          severity: Severity.WARNING,
          message:
            "thread-1: no context to record event: { name: 'foo', start: 100, duration: 0 }",
        },
      ]);
    });
  });

  describe('startTimer', () => {
    it('should record on the context active when it stops', () => {
      metrics.runInContext({}, () => {
        const timer = metrics.startTimer('manual', { step: 1 });
        clock.advance(1);
        timer.stop();
      });

      expect(sink.records()[0].events).toEqual([
        { step: 1, name: 'manual', start: 100, duration: 1 },
      ]);
    });

    it('should reject an empty name', () => {
      expect(() => metrics.startTimer('')).toThrow(InvalidEventError);
    });
  });

  describe('recordEvent', () => {
    it('should warn and count the drop outside a context', () => {
      const event = metrics.recordEvent('bar', { f: 9 });

      expect(event).toEqual({ f: 9, name: 'bar', start: 100 });
      expect(sink.entries).toEqual([
        {
          severity: Severity.WARNING,
          message:
            "thread-1: no context to record event: { f: 9, name: 'bar', start: 100 }",
        },
      ]);
      expect(metrics.getStats().droppedEvents).toBe(1);
    });

    it('should not let the returned event change the recorded one', () => {
      metrics.runInContext({}, () => {
        const event = metrics.recordEvent('bar', { f: 9 });
        event.name = '';
        event.start = 1;
        event.duration = -5;
      });

      expect(sink.records()[0].events).toEqual([
        { f: 9, name: 'bar', start: 100 },
      ]);
    });

    it('should reject an empty name even with a context', () => {
      metrics.runInContext({}, () => {
        expect(() => metrics.recordEvent('')).toThrow(InvalidEventError);
      });
      expect(sink.records()[0].events).toEqual([]);
    });
  });

  describe('explicit scope', () => {
    it('should open, bind and close a context in separate steps', () => {
      const context = metrics.openContext({ route: '/x' });
      metrics.bindContext(context, () => metrics.recordEvent('bound'));
      clock.advance(1);

      const record = metrics.closeContext(context);

      expect(record).toEqual({
        route: '/x',
        events: [{ name: 'bound', start: 100 }],
        start: 100,
        duration: 1,
      });
      expect(sink.records()).toEqual([record]);
      expect(() => metrics.closeContext(context)).toThrow(ContextStateError);
    });
  });

  describe('serialization failures', () => {
    it('should throw when the scope itself succeeded', () => {
      expect(() =>
        metrics.runInContext({}, (fields) => {
          fields.ratio = NaN;
        }),
      ).toThrow(MetricsSerializationError);

      expect(sink.records()).toEqual([]);
      expect(sink.messages(Severity.DEBUG)).toContain(
        'thread-1: leaving context',
      );
      expect(metrics.currentFields()).toBeUndefined();
    });

    it('should keep the body error and warn when the scope failed', () => {
      expect(() =>
        metrics.runInContext({}, (fields) => {
          fields.ratio = NaN;
          throw new Error('body failed');
        }),
      ).toThrow('body failed');

      expect(sink.messages(Severity.WARNING)).toEqual([
        'thread-1: context record dropped after failed scope: Cannot serialize $.ratio: non-finite number NaN',
      ]);
    });
  });

  describe('strict nesting', () => {
    it('should leave the outer context intact after a refused inner one', () => {
      metrics.runInContext({ outer: true }, () => {
        metrics.recordEvent('before');
        expect(() =>
          metrics.runInContext({ inner: true }, () => undefined),
        ).toThrow(ContextAlreadyActiveError);
        metrics.recordEvent('after');
      });

      expect(sink.records()).toEqual([
        {
          outer: true,
          events: [
            { name: 'before', start: 100 },
            { name: 'after', start: 100 },
          ],
          start: 100,
          duration: 0,
        },
      ]);
      expect(sink.entries).toHaveLength(3);
    });
  });

  describe('permissive nesting', () => {
    beforeEach(async () => {
      metrics = await createService({ nestingPolicy: NestingPolicy.PERMISSIVE });
    });

    it('should emit the inner record first and resume the outer one', () => {
      metrics.runInContext({ level: 'outer' }, () => {
        metrics.recordEvent('o1');
        metrics.runInContext({ level: 'inner' }, () => {
          metrics.recordEvent('i1');
        });
        metrics.recordEvent('o2');
      });

      expect(sink.records()).toEqual([
        {
          level: 'inner',
          events: [{ name: 'i1', start: 100 }],
          start: 100,
          duration: 0,
        },
        {
          level: 'outer',
          events: [
            { name: 'o1', start: 100 },
            { name: 'o2', start: 100 },
          ],
          start: 100,
          duration: 0,
        },
      ]);
      expect(sink.messages(Severity.DEBUG)).toEqual([
        'thread-1: entering new context, replacing null',
        "thread-1: entering new context, replacing { level: 'outer' }",
        'thread-1: leaving context',
        'thread-1: leaving context',
      ]);
    });
  });

  describe('getStats', () => {
    it('should count emitted contexts and dropped events', () => {
      metrics.runInContext({}, () => undefined);
      metrics.recordEvent('orphan');

      expect(metrics.getStats()).toEqual({
        emittedContexts: 1,
        droppedEvents: 1,
        nestingPolicy: NestingPolicy.STRICT,
      });
    });
  });

  describe('with scope tracing off', () => {
    it('should emit only the record', async () => {
      metrics = await createService({ traceScopes: false });

      metrics.runInContext({}, () => undefined);

      expect(sink.entries.map((entry) => entry.severity)).toEqual([
        Severity.INFO,
      ]);
    });
  });
});
