import { bench, group, run } from 'mitata';
import { classify, compileClassification } from './src/transform/classify.ts';
import { pointFromClassified } from './src/transform/buildPoint.ts';
import { toInfluxPoint } from './src/core/InfluxWriter.ts';
import { Pipeline } from './src/core/Pipeline.ts';
import { fromPinoLog } from './src/adapters/pino.ts';
import { createLogRecord } from './src/types/record.ts';
import type { LogRecord } from './src/types/record.ts';
import type { Point } from './src/types/point.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeRecord(i: number, extras: number): LogRecord {
  const attributes: Record<string, unknown> = { request_id: `req-${i}`, tenant: 'acme' };
  for (let e = 0; e < extras; e++) attributes[`extra_${e}`] = e % 2 === 0 ? e : `value ${e}`;
  return createLogRecord({
    name: 'bench.http.router',
    level: 'INFO',
    message: `handled request ${i}`,
    attributes,
    time: 1_700_000_000_000 + i,
    context: { pid: 4242, hostname: 'bench-host' },
  });
}

const smallRecord = makeRecord(0, 0);
const wideRecord = makeRecord(1, 30);
const failingRecord = createLogRecord({
  name: 'bench.http.router',
  level: 'ERROR',
  message: 'request failed',
  error: new Error('boom'),
  time: 1_700_000_000_000,
});

const plain = compileClassification();
const tagged = compileClassification({ includeTags: ['tenant'], excludeFields: ['extra_0'] });

const medPoints: Point[] = Array.from({ length: 64 }, (_, i) =>
  pointFromClassified(classify(makeRecord(i, 5), plain))
);
const largePoints: Point[] = Array.from({ length: 1024 }, (_, i) =>
  pointFromClassified(classify(makeRecord(i, 5), plain))
);

function encode(points: readonly Point[]): string {
  return points.map((p) => toInfluxPoint(p).toLineProtocol() ?? '').join('\n');
}

const pinoLine = {
  level: 30,
  time: 1_700_000_000_000,
  pid: 4242,
  hostname: 'bench-host',
  name: 'bench.http',
  msg: 'ok',
  route: '/health',
  tenant: 'acme',
};

const backpopPipeline = new Pipeline(plain, true, () => undefined);

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('classify', () => {
  bench('no extras', () => classify(smallRecord, plain));
  bench('30 extras', () => classify(wideRecord, plain));
  bench('30 extras, include/exclude lists', () => classify(wideRecord, tagged));
  bench('with stack trace', () => classify(failingRecord, plain));
});

group('pipeline (classify + build + backpop)', () => {
  bench('3-level logger name', () => backpopPipeline.process(wideRecord));
});

group('line protocol encode', () => {
  bench('64 points', () => encode(medPoints));
  bench('1024 points', () => encode(largePoints));
});

group('pino adapter', () => {
  bench('fromPinoLog', () => fromPinoLog(pinoLine));
});

await run({ format: 'mitata', colors: true });
