import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BufferingInfluxHandler, MAX_FLUSH_INTERVAL } from '../core/BufferingInfluxHandler.ts';
import { DeliveryError } from '../core/errors.ts';
import type { BufferingOptions } from '../core/BufferingInfluxHandler.ts';
import { MemoryWriter, deferred, makeDeps, makeRecord, settle } from './helpers.ts';

function makeHandler(
  writer: MemoryWriter,
  options: Partial<BufferingOptions> = {},
  deps: { lazyInit?: boolean; backpop?: boolean } = {}
) {
  const { deps: handlerDeps, errors } = makeDeps(writer, deps);
  const handler = new BufferingInfluxHandler(handlerDeps, {
    capacity: options.capacity ?? 4,
    flushInterval: options.flushInterval ?? 5,
  });
  return { handler, errors };
}

/** Single-segment logger name: one point per record. */
const appRecord = (message = 'hello') => makeRecord({ name: 'app', message });

describe('BufferingInfluxHandler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('flushes exactly capacity points once capacity is reached', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { capacity: 4 });

    for (let i = 0; i < 4; i++) handler.emit(appRecord(`m${i}`));
    expect(handler.size).toBe(0);

    await settle();
    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0]!.map((p) => p.fields.short_message)).toEqual(['m0', 'm1', 'm2', 'm3']);
    expect(handler.stats().flushes).toBe(1);
  });

  it('flushes capacity - 1 points once the interval elapses', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { capacity: 4, flushInterval: 5 });

    for (let i = 0; i < 3; i++) handler.emit(appRecord());
    await vi.advanceTimersByTimeAsync(4_999);
    expect(handler.size).toBe(3);
    expect(writer.writes).toBe(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(handler.size).toBe(0);
    await settle();
    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0]).toHaveLength(3);
  });

  it('does not write when the timer fires on an empty buffer', async () => {
    const writer = new MemoryWriter();
    makeHandler(writer, { flushInterval: 5 });
    await vi.advanceTimersByTimeAsync(15_000);
    expect(writer.writes).toBe(0);
  });

  it('holds a single timer at the longest interval', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { flushInterval: MAX_FLUSH_INTERVAL });
    await vi.advanceTimersByTimeAsync(100);
    expect(vi.getTimerCount()).toBe(1);
    expect(handler.timerActive).toBe(true);
    await handler.close();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects an interval a timer cannot hold', () => {
    const writer = new MemoryWriter();
    expect(() => makeHandler(writer, { flushInterval: 3_000_000 })).toThrow(RangeError);
    expect(() => makeHandler(writer, { flushInterval: 0 })).toThrow(RangeError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('re-arms the timer after a capacity flush', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { capacity: 2, flushInterval: 5 });

    await vi.advanceTimersByTimeAsync(3_000);
    handler.emit(appRecord());
    handler.emit(appRecord());
    handler.emit(appRecord('late'));
    expect(handler.size).toBe(1);

    await vi.advanceTimersByTimeAsync(2_000); // original deadline
    expect(handler.size).toBe(1);

    await vi.advanceTimersByTimeAsync(3_000); // 5s after the capacity flush
    expect(handler.size).toBe(0);
    await settle();
    expect(writer.batches.map((b) => b.length)).toEqual([2, 1]);
  });

  it('counts backpop points against capacity', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { capacity: 3 });

    handler.emit(makeRecord({ name: 'a.b.c' }));
    await settle();

    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0]!.map((p) => p.measurement)).toEqual(['a:b:c', 'a:b', 'a']);
  });

  it('drops a failed batch without re-delivering it', async () => {
    const writer = new MemoryWriter();
    writer.failWrites = 1;
    const { handler, errors } = makeHandler(writer, { capacity: 2 });

    handler.emit(appRecord('lost-1'));
    handler.emit(appRecord('lost-2'));
    await settle();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(DeliveryError);
    expect(handler.stats().droppedPoints).toBe(2);

    handler.emit(appRecord('kept-1'));
    handler.emit(appRecord('kept-2'));
    await settle();
    expect(writer.batches).toHaveLength(1);
    expect(writer.batches[0]!.map((p) => p.fields.short_message)).toEqual(['kept-1', 'kept-2']);
  });

  it('keeps accepting records while a flush is in flight', async () => {
    const writer = new MemoryWriter();
    const gate = deferred();
    writer.gate = gate.promise;
    const { handler } = makeHandler(writer, { capacity: 2 });

    expect(handler.state).toBe('idle');
    handler.emit(appRecord('first'));
    expect(handler.state).toBe('accumulating');
    handler.emit(appRecord('second'));
    expect(handler.state).toBe('flushing');

    handler.emit(appRecord('third'));
    expect(handler.size).toBe(1);

    gate.resolve();
    await settle();
    expect(writer.batches[0]!.map((p) => p.fields.short_message)).toEqual(['first', 'second']);
    expect(handler.size).toBe(1);
    expect(handler.state).toBe('accumulating');
  });

  it('flushes the remainder and stops the timer on close', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { capacity: 10 });

    for (let i = 0; i < 3; i++) handler.emit(appRecord());
    await handler.close();

    expect(writer.batches.map((b) => b.length)).toEqual([3]);
    expect(handler.size).toBe(0);
    expect(handler.state).toBe('closed');
    expect(handler.timerActive).toBe(false);
    expect(vi.getTimerCount()).toBe(0);

    handler.emit(appRecord());
    expect(handler.size).toBe(0);
    await vi.advanceTimersByTimeAsync(20_000);
    expect(writer.writes).toBe(1);
  });

  it('waits for an in-flight flush before close resolves', async () => {
    const writer = new MemoryWriter();
    const gate = deferred();
    writer.gate = gate.promise;
    const { handler } = makeHandler(writer, { capacity: 2 });

    handler.emit(appRecord());
    handler.emit(appRecord());

    let closed = false;
    const closing = handler.close().then(() => {
      closed = true;
    });
    await settle();
    expect(closed).toBe(false);

    gate.resolve();
    await closing;
    expect(writer.batches).toHaveLength(1);
  });

  it('connects on the first flush with lazyInit', async () => {
    const writer = new MemoryWriter();
    const { handler } = makeHandler(writer, { capacity: 1 }, { lazyInit: true });
    expect(writer.connects).toBe(0);

    handler.emit(appRecord());
    await settle();
    expect(writer.connects).toBe(1);
    expect(writer.batches).toHaveLength(1);
  });
});
