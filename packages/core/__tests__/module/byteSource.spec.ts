/* ------------------------------------------------------------------
   ByteSource - every input shape, and read failures
   ------------------------------------------------------------------ */
import { ByteSource } from '../../src/util/ByteSource.js';
import { MemorySink, WritableStreamSink } from '../../src/util/ByteSink.js';
import { SourceReadError } from '../../src/errors/index.js';

const SAMPLE = new Uint8Array([1, 2, 3, 4, 5]);

function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(ctl) {
      for (const c of chunks) ctl.enqueue(c);
      ctl.close();
    },
  });
}

async function* iterOf(...chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const c of chunks) yield c;
}

describe('ByteSource.readAll', () => {
  it('copies a Uint8Array', async () => {
    const src  = new Uint8Array(SAMPLE);
    const data = await new ByteSource(src).readAll();
    src[0] = 99;
    expect(Array.from(data)).toEqual([1, 2, 3, 4, 5]);
  });

  it('reads a Blob', async () => {
    const data = await new ByteSource(new Blob([SAMPLE])).readAll();
    expect(Array.from(data)).toEqual([1, 2, 3, 4, 5]);
  });

  it('joins the chunks of a ReadableStream', async () => {
    const data = await new ByteSource(streamOf(SAMPLE.slice(0, 2), SAMPLE.slice(2))).readAll();
    expect(Array.from(data)).toEqual([1, 2, 3, 4, 5]);
  });

  it('joins the chunks of an async iterable', async () => {
    const data = await new ByteSource(iterOf(SAMPLE.slice(0, 3), SAMPLE.slice(3))).readAll();
    expect(Array.from(data)).toEqual([1, 2, 3, 4, 5]);
  });

  it('reads an empty stream as zero bytes', async () => {
    const data = await new ByteSource(streamOf()).readAll();
    expect(data.byteLength).toBe(0);
  });

  it('wraps a stream error in SourceReadError', async () => {
    const broken = new ReadableStream<Uint8Array>({
      start(ctl) { ctl.error(new Error('boom')); },
    });
    await expect(new ByteSource(broken).readAll()).rejects.toThrow(SourceReadError);
    await expect(new ByteSource(new ReadableStream<Uint8Array>({
      start(ctl) { ctl.error(new Error('boom')); },
    })).readAll()).rejects.toThrow('Could not read input: boom');
  });

  it('wraps an iterator failure in SourceReadError', async () => {
    async function* failing(): AsyncGenerator<Uint8Array> {
      yield SAMPLE;
      throw new Error('disk gone');
    }
    await expect(new ByteSource(failing()).readAll()).rejects.toThrow('Could not read input: disk gone');
  });
});

describe('sinks', () => {
  it('MemorySink keeps writes in order', async () => {
    const sink = new MemorySink();
    await sink.write(new Uint8Array([1]));
    await sink.write(new Uint8Array([2, 3]));
    expect(sink.length).toBe(3);
    expect(Array.from(sink.bytes())).toEqual([1, 2, 3]);
  });

  it('WritableStreamSink forwards chunks and closes the stream', async () => {
    const seen: number[] = [];
    let closed = false;
    const ws = new WritableStream<Uint8Array>({
      write(chunk) { seen.push(...chunk); },
      close() { closed = true; },
    });

    const sink = new WritableStreamSink(ws);
    await sink.write(new Uint8Array([7, 8]));
    await sink.close();

    expect(seen).toEqual([7, 8]);
    expect(closed).toBe(true);
  });

  it('WritableStreamSink surfaces write failures', async () => {
    const ws = new WritableStream<Uint8Array>({
      write() { throw new Error('no space'); },
    });
    await expect(new WritableStreamSink(ws).write(new Uint8Array([1]))).rejects.toThrow('no space');
  });
});
