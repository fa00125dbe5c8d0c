import assert from "node:assert/strict";
import { Writable } from "node:stream";
import test from "node:test";

import { StringSink, WritableSink } from "../src/sink.ts";

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { chunks, stream };
}

test("StringSink", () => {
  const sink = new StringSink();
  sink.write("a");
  sink.write("");
  sink.flush();
  sink.write("b");
  assert.deepEqual(sink.buffer, ["a", "b"]);
  assert.equal(sink.toString(), "ab");
});

test("WritableSink writes on flush", async () => {
  const { chunks, stream } = collector();
  const sink = new WritableSink(stream);
  sink.write("a");
  sink.write("b");
  assert.deepEqual(chunks, []);

  sink.flush();
  sink.write("c");
  await sink.close();
  assert.deepEqual(chunks, ["ab", "c"]);
  assert.equal(stream.writableEnded, false);
});

test("WritableSink ends the stream when asked", async () => {
  const { chunks, stream } = collector();
  const sink = new WritableSink(stream, { end: true });
  sink.write("done");
  await sink.close();
  assert.deepEqual(chunks, ["done"]);
  assert.equal(stream.writableFinished, true);
});

test("WritableSink surfaces stream errors", async () => {
  const stream = new Writable({
    write(_chunk, _encoding, callback) {
      callback(new Error("disk full"));
    },
  });
  const sink = new WritableSink(stream, { end: true });
  sink.write("x");
  await assert.rejects(sink.close(), /disk full/);
  assert.throws(() => sink.write("y"), /disk full/);
});

test("WritableSink close waits for a slow stream to drain", async () => {
  const chunks: string[] = [];
  const stream = new Writable({
    highWaterMark: 4,
    write(chunk: Buffer, _encoding, callback) {
      setImmediate(() => {
        chunks.push(chunk.toString());
        callback();
      });
    },
  });
  const sink = new WritableSink(stream);

  sink.write("first chunk");
  sink.flush();
  assert.equal(stream.writableNeedDrain, true);
  sink.write("second");
  sink.flush();

  await sink.close();
  assert.deepEqual(chunks, ["first chunk", "second"]);
  assert.equal(stream.writableNeedDrain, false);
});
