import { test } from 'node:test';
import assert from 'node:assert/strict';

import { NdjsonParseError, readNdjson } from '../src/ndjson.js';

async function* chunks(...parts: Array<string | Uint8Array>) {
  for (const part of parts) yield part;
}

const collect = async <T>(source: AsyncIterable<T>) => {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
};

test('lines split across chunks yield one value each', async () => {
  const values = await collect(readNdjson(chunks('{"a":1}\n{"a"', ':2}\n', '\n{"a":3}')));

  assert.deepEqual(values, [{ a: 1 }, { a: 2 }, { a: 3 }]);
});

test('multi-byte characters split across chunks decode intact', async () => {
  const bytes = new TextEncoder().encode('{"name":"Jötun Grunt"}\n');
  const split = bytes.indexOf(0xc3) + 1;

  const values = await collect(readNdjson(chunks(bytes.slice(0, split), bytes.slice(split))));

  assert.deepEqual(values, [{ name: 'Jötun Grunt' }]);
});

test('readable streams are read through their reader', async () => {
  const body = new Response('{"n":1}\n\n{"n":2}\n').body;
  assert.ok(body);

  assert.deepEqual(await collect(readNdjson(body)), [{ n: 1 }, { n: 2 }]);
});

test('a malformed line reports its line number', async () => {
  await assert.rejects(
    collect(readNdjson(chunks('{"ok":true}\n{"ok":\n'))),
    (err: unknown) => err instanceof NdjsonParseError && err.line === 2 && err.text === '{"ok":'
  );
});
