interface ByteReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock(): void;
}

/** Anything with a `getReader()`, such as a fetch response body. */
export interface ByteStream {
  getReader(): ByteReader;
}

export type NdjsonSource = ByteStream | AsyncIterable<Uint8Array | string>;

export class NdjsonParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly text: string
  ) {
    super(message);
    this.name = 'NdjsonParseError';
  }
}

const isByteStream = (source: NdjsonSource): source is ByteStream => 'getReader' in source;

async function* chunksOf(source: NdjsonSource): AsyncGenerator<Uint8Array | string> {
  if (!isByteStream(source)) {
    yield* source;
    return;
  }

  const reader = source.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Yields one parsed value per line as the bytes arrive. Lines may be split
 * across chunks, and so may multi-byte characters. Blank lines are skipped.
 */
export async function* readNdjson<T = unknown>(source: NdjsonSource): AsyncGenerator<T> {
  const decoder = new TextDecoder();
  let buffer = '';
  let lineNumber = 0;

  const parse = (text: string): T => {
    try {
      return JSON.parse(text) as T;
    } catch (err) {
      throw new NdjsonParseError(
        `Invalid NDJSON on line ${lineNumber}: ${err instanceof Error ? err.message : String(err)}`,
        lineNumber,
        text
      );
    }
  };

  for await (const chunk of chunksOf(source)) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      const line = buffer.slice(0, newline).trim();
      buffer = buffer.slice(newline + 1);
      lineNumber += 1;
      if (line) yield parse(line);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  const rest = buffer.trim();
  if (rest) {
    lineNumber += 1;
    yield parse(rest);
  }
}
