/**
 * Byte stream helpers
 */

/**
 * Byte stream type - async iterable yielding Uint8Array chunks.
 *
 * Node readable streams (fs.createReadStream, etc.) satisfy it.
 */
export type ByteStream = AsyncIterable<Uint8Array>;

/**
 * Collect async iterable to Uint8Array
 */
export async function collect(input: ByteStream): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let totalLength = 0;

  for await (const chunk of input) {
    chunks.push(chunk);
    totalLength += chunk.length;
  }

  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }

  return result;
}

/**
 * Create a byte stream from in-memory chunks
 */
export async function* toByteStream(...chunks: Uint8Array[]): ByteStream {
  for (const chunk of chunks) {
    yield chunk;
  }
}

/**
 * Read a whole stream as UTF-8 text
 */
export async function readText(input: ByteStream): Promise<string> {
  return new TextDecoder().decode(await collect(input));
}
