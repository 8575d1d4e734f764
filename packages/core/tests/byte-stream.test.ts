import { describe, expect, it } from "vitest";
import { collect, readText, toByteStream } from "../src/streams/index.js";

describe("byte streams", () => {
  const encoder = new TextEncoder();

  it("collects chunks in order", async () => {
    const bytes = await collect(toByteStream(new Uint8Array([1, 2]), new Uint8Array([3])));
    expect(Array.from(bytes)).toEqual([1, 2, 3]);
  });

  it("collects an empty stream", async () => {
    expect((await collect(toByteStream())).length).toBe(0);
  });

  it("reads UTF-8 text split across chunks", async () => {
    const bytes = encoder.encode("héllo");
    const text = await readText(toByteStream(bytes.subarray(0, 2), bytes.subarray(2)));
    expect(text).toBe("héllo");
  });
});
