import { chunkText } from "../chunker";

describe("chunkText", () => {
  test("windows overlap by the configured amount", () => {
    const text = "a".repeat(10) + "b".repeat(10) + "c".repeat(5);
    const chunks = chunkText(text, { size: 10, overlap: 3 });
    expect(chunks.map(c => [c.start, c.end])).toEqual([
      [0, 10],
      [7, 17],
      [14, 24],
      [21, 25],
    ]);
    expect(chunks[1].text).toBe("aaabbbbbbb");
    expect(chunks.map(c => c.id)).toEqual([
      "chunk-0",
      "chunk-1",
      "chunk-2",
      "chunk-3",
    ]);
  });

  test("empty and whitespace-only text yields no chunks", () => {
    expect(chunkText("")).toEqual([]);
    expect(chunkText("   \n\n  ")).toEqual([]);
  });

  test("defaults to 1000-character windows with 200 overlap", () => {
    const chunks = chunkText("x".repeat(2500));
    expect(chunks.map(c => c.start)).toEqual([0, 800, 1600]);
    expect(chunks[2].end).toBe(2500);
  });

  test("still advances when overlap is not smaller than size", () => {
    const chunks = chunkText("abcdef", { size: 2, overlap: 5 });
    expect(chunks.map(c => c.text)).toEqual(["ab", "cd", "ef"]);
  });
});
