export interface TextChunk {
  id: string;
  index: number;
  text: string;
  start: number;
  end: number;
}

export interface ChunkOptions {
  size: number;
  overlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = { size: 1000, overlap: 200 };

/**
 * Fixed-size character windows with overlap. Whitespace-only windows are
 * skipped; ids stay tied to the window position.
 */
export function chunkText(
  text: string,
  { size, overlap }: ChunkOptions = DEFAULT_CHUNK_OPTIONS
): TextChunk[] {
  if (size <= 0) throw new RangeError(`chunk size must be positive: ${size}`);
  const chunks: TextChunk[] = [];
  let start = 0;
  let index = 0;
  while (start < text.length) {
    const end = Math.min(start + size, text.length);
    const slice = text.substring(start, end);
    if (slice.trim().length > 0) {
      chunks.push({ id: `chunk-${index}`, index, text: slice, start, end });
    }
    if (end === text.length) break;
    // Always make progress, even when overlap >= size
    const next = end - overlap;
    start = next > start ? next : end;
    index++;
  }
  return chunks;
}
