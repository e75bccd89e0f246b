/**
 * Chunking Service
 * Splits lesson transcripts into overlapping, sentence-aligned chunks
 */

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

function splitSentences(text: string): string[] {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .split(/(?<=[.!?])\s+(?=[A-Z0-9"'(])/)
    .map(s => s.trim())
    .filter(Boolean);
}

function splitOversizedText(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) {
    return [text];
  }

  const parts: string[] = [];
  let remaining = text;

  while (remaining.length > maxChars) {
    let splitAt = remaining.lastIndexOf(' ', maxChars);
    if (splitAt <= 0) {
      splitAt = maxChars;
    }
    parts.push(remaining.slice(0, splitAt).trim());
    remaining = remaining.slice(splitAt).trim();
  }

  if (remaining.length > 0) {
    parts.push(remaining);
  }

  return parts.filter(Boolean);
}

/**
 * Groups sentences into chunks of at most `chunkSize` characters. Each chunk after
 * the first starts with trailing sentences of its predecessor, up to `chunkOverlap`
 * characters. A single sentence longer than `chunkSize` is split on word boundaries.
 */
export function chunkText(text: string, { chunkSize, chunkOverlap }: ChunkOptions): string[] {
  const maxChars = Math.max(1, chunkSize);
  const sentences = splitSentences(text).flatMap(s => splitOversizedText(s, maxChars));
  const chunks: string[] = [];

  let start = 0;
  while (start < sentences.length) {
    let size = 0;
    let end = start;

    while (end < sentences.length) {
      const addition = sentences[end].length + (end > start ? 1 : 0);
      if (size + addition > maxChars && end > start) break;
      size += addition;
      end++;
    }

    chunks.push(sentences.slice(start, end).join(' '));
    if (end >= sentences.length) break;

    // Walk back over the tail of this chunk to seed the next one
    let overlapSize = 0;
    let next = end;
    while (next > start + 1) {
      const candidate = sentences[next - 1].length + (overlapSize > 0 ? 1 : 0);
      if (overlapSize + candidate > chunkOverlap) break;
      overlapSize += candidate;
      next--;
    }
    start = next;
  }

  return chunks;
}
