/**
 * Recursive character text splitter.
 *
 * Splits on the coarsest separator present in the text (paragraphs, then
 * lines, then words, then characters), recursing into pieces that are still
 * too long, and merges neighbouring pieces back into chunks of at most
 * `chunkSize` characters with up to `chunkOverlap` characters repeated
 * between consecutive chunks.
 */

export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""];

export type SplitOptions = {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
};

function joinPieces(pieces: string[], separator: string): string | null {
  const text = pieces.join(separator).trim();
  return text === "" ? null : text;
}

function mergeSplits(splits: string[], separator: string, chunkSize: number, chunkOverlap: number): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let total = 0;

  for (const piece of splits) {
    const length = piece.length;
    const joinCost = current.length > 0 ? separator.length : 0;

    if (total + length + joinCost > chunkSize && current.length > 0) {
      const chunk = joinPieces(current, separator);
      if (chunk !== null) chunks.push(chunk);

      // Drop pieces from the front until what is left fits as overlap
      while (
        total > chunkOverlap ||
        (total > 0 && total + length + (current.length > 0 ? separator.length : 0) > chunkSize)
      ) {
        const first = current.shift();
        if (first === undefined) break;
        total -= first.length + (current.length > 0 ? separator.length : 0);
      }
    }

    current.push(piece);
    total += length + (current.length > 1 ? separator.length : 0);
  }

  const last = joinPieces(current, separator);
  if (last !== null) chunks.push(last);
  return chunks;
}

function splitRecursive(text: string, separators: string[], chunkSize: number, chunkOverlap: number): string[] {
  let separator = separators[separators.length - 1] ?? "";
  let remaining: string[] = [];
  for (let i = 0; i < separators.length; i++) {
    const candidate = separators[i];
    if (candidate === "") {
      separator = candidate;
      remaining = [];
      break;
    }
    if (text.includes(candidate)) {
      separator = candidate;
      remaining = separators.slice(i + 1);
      break;
    }
  }

  const splits = (separator === "" ? Array.from(text) : text.split(separator)).filter((s) => s !== "");

  const chunks: string[] = [];
  let short: string[] = [];
  for (const piece of splits) {
    if (piece.length < chunkSize) {
      short.push(piece);
      continue;
    }
    if (short.length > 0) {
      chunks.push(...mergeSplits(short, separator, chunkSize, chunkOverlap));
      short = [];
    }
    if (remaining.length === 0) {
      const trimmed = piece.trim();
      if (trimmed) chunks.push(trimmed);
    } else {
      chunks.push(...splitRecursive(piece, remaining, chunkSize, chunkOverlap));
    }
  }
  if (short.length > 0) {
    chunks.push(...mergeSplits(short, separator, chunkSize, chunkOverlap));
  }
  return chunks;
}

export function splitText(text: string, options: SplitOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new Error(`chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap}`);
  }
  if (!text || !text.trim()) return [];
  return splitRecursive(text, options.separators ?? DEFAULT_SEPARATORS, chunkSize, chunkOverlap);
}
