// Tried in this order; the first one that decodes and parses wins.
export const SOURCE_ENCODINGS = ['latin1', 'iso-8859-1', 'cp1252', 'utf-8'] as const;

export type Decoder = (bytes: Uint8Array, encoding: string) => string;

export type FallbackResult<T> =
  | { ok: true; value: T; encoding: string }
  | { ok: false; failures: { encoding: string; reason: string }[] };

/**
 * Strict decode: throws on byte sequences that are invalid in `encoding`.
 */
export const fatalDecoder: Decoder = (bytes, encoding) =>
  new TextDecoder(encoding, { fatal: true }).decode(bytes);

/**
 * Run `attempt` for each encoding in order and stop at the first success.
 */
export async function firstSuccessfulEncoding<T>(
  encodings: readonly string[],
  attempt: (encoding: string) => Promise<T>
): Promise<FallbackResult<T>> {
  const failures: { encoding: string; reason: string }[] = [];
  for (const encoding of encodings) {
    try {
      const value = await attempt(encoding);
      return { ok: true, value, encoding };
    } catch (error) {
      failures.push({ encoding, reason: error instanceof Error ? error.message : String(error) });
    }
  }
  return { ok: false, failures };
}

const DELIMITER_CANDIDATES = [',', ';', '\t', '|'];

/**
 * Pick the delimiter that occurs most often on the first non-empty line,
 * ignoring quoted sections. Falls back to a comma.
 */
export function detectDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/).find(line => line.trim() !== '') ?? '';
  const counts = new Map<string, number>(DELIMITER_CANDIDATES.map(d => [d, 0]));
  let inQuotes = false;
  for (const char of firstLine) {
    if (char === '"') {
      inQuotes = !inQuotes;
      continue;
    }
    const count = counts.get(char);
    if (!inQuotes && count !== undefined) {
      counts.set(char, count + 1);
    }
  }

  let best = ',';
  let bestCount = 0;
  for (const [delimiter, count] of counts) {
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

const BOM_PATTERN = /^(\uFEFF|\u00EF\u00BB\u00BF)/;

export function stripBom(value: string): string {
  return value.replace(BOM_PATTERN, '');
}
