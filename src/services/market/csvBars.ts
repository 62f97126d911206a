import { promises as fs } from 'fs';
import { Bar } from '../../types/trading';
import { InvalidOrderError } from '../../utils/errors';

const REQUIRED_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

function parseTimestamp(raw: string, line: number): Date {
  const trimmed = raw.trim();
  const numeric = Number(trimmed);
  // Epoch seconds or milliseconds, otherwise an ISO date
  const date = Number.isFinite(numeric)
    ? new Date(numeric < 1e12 ? numeric * 1000 : numeric)
    : new Date(trimmed);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidOrderError(`Invalid timestamp "${raw}" on line ${line}`);
  }
  return date;
}

function parseNumber(raw: string, column: string, line: number): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidOrderError(`Invalid ${column} "${raw}" on line ${line}`);
  }
  return value;
}

/**
 * Parses OHLCV rows with a header line. Column order is taken from the header;
 * `time`, `date` and `open_time` are accepted for the timestamp column.
 * The result is sorted by timestamp.
 */
export function parseBarsCsv(content: string): Bar[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length === 0) return [];

  const header = lines[0].split(',').map((h) => h.trim().toLowerCase());
  const aliases: Record<string, string> = { time: 'timestamp', date: 'timestamp', open_time: 'timestamp' };
  const columns = header.map((h) => aliases[h] ?? h);

  const index: Record<string, number> = {};
  for (const column of REQUIRED_COLUMNS) {
    const position = columns.indexOf(column);
    if (position === -1) {
      throw new InvalidOrderError(`CSV is missing the ${column} column`);
    }
    index[column] = position;
  }

  const bars = lines.slice(1).map((line, i) => {
    const cells = line.split(',');
    const lineNumber = i + 2;
    return {
      timestamp: parseTimestamp(cells[index.timestamp] ?? '', lineNumber),
      open: parseNumber(cells[index.open] ?? '', 'open', lineNumber),
      high: parseNumber(cells[index.high] ?? '', 'high', lineNumber),
      low: parseNumber(cells[index.low] ?? '', 'low', lineNumber),
      close: parseNumber(cells[index.close] ?? '', 'close', lineNumber),
      volume: parseNumber(cells[index.volume] ?? '', 'volume', lineNumber),
    };
  });

  return bars.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export async function loadBarsFromCsv(path: string): Promise<Bar[]> {
  const content = await fs.readFile(path, 'utf8');
  return parseBarsCsv(content);
}
