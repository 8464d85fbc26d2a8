import { ModelDetails, ModelRecord } from '../types/model-record.js';
import { ParseError } from '../types/errors.js';
import { parseSize } from '../utils/format-utils.js';

const UNIT_MS: Record<string, number> = {
  second: 1000,
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  week: 7 * 24 * 60 * 60 * 1000,
  month: 30 * 24 * 60 * 60 * 1000,
  year: 365 * 24 * 60 * 60 * 1000,
};

const RELATIVE_TIME = /^(?:about\s+)?(an?|\d+)\s+(second|minute|hour|day|week|month|year)s?\s+ago$/;
const HEADER = /^NAME\s+ID\s+SIZE\s+MODIFIED/i;

export interface ParsedInventory {
  records: ModelRecord[];
  skipped: ParseError[];
}

/**
 * Resolve the runner's MODIFIED column against a reference time.
 * Handles "2 weeks ago", "About an hour ago", "Less than a second ago",
 * "Yesterday" and absolute dates. Returns null when unrecognized.
 */
export function parseModified(text: string, now: Date): Date | null {
  const normalized = text.trim().toLowerCase();

  if (normalized === 'just now' || normalized === 'less than a second ago') {
    return new Date(now.getTime());
  }
  if (normalized === 'yesterday') {
    return new Date(now.getTime() - UNIT_MS.day);
  }

  const match = normalized.match(RELATIVE_TIME);
  if (match) {
    const amount = match[1] === 'a' || match[1] === 'an' ? 1 : parseInt(match[1], 10);
    return new Date(now.getTime() - amount * UNIT_MS[match[2]]);
  }

  const absolute = Date.parse(text);
  return isNaN(absolute) ? null : new Date(absolute);
}

/**
 * Parse one data row of `list` output
 */
export function parseListRow(line: string, now: Date): ModelRecord | ParseError {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 4) {
    return { kind: 'parse-error', line, message: `expected at least 4 columns, found ${parts.length}` };
  }

  const [name, id] = parts;

  // Size is printed either as "4.7 GB" (two columns) or "4.7GB" (one)
  let size: string;
  let rest: string[];
  if (/^\d+(\.\d+)?$/.test(parts[2])) {
    size = `${parts[2]} ${parts[3]}`;
    rest = parts.slice(4);
  } else {
    size = parts[2];
    rest = parts.slice(3);
  }

  const sizeBytes = parseSize(size);
  if (sizeBytes === null) {
    return { kind: 'parse-error', line, message: `unrecognized size "${size}"` };
  }

  const modified = rest.join(' ');
  const modifiedAt = parseModified(modified, now);
  if (modifiedAt === null) {
    return { kind: 'parse-error', line, message: `unrecognized modified time "${modified}"` };
  }

  return { name, id, sizeBytes, modifiedAt, size, modified };
}

/**
 * Parse the tabular `list` output. Bad rows are skipped and reported,
 * never fatal to the whole listing.
 */
export function parseListOutput(output: string, now: Date): ParsedInventory {
  const records: ModelRecord[] = [];
  const skipped: ParseError[] = [];

  for (const line of output.split('\n')) {
    if (line.trim() === '' || HEADER.test(line.trim())) continue;

    const row = parseListRow(line, now);
    if ('kind' in row) {
      skipped.push(row);
    } else {
      records.push(row);
    }
  }

  return { records, skipped };
}

const SHOW_SECTIONS = ['model', 'capabilities', 'parameters', 'license', 'system', 'projector', 'metadata'];

/**
 * Parse `show <name>` output into details. Unknown sections are ignored.
 */
export function parseShowOutput(name: string, output: string): ModelDetails {
  const details: ModelDetails = { name, capabilities: [], raw: output };
  let section = '';

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (line === '') continue;

    if (SHOW_SECTIONS.includes(line.toLowerCase())) {
      section = line.toLowerCase();
      continue;
    }

    if (section === 'capabilities') {
      details.capabilities.push(line);
    } else if (section === 'license') {
      details.license ??= line;
    } else if (section === 'model') {
      const match = line.match(/^(.+?)\s{2,}(.+)$/);
      if (!match) continue;
      const key = match[1].toLowerCase();
      const value = match[2].trim();

      switch (key) {
        case 'arch':
        case 'architecture':
          details.architecture = value;
          break;
        case 'parameters':
          details.parameters = value;
          break;
        case 'context length':
          details.contextLength = parseInt(value, 10) || undefined;
          break;
        case 'embedding length':
          details.embeddingLength = parseInt(value, 10) || undefined;
          break;
        case 'quantization':
          details.quantization = value;
          break;
      }
    }
  }

  return details;
}
