import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ToolRejectedError } from '../errors';
import { isNotFound } from '../session/store';

export interface ExtractedDocument {
  fileName: string;
  text: string;
}

/** Turns an uploaded travel document into plain text. */
export interface DocumentTextExtractor {
  extractText(filePath: string): Promise<ExtractedDocument>;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.text', '.md', '.eml']);

/**
 * Reads UTF-8 text documents from under `rootDir`. PDF and image extraction
 * plug in behind the same interface.
 */
export class Utf8DocumentTextExtractor implements DocumentTextExtractor {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async extractText(filePath: string): Promise<ExtractedDocument> {
    const resolved = path.resolve(this.rootDir, filePath);
    const relative = path.relative(this.rootDir, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ToolRejectedError(`Document path escapes the upload directory: ${filePath}`, 'InvalidInput');
    }

    const extension = path.extname(resolved).toLowerCase();
    if (!TEXT_EXTENSIONS.has(extension)) {
      throw new ToolRejectedError(`Unsupported document type: ${extension || 'none'}`, 'InvalidInput');
    }

    try {
      return { fileName: path.basename(resolved), text: await readFile(resolved, 'utf8') };
    } catch (error) {
      if (isNotFound(error)) {
        throw new ToolRejectedError(`File not found: ${filePath}`, 'NotFound');
      }
      throw error;
    }
  }
}

export interface TripFacts {
  dates: string[];
  destinations: string[];
  passengers: string[];
  estimatedTripCost: number | null;
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

function isoDate(year: number, monthIndex: number, day: number): string | null {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== monthIndex || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

function monthIndex(name: string): number {
  const lower = name.toLowerCase();
  const full = MONTH_NAMES.indexOf(lower);
  return full >= 0 ? full : MONTHS.indexOf(lower);
}

export function extractDates(text: string): string[] {
  const found = new Set<string>();

  for (const match of text.matchAll(/\b(\d{1,2})\s+([A-Za-z]{3,9})\s+(\d{4})\b/g)) {
    const month = monthIndex(match[2] ?? '');
    if (month < 0) {
      continue;
    }
    const parsed = isoDate(Number(match[3]), month, Number(match[1]));
    if (parsed) {
      found.add(parsed);
    }
  }

  for (const match of text.matchAll(/\b(\d{4})-(\d{2})-(\d{2})\b/g)) {
    const parsed = isoDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
    if (parsed) {
      found.add(parsed);
    }
  }

  return [...found].sort();
}

export function extractDestinations(text: string): string[] {
  const candidates: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (/depart|arrive/i.test(trimmed)) {
      candidates.push(trimmed);
    }
  }
  for (const match of text.matchAll(/\b([A-Z]{3,})\b/g)) {
    if (match[1]) {
      candidates.push(match[1]);
    }
  }
  return [...new Set(candidates)].slice(0, 10);
}

export function extractPassengers(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(/Passenger\s*[:-]\s*(.+)/g)) {
    for (const token of (match[1] ?? '').split(/[,/]/)) {
      const name = token.trim();
      if (name) {
        names.push(name);
      }
    }
  }
  return [...new Set(names)].slice(0, 6);
}

export function estimateTripCost(text: string): number | null {
  const amounts: number[] = [];
  for (const match of text.matchAll(/(?:USD|SGD|US\$|S\$|\$)\s*((?:[0-9]{1,3}(?:,[0-9]{3})+|[0-9]{2,})(?:\.[0-9]{2})?)/g)) {
    amounts.push(Number((match[1] ?? '').replace(/,/g, '')));
  }
  return amounts.length === 0 ? null : Math.max(...amounts);
}

export function extractTripFacts(text: string): TripFacts {
  return {
    dates: extractDates(text),
    destinations: extractDestinations(text),
    passengers: extractPassengers(text),
    estimatedTripCost: estimateTripCost(text),
  };
}
