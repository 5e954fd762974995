import type { Violation } from '@revloop/core';
import { createLogger } from '@revloop/core';

const log = createLogger('AnalysisParser');

const SCORE_MARKER = 'Your code has been rated at';
const SCORE_PATTERN = /Your code has been rated at\s+(-?\d+(?:\.\d+)?)\s*\/\s*10\b/;

export interface ParsedAnalysis {
  score: number;
  violations: Violation[];
}

/**
 * Parse static-analysis output: a JSON array of violation records plus a
 * trailing "Your code has been rated at N/10" line. The two extractions are
 * independent; either one falls back to its default (empty list, score 0)
 * without affecting the other.
 */
export function parseAnalysisOutput(rawOutput: string): ParsedAnalysis {
  return {
    score: parseScore(rawOutput),
    violations: parseViolations(rawOutput),
  };
}

export function parseScore(rawOutput: string): number {
  const line = rawOutput.split('\n').find((l) => l.includes(SCORE_MARKER));
  if (!line) return 0;
  const match = SCORE_PATTERN.exec(line);
  if (!match) {
    log.debug(`Malformed score line: ${line.trim().slice(0, 120)}`);
    return 0;
  }
  const score = Number.parseFloat(match[1]);
  return Number.isFinite(score) ? score : 0;
}

export function parseViolations(rawOutput: string): Violation[] {
  const records = extractJsonArray(rawOutput);
  if (!records) return [];
  const violations: Violation[] = [];
  for (const record of records) {
    const violation = toViolation(record);
    if (violation) violations.push(violation);
  }
  return violations;
}

/**
 * Locate the JSON array in mixed output. The array starts on the first line
 * beginning with `[`; candidate ends are tried from the last `]` backwards so
 * trailing text after the array does not defeat the parse.
 */
function extractJsonArray(rawOutput: string): unknown[] | null {
  const start = findArrayStart(rawOutput);
  if (start === -1) return null;

  let end = rawOutput.lastIndexOf(']');
  while (end > start) {
    try {
      const parsed: unknown = JSON.parse(rawOutput.slice(start, end + 1));
      if (Array.isArray(parsed)) return parsed;
    } catch {
      // try the previous closing bracket
    }
    end = rawOutput.lastIndexOf(']', end - 1);
  }

  log.debug('No parseable violation list in analysis output');
  return null;
}

function findArrayStart(rawOutput: string): number {
  let offset = 0;
  for (const line of rawOutput.split('\n')) {
    const indent = line.length - line.trimStart().length;
    if (line.trimStart().startsWith('[')) return offset + indent;
    offset += line.length + 1;
  }
  return -1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toViolation(record: unknown): Violation | null {
  if (!isRecord(record)) return null;
  const { symbol, message } = record;
  if (typeof symbol !== 'string' || typeof message !== 'string') return null;
  return {
    symbol,
    message,
    messageId: optionalString(record['message-id'] ?? record.messageId),
    type: optionalString(record.type),
    path: optionalString(record.path),
    module: optionalString(record.module),
    obj: optionalString(record.obj),
    line: optionalNumber(record.line),
    column: optionalNumber(record.column),
  };
}
