import type { TestOutcome } from '@revloop/core';
import { MAX_FAILURE_EXCERPTS } from '@revloop/core';

const PASSED_PATTERN = /(\d+)\s+passed\b/;
const FAILED_PATTERN = /(\d+)\s+failed\b/;
/** `file.py::test_name` style node id */
const QUALIFIER_PATTERN = /\S+::\S+/;

/**
 * Parse verbose test-runner output.
 *
 * Counts come from the last line carrying "<n> passed" / "<n> failed".
 * Zero collected tests is reported as such and never counts as a pass.
 */
export function parseTestOutput(rawOutput: string, exitCode: number | null): TestOutcome {
  const lines = rawOutput.split('\n');
  const { passedCount, failedCount } = parseCounts(lines);
  const collected = passedCount + failedCount;

  return {
    collected,
    passedCount,
    failedCount,
    allPassed: collected > 0 && failedCount === 0 && exitCode === 0,
    failureExcerpts: extractFailureBlocks(lines).slice(0, MAX_FAILURE_EXCERPTS),
    rawOutput,
  };
}

function parseCounts(lines: readonly string[]): { passedCount: number; failedCount: number } {
  let passedCount = 0;
  let failedCount = 0;
  for (const line of lines) {
    const passed = PASSED_PATTERN.exec(line);
    if (passed) passedCount = Number.parseInt(passed[1], 10);
    const failed = FAILED_PATTERN.exec(line);
    if (failed) failedCount = Number.parseInt(failed[1], 10);
  }
  return { passedCount, failedCount };
}

function failureNodeId(line: string): string | null {
  if (!line.includes('FAILED')) return null;
  return QUALIFIER_PATTERN.exec(line)?.[0] ?? null;
}

function isFailureDetail(line: string): boolean {
  return line.startsWith('E ') || line.includes('AssertionError') || line.includes('Error:');
}

/**
 * Split the output into one block per failing test. A block opens on a line
 * naming `file::test` as FAILED and collects assertion/error detail lines; it
 * closes on a blank line once it has detail, or on a `=` divider.
 *
 * Verbose output names each failing test twice (the progress line and the
 * short summary). Blocks are keyed by node id: a later block replaces an
 * earlier one for the same test unless it is shorter, and keeps the earlier
 * position.
 */
export function extractFailureBlocks(lines: readonly string[]): string[] {
  const blocks: string[][] = [];
  const indexById = new Map<string, number>();
  let currentId: string | null = null;
  let current: string[] = [];

  const close = () => {
    if (currentId !== null && current.length > 0) {
      const existing = indexById.get(currentId);
      if (existing === undefined) {
        indexById.set(currentId, blocks.length);
        blocks.push(current);
      } else if (current.length >= blocks[existing].length) {
        blocks[existing] = current;
      }
    }
    currentId = null;
    current = [];
  };

  for (const line of lines) {
    const nodeId = failureNodeId(line);
    if (nodeId !== null) {
      close();
      currentId = nodeId;
      current.push(line);
      continue;
    }
    if (current.length === 0) continue;

    if (isFailureDetail(line)) {
      current.push(line);
    } else if (line.trim() === '' && current.length > 1) {
      close();
    } else if (line.startsWith('=')) {
      close();
    }
  }
  close();

  return blocks.map((block) => block.join('\n'));
}
