import { describe, it, expect } from 'vitest';
import { parseTestOutput, extractFailureBlocks } from '../test-parser.js';

describe('parseTestOutput', () => {
  it('reads an all-passing summary', () => {
    const outcome = parseTestOutput('5 passed, 0 failed\n', 0);
    expect(outcome).toEqual({
      collected: 5,
      passedCount: 5,
      failedCount: 0,
      allPassed: true,
      failureExcerpts: [],
      rawOutput: '5 passed, 0 failed\n',
    });
  });

  it('isolates a single failure block with its assertion line', () => {
    const raw = [
      'test_x.py::test_a PASSED',
      'FAILED x.py::test_y',
      'AssertionError: expected 3 got 4',
      '1 passed, 1 failed',
    ].join('\n');

    const outcome = parseTestOutput(raw, 1);

    expect(outcome.passedCount).toBe(1);
    expect(outcome.failedCount).toBe(1);
    expect(outcome.collected).toBe(2);
    expect(outcome.allPassed).toBe(false);
    expect(outcome.failureExcerpts).toEqual([
      'FAILED x.py::test_y\nAssertionError: expected 3 got 4',
    ]);
  });

  it('reports zero collected tests when there is no summary line', () => {
    const outcome = parseTestOutput('ImportError while importing test module\n', 0);
    expect(outcome.collected).toBe(0);
    expect(outcome.allPassed).toBe(false);
  });

  it('does not count an error-only run as collected', () => {
    const raw = [
      '==================================== ERRORS ====================================',
      "E   ModuleNotFoundError: No module named 'calculator'",
      '=========================== 1 error in 0.05s ===========================',
    ].join('\n');
    const outcome = parseTestOutput(raw, 2);
    expect(outcome.collected).toBe(0);
    expect(outcome.failureExcerpts).toEqual([]);
  });

  it('lets later summary lines override earlier ones', () => {
    const outcome = parseTestOutput('3 passed\nnoise\n1 passed, 2 failed in 0.1s\n', 1);
    expect(outcome.passedCount).toBe(1);
    expect(outcome.failedCount).toBe(2);
    expect(outcome.collected).toBe(3);
  });

  it('requires a successful exit code for allPassed', () => {
    expect(parseTestOutput('2 passed in 0.01s', 1).allPassed).toBe(false);
    expect(parseTestOutput('2 passed in 0.01s', null).allPassed).toBe(false);
    expect(parseTestOutput('2 passed in 0.01s', 0).allPassed).toBe(true);
  });

  it('parses verbose runner output end to end', () => {
    const verboseFailed = 'test_calc.py::test_sub FAILED                                            [ 66%]';
    const raw = [
      '============================= test session starts ==============================',
      'collected 3 items',
      '',
      'test_calc.py::test_add PASSED                                            [ 33%]',
      verboseFailed,
      'test_calc.py::test_div PASSED                                            [100%]',
      '',
      '=================================== FAILURES ===================================',
      '___________________________________ test_sub ___________________________________',
      'test_calc.py:8: in test_sub',
      '    assert sub(5, 3) == 2',
      'E   assert 8 == 2',
      '=========================== short test summary info ============================',
      'FAILED test_calc.py::test_sub - assert 8 == 2',
      '========================= 1 failed, 2 passed in 0.03s ==========================',
    ].join('\n');

    const outcome = parseTestOutput(raw, 1);

    expect(outcome.collected).toBe(3);
    expect(outcome.passedCount).toBe(2);
    expect(outcome.failedCount).toBe(1);
    expect(outcome.failureExcerpts).toEqual(['FAILED test_calc.py::test_sub - assert 8 == 2']);
    expect(outcome.failureExcerpts).toHaveLength(outcome.failedCount);
  });

  it('keeps one excerpt per failing test when each is reported twice', () => {
    const names = ['test_add', 'test_sub', 'test_mul'];
    const raw = [
      'collected 3 items',
      '',
      ...names.map((name) => `test_calc.py::${name} FAILED`),
      '',
      '=================================== FAILURES ===================================',
      'E   assert 0 == 1',
      '=========================== short test summary info ============================',
      ...names.map((name) => `FAILED test_calc.py::${name} - assert 0 == 1`),
      '============================== 3 failed in 0.04s ===============================',
    ].join('\n');

    const outcome = parseTestOutput(raw, 1);

    expect(outcome.failureExcerpts).toEqual([
      'FAILED test_calc.py::test_add - assert 0 == 1',
      'FAILED test_calc.py::test_sub - assert 0 == 1',
      'FAILED test_calc.py::test_mul - assert 0 == 1',
    ]);
  });

  it('caps failure excerpts at five', () => {
    const raw = Array.from({ length: 7 }, (_, i) =>
      `FAILED t.py::test_${i}\nE   assert ${i} == -1\n`,
    ).join('\n') + '\n7 failed';
    const outcome = parseTestOutput(raw, 1);
    expect(outcome.failedCount).toBe(7);
    expect(outcome.failureExcerpts).toHaveLength(5);
    expect(outcome.failureExcerpts[0]).toBe('FAILED t.py::test_0\nE   assert 0 == -1');
    expect(outcome.failureExcerpts[4]).toBe('FAILED t.py::test_4\nE   assert 4 == -1');
  });
});

describe('extractFailureBlocks', () => {
  it('closes a block on a blank line after detail', () => {
    const lines = [
      'FAILED a.py::test_one',
      'E   assert 1 == 2',
      '',
      'FAILED a.py::test_two',
      'E   AssertionError: boom',
    ];
    expect(extractFailureBlocks(lines)).toEqual([
      'FAILED a.py::test_one\nE   assert 1 == 2',
      'FAILED a.py::test_two\nE   AssertionError: boom',
    ]);
  });

  it('keeps a block open across a blank line before any detail', () => {
    const lines = ['FAILED a.py::test_one', '', 'ValueError: bad input', 'unrelated'];
    expect(extractFailureBlocks(lines)).toEqual(['FAILED a.py::test_one\nValueError: bad input']);
  });

  it('closes a block on a divider line', () => {
    const lines = ['FAILED a.py::test_one', '==== summary ====', 'E   assert False'];
    expect(extractFailureBlocks(lines)).toEqual(['FAILED a.py::test_one']);
  });

  it('keeps the longer block when a test is named twice', () => {
    const lines = [
      'FAILED a.py::test_one',
      'E   assert 1 == 2',
      'AssertionError: detail',
      '',
      'FAILED a.py::test_one - assert 1 == 2',
    ];
    expect(extractFailureBlocks(lines)).toEqual(['FAILED a.py::test_one\nE   assert 1 == 2\nAssertionError: detail']);
  });

  it('ignores FAILED mentions without a test qualifier', () => {
    expect(extractFailureBlocks(['Build FAILED', 'Error: nothing'])).toEqual([]);
  });
});
