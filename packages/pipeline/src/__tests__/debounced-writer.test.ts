import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DebouncedJsonWriter, writeJsonFileAtomic } from '../utils/debounced-writer.js';

vi.mock('node:fs/promises', () => ({
  mkdir: vi.fn(),
  writeFile: vi.fn(),
  rename: vi.fn(),
  unlink: vi.fn(),
}));

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';

const mockedMkdir = vi.mocked(mkdir);
const mockedWriteFile = vi.mocked(writeFile);
const mockedRename = vi.mocked(rename);
const mockedUnlink = vi.mocked(unlink);

const LOG_FILE = '/logs/experiment_data.json';
const TEMP_PATTERN = /^\/logs\/experiment_data\.json\.[0-9a-f]{8}\.tmp$/;

describe('DebouncedJsonWriter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockedMkdir.mockResolvedValue(undefined);
    mockedWriteFile.mockResolvedValue(undefined);
    mockedRename.mockResolvedValue(undefined);
    mockedUnlink.mockResolvedValue(undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should coalesce scheduled writes into one', async () => {
    vi.useFakeTimers();
    const writer = new DebouncedJsonWriter(LOG_FILE, () => [1], 100);

    writer.schedule();
    await vi.advanceTimersByTimeAsync(60);
    writer.schedule();
    await vi.advanceTimersByTimeAsync(60);

    expect(mockedWriteFile).not.toHaveBeenCalled();
    expect(writer.pending).toBe(true);

    await vi.advanceTimersByTimeAsync(40);
    await vi.waitFor(() => expect(mockedRename).toHaveBeenCalledTimes(1));

    expect(writer.pending).toBe(false);
    expect(mockedWriteFile).toHaveBeenCalledTimes(1);
  });

  it('should wait for a deferred write in flight before a forced one', async () => {
    const release: Array<() => void> = [];
    mockedWriteFile.mockImplementation(() => new Promise<void>((resolve) => {
      release.push(resolve);
    }));
    let data = { entries: 1 };
    const writer = new DebouncedJsonWriter(LOG_FILE, () => data, 1);

    writer.schedule();
    await vi.waitFor(() => expect(mockedWriteFile).toHaveBeenCalledTimes(1));

    data = { entries: 2 };
    const forced = writer.flushNow();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(mockedWriteFile).toHaveBeenCalledTimes(1);
    expect(mockedRename).not.toHaveBeenCalled();

    release[0]();
    await vi.waitFor(() => expect(mockedWriteFile).toHaveBeenCalledTimes(2));
    expect(mockedRename).toHaveBeenCalledTimes(1);
    release[1]();
    await forced;

    expect(mockedWriteFile.mock.calls[0][1]).toBe('{\n  "entries": 1\n}\n');
    expect(mockedWriteFile.mock.calls[1][1]).toBe('{\n  "entries": 2\n}\n');
    expect(mockedRename).toHaveBeenCalledTimes(2);
    expect(mockedRename.mock.calls[1][1]).toBe(LOG_FILE);
  });

  it('should keep writing after a failed write', async () => {
    mockedWriteFile.mockRejectedValueOnce(new Error('ENOSPC'));
    const writer = new DebouncedJsonWriter(LOG_FILE, () => [], 100);

    await expect(writer.flushNow()).rejects.toThrow('ENOSPC');
    await writer.flushNow();

    expect(mockedWriteFile).toHaveBeenCalledTimes(2);
    expect(mockedRename).toHaveBeenCalledTimes(1);
  });

  it('should not throw when a deferred write fails', async () => {
    mockedWriteFile.mockRejectedValueOnce(new Error('EACCES'));
    const writer = new DebouncedJsonWriter(LOG_FILE, () => [], 1);

    writer.schedule();
    await vi.waitFor(() => expect(mockedUnlink).toHaveBeenCalledTimes(1));

    expect(mockedRename).not.toHaveBeenCalled();
  });
});

describe('writeJsonFileAtomic()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockedMkdir.mockResolvedValue(undefined);
    mockedWriteFile.mockResolvedValue(undefined);
    mockedRename.mockResolvedValue(undefined);
    mockedUnlink.mockResolvedValue(undefined);
  });

  it('should write a temporary sibling and rename it over the target', async () => {
    await writeJsonFileAtomic(LOG_FILE, { ok: true });

    expect(mockedMkdir).toHaveBeenCalledWith('/logs', { recursive: true });
    const tempPath = mockedWriteFile.mock.calls[0][0];
    expect(tempPath).toMatch(TEMP_PATTERN);
    expect(mockedWriteFile).toHaveBeenCalledWith(tempPath, '{\n  "ok": true\n}\n', 'utf-8');
    expect(mockedRename).toHaveBeenCalledWith(tempPath, LOG_FILE);
  });

  it('should remove the temporary file when the rename fails', async () => {
    mockedRename.mockRejectedValueOnce(new Error('EXDEV'));

    await expect(writeJsonFileAtomic(LOG_FILE, [])).rejects.toThrow('EXDEV');

    expect(mockedUnlink).toHaveBeenCalledWith(mockedWriteFile.mock.calls[0][0]);
  });
});
