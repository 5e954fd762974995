import { spawn, type ChildProcess } from 'node:child_process';
import { access } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IPathGuard, IProcessRunner, RunRequest, ToolInvocationResult } from '@revloop/core';
import { SandboxViolation, TIMEOUT_MARKER, createLogger, errorMessage } from '@revloop/core';
import treeKill from 'tree-kill';

const log = createLogger('ProcessRunner');

/** Per-stream capture cap */
const MAX_OUTPUT = 10 * 1024 * 1024;

/**
 * Runs a checker tool against one confined file. The tool's own exit code is
 * never an error here: it is reported in `exitCode` and the parsers decide
 * what it means. Only runner faults (sandbox, missing target, spawn failure,
 * timeout, abort) produce `executed: false`.
 */
export class ProcessRunner implements IProcessRunner {
  constructor(private readonly guard: IPathGuard) {}

  async run(request: RunRequest): Promise<ToolInvocationResult> {
    const startedAt = Date.now();
    const fault = (executionError: string, rawOutput = ''): ToolInvocationResult => ({
      executed: false,
      rawOutput,
      executionError,
      exitCode: null,
      durationMs: Date.now() - startedAt,
    });

    let target: string;
    try {
      target = this.guard.validate(request.target);
    } catch (error) {
      if (!(error instanceof SandboxViolation)) throw error;
      log.warn(error.message);
      return fault(error.message);
    }

    try {
      await access(target);
    } catch {
      return fault('target not found');
    }

    if (request.signal?.aborted) {
      return fault('aborted');
    }

    const args = [...request.args, target];
    log.debug(`Executing: ${request.executable} ${args.join(' ').slice(0, 120)}`);

    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(request.executable, args, {
          cwd: dirname(target),
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        resolve(fault(errorMessage(error)));
        return;
      }

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let aborted = false;
      let settled = false;

      const killTree = (reason: string) => {
        if (child.pid === undefined) return;
        treeKill(child.pid, 'SIGKILL', (err) => {
          if (err) {
            log.warn(`tree-kill failed for PID ${child.pid} (${reason}): ${err.message}`);
            child.kill('SIGKILL');
          }
        });
      };

      const timer = request.timeoutSeconds > 0
        ? setTimeout(() => {
            timedOut = true;
            log.warn(`${request.executable} timed out after ${request.timeoutSeconds}s`);
            killTree('timeout');
          }, request.timeoutSeconds * 1000)
        : undefined;

      const abortHandler = () => {
        aborted = true;
        killTree('abort');
      };
      request.signal?.addEventListener('abort', abortHandler, { once: true });

      const finish = (result: ToolInvocationResult) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        request.signal?.removeEventListener('abort', abortHandler);
        resolve(result);
      };

      // Decode per stream so characters split across chunks survive
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        if (stdout.length < MAX_OUTPUT) stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        if (stderr.length < MAX_OUTPUT) stderr += chunk;
      });

      child.on('error', (err) => {
        log.error(`Spawn error: ${String(err)}`);
        finish(fault(err.message, stdout + stderr));
      });

      child.on('close', (code) => {
        const rawOutput = stdout + stderr;
        if (timedOut) {
          finish(fault('timed out', rawOutput + TIMEOUT_MARKER));
          return;
        }
        if (aborted) {
          finish(fault('aborted', rawOutput));
          return;
        }
        finish({
          executed: true,
          rawOutput,
          exitCode: code,
          durationMs: Date.now() - startedAt,
        });
      });
    });
  }
}
