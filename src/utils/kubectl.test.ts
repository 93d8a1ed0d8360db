/**
 * kubectl.test.ts - Unit tests for the kubectl subprocess wrapper
 *
 * child_process is mocked; no kubectl binary is needed.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { executeKubectl } from "./kubectl";

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock("child_process", () => ({ execFile: execFileMock }));

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

function respondWith(error: Error | null, stdout: string, stderr: string): void {
  execFileMock.mockImplementation(
    (_file: string, _args: string[], _options: unknown, callback: ExecCallback) => {
      callback(error, stdout, stderr);
    }
  );
}

beforeEach(() => {
  execFileMock.mockReset();
});

describe("executeKubectl", () => {
  it("runs kubectl without a shell and returns its stdout", async () => {
    respondWith(null, '{"items":[]}', "");

    const result = await executeKubectl(["get", "pods", "-A", "-o", "json"], { timeoutMs: 5000 });

    expect(result).toEqual({ output: '{"items":[]}', isError: false, timedOut: false, stderr: "" });
    expect(execFileMock.mock.calls[0][0]).toBe("kubectl");
    expect(execFileMock.mock.calls[0][1]).toEqual(["get", "pods", "-A", "-o", "json"]);
    expect(execFileMock.mock.calls[0][2]).toMatchObject({ timeout: 5000 });
  });

  it("reports kubectl's stderr when it exits non-zero", async () => {
    const failure = Object.assign(new Error("Command failed: kubectl get widgets"), {
      code: 1,
      killed: false,
    });
    respondWith(failure, "", 'error: the server doesn\'t have a resource type "widgets"\n');

    const result = await executeKubectl(["get", "widgets"]);

    expect(result).toEqual({
      output: 'Error executing "kubectl get widgets": error: the server doesn\'t have a resource type "widgets"',
      isError: true,
      timedOut: false,
      stderr: 'error: the server doesn\'t have a resource type "widgets"\n',
    });
  });

  it("marks a process killed at the deadline as timed out", async () => {
    const killed = Object.assign(new Error("Command failed: kubectl get pods"), {
      code: null,
      killed: true,
    });
    respondWith(killed, "", "");

    const result = await executeKubectl(["get", "pods"]);

    expect(result.isError).toBe(true);
    expect(result.timedOut).toBe(true);
    expect(result.output).toBe('Error executing "kubectl get pods": timed out');
  });
});
