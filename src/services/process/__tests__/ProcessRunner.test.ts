const mockExecFile = jest.fn();

jest.mock("child_process", () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
}));

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { ProcessRunner } from "../ProcessRunner";
import { ProcessErrorCode } from "@core/errors";

type ExecCallback = (
  error: Error | null,
  stdout: string,
  stderr: string,
) => void;

/**
 * Complete the next execFile call with the given outcome
 */
function mockExecResult(
  error: Error | null,
  stdout: string = "",
  stderr: string = "",
): void {
  mockExecFile.mockImplementationOnce(
    (_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
      cb(error, stdout, stderr);
    },
  );
}

/**
 * Keep the next execFile call running until its signal aborts
 */
function mockHangingExec(): void {
  mockExecFile.mockImplementationOnce(
    (
      _file: string,
      _args: string[],
      opts: { signal: AbortSignal },
      cb: ExecCallback,
    ) => {
      opts.signal.addEventListener("abort", () => {
        const error = Object.assign(new Error("The operation was aborted"), {
          name: "AbortError",
          code: "ABORT_ERR",
        });
        cb(error, "", "");
      });
    },
  );
}

function exitError(code: number): Error {
  return Object.assign(new Error(`Command failed with code ${code}`), {
    code,
  });
}

describe("ProcessRunner", () => {
  let runner: ProcessRunner;

  beforeEach(() => {
    jest.clearAllMocks();
    mockExecFile.mockReset();
    runner = new ProcessRunner(1000);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("run", () => {
    it("should pass an argument vector without a shell", async () => {
      mockExecResult(null, "wlan0\n");

      const result = await runner.run("nmcli", ["-t", "-f", "SSID"]);

      expect(mockExecFile).toHaveBeenCalledWith(
        "nmcli",
        ["-t", "-f", "SSID"],
        expect.objectContaining({ encoding: "utf8" }),
        expect.any(Function),
      );
      expect(result).toEqual({
        success: true,
        data: { exitCode: 0, stdout: "wlan0\n", stderr: "" },
      });
    });

    it("should prefix elevated commands with sudo -n", async () => {
      mockExecResult(null);

      await runner.run("killall", ["openvpn"], { elevated: true });

      expect(mockExecFile.mock.calls[0][0]).toBe("sudo");
      expect(mockExecFile.mock.calls[0][1]).toEqual([
        "-n",
        "killall",
        "openvpn",
      ]);
    });

    it("should report a missing binary as unavailable", async () => {
      mockExecResult(
        Object.assign(new Error("spawn nmcli ENOENT"), { code: "ENOENT" }),
      );

      const result = await runner.run("nmcli", ["--version"]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.UNAVAILABLE);
        expect(result.error.message).toBe(
          "Command not available: nmcli --version (ENOENT)",
        );
      }
    });

    it("should report a non-zero exit as failed and keep stderr", async () => {
      mockExecResult(exitError(2), "", "Error: No Wi-Fi device found.\n");

      const result = await runner.run("nmcli", ["device", "wifi", "list"]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.FAILED);
        expect(result.error.exitCode).toBe(2);
        expect(result.error.stderr).toBe("Error: No Wi-Fi device found.\n");
        expect(result.error.message).toBe(
          "Command exited with code 2: nmcli device wifi list: Error: No Wi-Fi device found.",
        );
      }
    });

    it("should accept exit codes listed as ok", async () => {
      mockExecResult(exitError(1), "", "openvpn: no process found\n");

      const result = await runner.run("killall", ["openvpn"], {
        elevated: true,
        okExitCodes: [0, 1],
      });

      expect(result).toEqual({
        success: true,
        data: {
          exitCode: 1,
          stdout: "",
          stderr: "openvpn: no process found\n",
        },
      });
    });

    it("should report a sudo password prompt as elevation denied", async () => {
      mockExecResult(exitError(1), "", "sudo: a password is required\n");

      const result = await runner.run("ip", ["addr", "flush"], {
        elevated: true,
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.ELEVATION_DENIED);
        expect(result.error.recoverable).toBe(false);
      }
    });

    it("should report a binary missing behind sudo as unavailable", async () => {
      mockExecResult(exitError(1), "", "sudo: wpa_cli: command not found\n");

      const result = await runner.run("wpa_cli", ["-v"], { elevated: true });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.UNAVAILABLE);
      }
    });

    it("should kill the child and report a timeout", async () => {
      jest.useFakeTimers();
      mockHangingExec();

      const pending = runner.run("wpa_cli", ["scan"], { timeoutMs: 500 });
      expect(runner.getInFlightCount()).toBe(1);
      jest.advanceTimersByTime(500);
      const result = await pending;

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.TIMEOUT);
        expect(result.error.message).toBe(
          "Command timed out after 500ms: wpa_cli scan",
        );
      }
      expect(runner.getInFlightCount()).toBe(0);
    });

    it("should use the default timeout when none is given", async () => {
      jest.useFakeTimers();
      mockHangingExec();

      const pending = runner.run("pgrep", ["-x", "openvpn"]);
      jest.advanceTimersByTime(999);
      expect(runner.getInFlightCount()).toBe(1);
      jest.advanceTimersByTime(1);
      const result = await pending;

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.TIMEOUT);
      }
    });
  });

  describe("abortAll", () => {
    it("should abort in-flight commands", async () => {
      mockHangingExec();
      mockHangingExec();

      const first = runner.run("wpa_cli", ["scan"]);
      const second = runner.run("nmcli", ["device", "wifi", "rescan"]);
      expect(runner.getInFlightCount()).toBe(2);

      runner.abortAll();
      const results = await Promise.all([first, second]);

      for (const result of results) {
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.code).toBe(ProcessErrorCode.ABORTED);
        }
      }
      expect(runner.getInFlightCount()).toBe(0);
    });

    it("should refuse new commands after abort", async () => {
      runner.abortAll();

      const result = await runner.run("pgrep", ["-x", "openvpn"]);

      expect(mockExecFile).not.toHaveBeenCalled();
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.ABORTED);
      }
    });
  });

  describe("reset", () => {
    it("should run commands again after abort", async () => {
      runner.abortAll();
      runner.reset();
      mockExecResult(null, "1234\n");

      const result = await runner.run("pgrep", ["-x", "openvpn"]);

      expect(mockExecFile).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.stdout).toBe("1234\n");
      }
    });

    it("should let a second abortAll kill commands started after reset", async () => {
      runner.abortAll();
      runner.reset();
      mockHangingExec();

      const pending = runner.run("wpa_cli", ["scan"]);
      runner.abortAll();
      const result = await pending;

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ProcessErrorCode.ABORTED);
      }
    });
  });
});
