import { describe, it, expect, vi } from "vitest";
import {
    ERROR_CANCELLED,
    WindowsMessageBox,
    WindowsShellPlatform,
} from "../src/platform/windowsShell";
import { ProcessRunner } from "../src/platform/runProcess";
import { fromWideBase64, toWideBase64 } from "../src/utils/platformText";
import { PlatformCall } from "../src/types/platform-types";
import { processResult } from "./fakes";

const makeRunner = () =>
    vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>();

const copyCall: PlatformCall = {
    verb: "copy",
    from: "C:\\a b.txt\0\0",
    to: "D:\\dir\0\0",
    flags: 0x4240,
};

describe("WindowsShellPlatform.perform", () => {
    it("should hand the encoded lists to SHFileOperation through PowerShell", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult({ stdout: "0 0\r\n" }));
        const platform = new WindowsShellPlatform(run);

        const outcome = await platform.perform(copyCall);

        expect(outcome).toEqual({ status: 0, aborted: false });
        expect(run).toHaveBeenCalledTimes(1);

        const [command, args, options] = run.mock.calls[0];
        expect(command).toBe("powershell.exe");
        expect(args.slice(0, 5)).toEqual([
            "-NoProfile",
            "-NonInteractive",
            "-ExecutionPolicy",
            "Bypass",
            "-EncodedCommand",
        ]);

        const script = fromWideBase64(args[5] ?? "");
        expect(script).toContain(
            "public static extern int SHFileOperation(ref SHFILEOPSTRUCT lpFileOp);"
        );
        expect(script).toContain(
            "$op.pFrom = Read-WideText $env:NATIVE_FILE_OPS_FROM"
        );

        const env = options?.env ?? {};
        expect(env.NATIVE_FILE_OPS_FUNC).toBe("2");
        expect(env.NATIVE_FILE_OPS_FLAGS).toBe("16960");
        expect(env.NATIVE_FILE_OPS_FROM).toBe(toWideBase64("C:\\a b.txt\0\0"));
        expect(env.NATIVE_FILE_OPS_TO).toBe(toWideBase64("D:\\dir\0\0"));
    });

    it("should map move and delete to their shell functions", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult({ stdout: "0 0" }));
        const platform = new WindowsShellPlatform(run);

        await platform.perform({ ...copyCall, verb: "move" });
        await platform.perform({ ...copyCall, verb: "delete", to: "\0" });

        expect(run.mock.calls[0][2]?.env?.NATIVE_FILE_OPS_FUNC).toBe("1");
        expect(run.mock.calls[1][2]?.env?.NATIVE_FILE_OPS_FUNC).toBe("3");
    });

    it("should read the status and the abort flag", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult({ stdout: "1223 1" }));
        const platform = new WindowsShellPlatform(run);

        await expect(platform.perform(copyCall)).resolves.toEqual({
            status: ERROR_CANCELLED,
            aborted: true,
        });
        expect(platform.cancelledStatus).toBe(1223);
    });

    it("should fail when PowerShell itself fails", async () => {
        const run = makeRunner();
        run.mockResolvedValue(
            processResult({ exitCode: 1, stderr: "Add-Type : boom\r\n" })
        );
        const platform = new WindowsShellPlatform(run);

        await expect(platform.perform(copyCall)).rejects.toThrowError(
            "powershell.exe exited with 1: Add-Type : boom"
        );
    });

    it("should fail on output it does not understand", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult({ stdout: "hello" }));
        const platform = new WindowsShellPlatform(run);

        await expect(platform.perform(copyCall)).rejects.toThrowError(
            /^Unexpected output from SHFileOperation host/
        );
    });
});

describe("WindowsShellPlatform.lookupSystemMessage", () => {
    it("should decode the Win32 message for a code", async () => {
        const run = makeRunner();
        run.mockResolvedValue(
            processResult({ stdout: toWideBase64("Access is denied.\r\n") })
        );
        const platform = new WindowsShellPlatform(run);

        await expect(platform.lookupSystemMessage(5)).resolves.toBe(
            "Access is denied."
        );
        expect(run.mock.calls[0][2]?.env?.NATIVE_FILE_OPS_CODE).toBe("5");
    });

    it("should ask FormatMessage for system text only", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult());
        const platform = new WindowsShellPlatform(run);

        await platform.lookupSystemMessage(0x2a);

        const script = fromWideBase64(run.mock.calls[0][1][5] ?? "");
        expect(script).toContain(
            "[NativeSystemMessage]::FormatMessage(4608, [IntPtr]::Zero, [uint32]$env:NATIVE_FILE_OPS_CODE"
        );
        expect(script).toContain("if ($length -gt 0) {");
        expect(script).not.toContain("Win32Exception");
    });

    it("should pass negative codes as their unsigned value", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult());
        const platform = new WindowsShellPlatform(run);

        await platform.lookupSystemMessage(-1);

        expect(run.mock.calls[0][2]?.env?.NATIVE_FILE_OPS_CODE).toBe(
            "4294967295"
        );
    });

    it("should give nothing for an empty message", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult({ stdout: "" }));
        const platform = new WindowsShellPlatform(run);

        await expect(platform.lookupSystemMessage(5)).resolves.toBeUndefined();
    });
});

describe("WindowsMessageBox", () => {
    it("should pass title and body as wide text", async () => {
        const run = makeRunner();
        run.mockResolvedValue(processResult());
        const dialog = new WindowsMessageBox(run, "pwsh.exe");

        await dialog.showWarning("Unable to copy files (ERR 0x7c)", "Bad path");

        const [command, args, options] = run.mock.calls[0];
        expect(command).toBe("pwsh.exe");
        expect(fromWideBase64(args[5] ?? "")).toContain(
            "[System.Windows.Forms.MessageBox]::Show($body, $title, 'OK', 'Warning')"
        );
        expect(options?.env?.NATIVE_FILE_OPS_TITLE).toBe(
            toWideBase64("Unable to copy files (ERR 0x7c)")
        );
        expect(options?.env?.NATIVE_FILE_OPS_BODY).toBe(toWideBase64("Bad path"));
    });
});
