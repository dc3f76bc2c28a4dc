import { describe, it, expect, vi } from "vitest";
import { FileOpsManager } from "../src/file-ops-manager";
import { UsageError } from "../src/core/errors";
import { formatUsage } from "../src/core/requestBuilder";
import { PlatformCall } from "../src/types/platform-types";
import { GioShellPlatform } from "../src/platform/gioShell";
import { ProcessRunner } from "../src/platform/runProcess";
import { makeHarness, processResult } from "./fakes";

describe("FileOpsManager.run", () => {
    it("should copy one file to a directory and exit 0", async () => {
        const h = makeHarness();

        const code = await h.manager().run([
            "copy",
            "--from",
            "a.txt",
            "--to",
            "dir/",
        ]);

        expect(code).toBe(0);
        expect(h.lines).toEqual(["ok"]);
        expect(h.platform.calls).toEqual([
            { verb: "copy", from: "a.txt\0\0", to: "dir/\0\0", flags: 0x4240 },
        ]);
    });

    it("should print the reason and usage and exit 1 on bad input", async () => {
        const h = makeHarness();

        const code = await h.manager().run([
            "copy",
            "--from",
            "a.txt",
            "--to",
            "x.txt",
            "y.txt",
        ]);

        expect(code).toBe(1);
        expect(h.lines).toEqual([
            "error: number of destination paths cannot be more than number of source paths",
            formatUsage("native-file-ops"),
        ]);
        expect(h.platform.perform).not.toHaveBeenCalled();
    });

    it("should use the configured binary name in the usage text", async () => {
        const h = makeHarness();
        const manager = new FileOpsManager({ ...h.config, binaryName: "fops" });

        await manager.run(["frobnicate"]);

        expect(h.lines).toEqual([
            "error: action must be one of: copy, move, delete",
            formatUsage("fops"),
        ]);
    });

    it("should pass the cancel status through as the exit code", async () => {
        const h = makeHarness({ status: 1223, aborted: false });

        const code = await h
            .manager()
            .run(["delete", "--from", "a.txt", "--show-errors"]);

        expect(code).toBe(1223);
        expect(h.lines).toEqual(["cancelled"]);
        expect(h.dialog.showWarning).not.toHaveBeenCalled();
    });

    it("should pass a failure status through as the exit code", async () => {
        const h = makeHarness({ status: 0x75, aborted: false });

        const code = await h
            .manager()
            .run(["move", "--from", "a.txt", "--to", "b.txt"]);

        expect(code).toBe(0x75);
        expect(h.lines).toEqual([
            "error 0x75: The operation was canceled by the user, or silently canceled if the appropriate flags were supplied to SHFileOperation.",
        ]);
    });
});

describe("FileOpsManager library calls", () => {
    it("should copy with the error dialog on by default", async () => {
        const h = makeHarness({ status: 0x7e, aborted: false });

        const result = await h.manager().copy(" /a.txt ", "/b.txt");

        expect(result).toEqual({
            kind: "failed",
            code: 0x7e,
            message: "The destination path is an existing file.",
        });
        expect(h.platform.calls[0]?.from).toBe("/a.txt\0\0");
        expect(h.dialog.showWarning).toHaveBeenCalledWith(
            "Unable to copy files (ERR 0x7e)",
            "The destination path is an existing file."
        );
    });

    it("should move paired lists without a dialog when turned off", async () => {
        const h = makeHarness({ status: 0x7e, aborted: false });

        await h
            .manager()
            .move(["/a", "/b"], ["/x", "/y"], { showDialogOnError: false });

        expect(h.platform.calls[0]).toEqual({
            verb: "move",
            from: "/a\0/b\0\0",
            to: "/x\0/y\0\0",
            flags: 0x4241,
        });
        expect(h.dialog.showWarning).not.toHaveBeenCalled();
    });

    it("should delete with an empty destination list", async () => {
        const h = makeHarness();

        const result = await h.manager().del(["/a", "/b"]);

        expect(result).toEqual({ kind: "success" });
        expect(h.platform.calls[0]).toEqual({
            verb: "delete",
            from: "/a\0/b\0\0",
            to: "\0",
            flags: 0x4240,
        });
    });

    it("should reject invalid input before reaching the platform", async () => {
        const h = makeHarness();

        await expect(h.manager().copy("/a.txt", "")).rejects.toBeInstanceOf(
            UsageError
        );
        await expect(h.manager().del([])).rejects.toThrowError(
            "at least one source path is required"
        );
        expect(h.platform.perform).not.toHaveBeenCalled();
    });

    it("should never run two platform operations at once", async () => {
        const h = makeHarness();
        let inFlight = 0;
        let maxInFlight = 0;
        const order: string[] = [];

        h.platform.perform.mockImplementation(async (call: PlatformCall) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await new Promise((resolve) => setTimeout(resolve, 5));
            order.push(call.from);
            inFlight--;
            return { status: 0, aborted: false };
        });

        const manager = h.manager();
        const results = await Promise.all([
            manager.copy("/one", "/dir"),
            manager.copy("/two", "/dir"),
            manager.del("/three"),
        ]);

        expect(maxInFlight).toBe(1);
        expect(order).toEqual(["/one\0\0", "/two\0\0", "/three\0\0"]);
        expect(results.map((r) => r.kind)).toEqual([
            "success",
            "success",
            "success",
        ]);
        expect(h.lines).toEqual(["ok", "ok", "ok"]);
    });
});

describe("FileOpsManager with empty path entries", () => {
    const gioManager = () => {
        const h = makeHarness();
        const run = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>();
        run.mockResolvedValue(processResult());
        const manager = new FileOpsManager({
            ...h.config,
            platform: new GioShellPlatform(run),
        });
        return { h, run, manager };
    };

    it("should refuse a delete with an empty source instead of dropping the rest", async () => {
        const { h, run, manager } = gioManager();

        const code = await manager.run(["delete", "--from", "/a", "", "/b"]);

        expect(code).toBe(1);
        expect(h.lines).toEqual([
            "error: source paths cannot be empty",
            formatUsage("native-file-ops"),
        ]);
        expect(run).not.toHaveBeenCalled();
    });

    it("should refuse a paired move with an empty source", async () => {
        const { h, run, manager } = gioManager();

        const code = await manager.run([
            "move",
            "--from",
            "/a",
            "",
            "--to",
            "/x",
            "/y",
        ]);

        expect(code).toBe(1);
        expect(h.lines[0]).toBe("error: source paths cannot be empty");
        expect(run).not.toHaveBeenCalled();
    });

    it("should reject empty entries given through the API", async () => {
        const { run, manager } = gioManager();

        await expect(manager.del(["/a", "", "/b"])).rejects.toThrowError(
            new UsageError("source paths cannot be empty")
        );
        expect(run).not.toHaveBeenCalled();
    });
});
