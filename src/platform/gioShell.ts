import os from "os";
import path from "path";
import {
    DialogCapability,
    FileOperationCapability,
    OperationFlags,
    PlatformCall,
    PlatformOutcome,
} from "../types/platform-types";
import { EMPTY_ERROR_CATALOG } from "../core/errorCatalog";
import { decodePathList } from "../utils/pathList";
import { ProcessResult, ProcessRunner, lastLine, runProcess } from "./runProcess";

const SIGNAL_EXIT_BASE = 128;

// A step stopped by one of these was interrupted by the user
const USER_SIGNALS: ReadonlySet<string> = new Set([
    "SIGINT",
    "SIGTERM",
    "SIGHUP",
]);

export const GIO_CANCELLED = SIGNAL_EXIT_BASE + os.constants.signals.SIGINT;

// G_IO_ERROR_WOULD_RECURSE: gio copy has no recursive mode
const WOULD_RECURSE_PATTERN = /recursively copy directory/i;

/**
 ╔════════════════════════════════════════════════════════════════╗
 ║ 🐧 GIO SHELL                                                   ║
 ║ Drives GLib's gio tool, the layer GNOME Files and most Linux   ║
 ║ file managers use for copy, move and trash.                    ║
 ╚════════════════════════════════════════════════════════════════╝
 */
export class GioShellPlatform implements FileOperationCapability {
    public readonly name = "gio";
    public readonly cancelledStatus = GIO_CANCELLED;
    public readonly errorCatalog = EMPTY_ERROR_CATALOG;

    constructor(
        private readonly run: ProcessRunner = runProcess,
        private readonly executable = "gio"
    ) {}

    public async perform(call: PlatformCall): Promise<PlatformOutcome> {
        for (const step of planGioSteps(call)) {
            const result = await this.run(this.executable, step);
            const outcome = toOutcome(result);
            if (outcome.status !== 0 || outcome.aborted) {
                return step[0] === "copy"
                    ? explainCopyFailure(outcome, step)
                    : outcome;
            }
        }

        return { status: 0, aborted: false };
    }

    public async lookupSystemMessage(
        code: number
    ): Promise<string | undefined> {
        const signal = signalName(code - SIGNAL_EXIT_BASE);
        return signal ? `Terminated by ${signal}` : undefined;
    }
}

// ════════════════════════════════════════════════════════════════
// 🗺️ PLAN STEPS
// One gio invocation per step, run in order until one fails
// ════════════════════════════════════════════════════════════════
export function planGioSteps(call: PlatformCall): string[][] {
    const sources = decodePathList(call.from);
    const targets = decodePathList(call.to);
    const makeFolders = (call.flags & OperationFlags.NoConfirmMkdir) !== 0;

    if (call.verb === "delete") {
        const recoverable = (call.flags & OperationFlags.AllowUndo) !== 0;
        return [[recoverable ? "trash" : "remove", "--", ...sources]];
    }

    const steps: string[][] = [];

    if ((call.flags & OperationFlags.MultiDestFiles) !== 0) {
        sources.forEach((source, i) => {
            const target = targets[i];
            if (target === undefined) return;
            if (makeFolders) {
                steps.push(["mkdir", "-p", "--", path.posix.dirname(target)]);
            }
            steps.push([call.verb, "--", source, target]);
        });
        return steps;
    }

    const target = targets[0];
    if (target === undefined) {
        return steps;
    }

    if (makeFolders) {
        // Several sources always land inside the target; a single one may
        // be renamed to it, so only its parent has to exist.
        const folder = sources.length > 1 ? target : path.posix.dirname(target);
        steps.push(["mkdir", "-p", "--", folder]);
    }
    steps.push([call.verb, "--", ...sources, target]);

    return steps;
}

const toOutcome = (result: ProcessResult): PlatformOutcome => {
    if (result.signal) {
        const signo = os.constants.signals[result.signal];
        return {
            status: SIGNAL_EXIT_BASE + signo,
            aborted: USER_SIGNALS.has(result.signal),
            detail: lastLine(result.stderr),
        };
    }

    return {
        status: result.exitCode ?? 1,
        aborted: false,
        detail: result.exitCode === 0 ? undefined : lastLine(result.stderr),
    };
};

const explainCopyFailure = (
    outcome: PlatformOutcome,
    step: readonly string[]
): PlatformOutcome => {
    if (!outcome.detail || !WOULD_RECURSE_PATTERN.test(outcome.detail)) {
        return outcome;
    }

    // step is ["copy", "--", ...sources, target]
    const sources = step.slice(2, -1);
    return {
        ...outcome,
        detail: `gio cannot copy folders; ${sources.join(
            ", "
        )} must be copied file by file`,
    };
};

const signalName = (signo: number): string | undefined => {
    const entry = Object.entries(os.constants.signals).find(
        ([, value]) => value === signo
    );
    return entry?.[0];
};

export class ZenityDialog implements DialogCapability {
    constructor(
        private readonly run: ProcessRunner = runProcess,
        private readonly executable = "zenity"
    ) {}

    public async showWarning(title: string, body: string): Promise<void> {
        const result = await this.run(this.executable, [
            "--warning",
            "--no-markup",
            "--title",
            title,
            "--text",
            body,
        ]);

        if (result.exitCode !== 0) {
            throw new Error(
                `${this.executable} exited with ${
                    result.exitCode ?? result.signal
                }: ${lastLine(result.stderr) ?? "no error output"}`
            );
        }
    }
}
