import { FileOpsContext } from "./context";
import { resolveErrorMessage } from "./errorCatalog";
import { errorString } from "./errors";
import {
    OperationRequest,
    OperationResult,
} from "../types/operation-types";
import {
    OperationFlags,
    PlatformCall,
    PlatformOutcome,
} from "../types/platform-types";
import { encodePathList } from "../utils/pathList";
import { formatHex } from "../utils/formatHex";

const BASE_FLAGS =
    OperationFlags.AllowUndo |
    OperationFlags.NoConfirmMkdir |
    OperationFlags.WantNukeWarning;

export type OutcomeKind = OperationResult["kind"];

/**
 * Every status lands in exactly one bucket. The abort flag and the
 * platform's cancel code win over a zero status.
 */
export function classifyOutcome(
    outcome: PlatformOutcome,
    cancelledStatus: number
): OutcomeKind {
    if (outcome.aborted || outcome.status === cancelledStatus) {
        return "cancelled";
    }
    if (outcome.status === 0) {
        return "success";
    }
    return "failed";
}

export function buildPlatformCall(request: OperationRequest): PlatformCall {
    let flags: number = BASE_FLAGS;
    if (request.destinations.length > 1) {
        flags |= OperationFlags.MultiDestFiles;
    }

    return {
        verb: request.action,
        from: encodePathList(request.sources),
        to: encodePathList(request.destinations),
        flags,
    };
}

export function formatResultLine(result: OperationResult): string {
    switch (result.kind) {
        case "success":
            return "ok";
        case "cancelled":
            return "cancelled";
        case "failed":
            return `error ${formatHex(result.code)}: ${result.message}`;
    }
}

export function dialogTitle(request: OperationRequest, code: number): string {
    return `Unable to ${request.action} files (ERR ${formatHex(code)})`;
}

/**
 ╔════════════════════════════════════════════════════════════════╗
 ║ ⚙️ OPERATION EXECUTOR                                          ║
 ║ Runs one validated request through the platform engine and     ║
 ║ reports ok, cancelled or error on the output sink.             ║
 ╚════════════════════════════════════════════════════════════════╝
 */
export class OperationExecutor {
    private ctx: FileOpsContext;

    constructor(context: FileOpsContext) {
        this.ctx = context;
    }

    public async execute(request: OperationRequest): Promise<OperationResult> {
        return await this.ctx.withSpan(
            "FileOps.execute",
            {
                platform: this.ctx.platform.name,
                action: request.action,
                sources: request.sources.length,
                destinations: request.destinations.length,
            },
            async () => {
                const call = buildPlatformCall(request);

                this.ctx.verboseLog(
                    `Requesting ${request.action} of ${
                        request.sources.length
                    } path(s) from ${this.ctx.platform.name} (flags ${formatHex(
                        call.flags
                    )})`
                );

                const outcome = await this.ctx.platform.perform(call);

                this.ctx.verboseLog(
                    `${this.ctx.platform.name} returned status ${
                        outcome.status
                    }${outcome.aborted ? " (aborted)" : ""}`,
                    outcome.status === 0 && !outcome.aborted ? "info" : "warn"
                );

                const result = await this.toResult(outcome);
                await this.report(request, result);
                return result;
            }
        );
    }

    // ════════════════════════════════════════════════════════════════
    // 🏷️ TO RESULT
    // Classifies the platform outcome and resolves the error text
    // ════════════════════════════════════════════════════════════════
    private async toResult(outcome: PlatformOutcome): Promise<OperationResult> {
        const { platform } = this.ctx;

        switch (classifyOutcome(outcome, platform.cancelledStatus)) {
            case "cancelled":
                return { kind: "cancelled", status: outcome.status };
            case "success":
                return { kind: "success" };
            case "failed": {
                const message = await resolveErrorMessage(
                    outcome.status,
                    platform.errorCatalog,
                    outcome.detail,
                    (code) => this.lookupSystemMessage(code)
                );
                return { kind: "failed", code: outcome.status, message };
            }
        }
    }

    private async lookupSystemMessage(
        code: number
    ): Promise<string | undefined> {
        try {
            return await this.ctx.platform.lookupSystemMessage(code);
        } catch (error) {
            this.ctx.logger.warn(
                `System message lookup for ${formatHex(
                    code
                )} failed: ${errorString(error)}`
            );
            return undefined;
        }
    }

    // ════════════════════════════════════════════════════════════════
    // 📣 REPORT
    // Shows the error dialog when asked to, then writes the result line
    // ════════════════════════════════════════════════════════════════
    private async report(
        request: OperationRequest,
        result: OperationResult
    ): Promise<void> {
        if (result.kind === "failed" && request.showErrorDialog) {
            try {
                await this.ctx.dialog.showWarning(
                    dialogTitle(request, result.code),
                    result.message
                );
            } catch (error) {
                this.ctx.logger.warn(
                    `Could not show error dialog: ${errorString(error)}`
                );
            }
        }

        this.ctx.output(formatResultLine(result));
    }
}
