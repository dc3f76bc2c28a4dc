import { z } from "zod";
import { UsageError } from "./errors";
import {
    ACTIONS,
    Action,
    OperationRequest,
    isAction,
} from "../types/operation-types";

export interface ParsedArguments {
    action: string;
    sources: string[];
    destinations: string[];
    showErrorDialog: boolean;
}

type Section = "action" | "from" | "to";

const FROM_MARKER = "--from";
const TO_MARKER = "--to";
const SHOW_ERRORS_FLAG = "--show-errors";

const PathInputSchema = z.union([z.string(), z.array(z.string())]).nullish();

/**
 ╔════════════════════════════════════════════════════════════════╗
 ║ 🧱 REQUEST BUILDER                                             ║
 ║ Turns raw tokens or API input into a validated, frozen         ║
 ║ OperationRequest. Rejections are UsageErrors.                  ║
 ╚════════════════════════════════════════════════════════════════╝
 */

// ════════════════════════════════════════════════════════════════
// ✂️ PARSE ARGUMENTS
// Sorts tokens into the action, --from and --to buckets
// ════════════════════════════════════════════════════════════════
export function parseArguments(tokens: readonly string[]): ParsedArguments {
    const parsed: ParsedArguments = {
        action: "",
        sources: [],
        destinations: [],
        showErrorDialog: false,
    };

    let section: Section = "action";
    let actionSeen = false;

    for (const token of tokens) {
        if (token === FROM_MARKER) {
            section = "from";
            continue;
        } else if (token === TO_MARKER) {
            section = "to";
            continue;
        } else if (token === SHOW_ERRORS_FLAG) {
            parsed.showErrorDialog = true;
            continue;
        } else if (token.startsWith("--")) {
            // Unknown flag, reserved for later use
            continue;
        }

        switch (section) {
            case "action":
                if (!actionSeen) {
                    parsed.action = token;
                    actionSeen = true;
                }
                break;
            case "from":
                parsed.sources.push(token);
                break;
            case "to":
                parsed.destinations.push(token);
                break;
        }
    }

    return parsed;
}

// ════════════════════════════════════════════════════════════════
// ✅ VALIDATE ARGUMENTS
// Checks the rules in order; the first one broken is reported
// ════════════════════════════════════════════════════════════════
export function validateArguments(parsed: ParsedArguments): OperationRequest {
    const { action, sources, destinations, showErrorDialog } = parsed;

    if (action === "") {
        throw new UsageError("action is required");
    }

    if (!isAction(action)) {
        throw new UsageError(`action must be one of: ${ACTIONS.join(", ")}`);
    }

    if (sources.length === 0) {
        throw new UsageError("at least one source path is required");
    }

    if (action === "delete") {
        if (destinations.length > 0) {
            throw new UsageError(
                "cannot specify destination path when action is delete"
            );
        }
    } else if (destinations.length === 0) {
        throw new UsageError(
            "at least one destination path is required when action is not delete"
        );
    }

    if (destinations.length > sources.length) {
        throw new UsageError(
            "number of destination paths cannot be more than number of source paths"
        );
    }

    if (
        sources.length > 1 &&
        destinations.length > 1 &&
        sources.length !== destinations.length
    ) {
        throw new UsageError(
            "number of source and destination paths must match when more than one destination path is specified"
        );
    }

    if (sources.some((p) => p.length === 0)) {
        throw new UsageError("source paths cannot be empty");
    }

    if (destinations.some((p) => p.length === 0)) {
        throw new UsageError("destination paths cannot be empty");
    }

    return Object.freeze({
        action,
        sources: Object.freeze([...sources]),
        destinations: Object.freeze([...destinations]),
        showErrorDialog,
    });
}

export function buildRequest(tokens: readonly string[]): OperationRequest {
    return validateArguments(parseArguments(tokens));
}

// ════════════════════════════════════════════════════════════════
// 📥 REQUEST FROM INPUT
// Library entry: a path or list of paths per side
// ════════════════════════════════════════════════════════════════
export function requestFromInput(
    action: Action,
    src: unknown,
    dest: unknown,
    showErrorDialog: boolean
): OperationRequest {
    return validateArguments({
        action,
        sources: toPathList(src, "source"),
        destinations: toPathList(dest, "destination"),
        showErrorDialog,
    });
}

const toPathList = (input: unknown, side: string): string[] => {
    const result = PathInputSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new UsageError(
            `invalid ${side} path input: ${issue?.message ?? "unknown"}`
        );
    }

    const value = result.data;
    if (value == null) {
        return [];
    }

    if (typeof value === "string") {
        const trimmed = value.trim();
        return trimmed.length > 0 ? [trimmed] : [];
    }

    return [...value];
};

// ════════════════════════════════════════════════════════════════
// 📖 USAGE
// ════════════════════════════════════════════════════════════════
export function formatUsage(binaryName: string): string {
    return [
        "",
        `usage: (action is one of: ${ACTIONS.join(", ")})`,
        `  ${binaryName} <action> --from <sourcePath> [sourcePath]* --to <directoryPath> [--show-errors]`,
        `  ${binaryName} <action> --from <sourcePath> [sourcePath]* --to <destPath> [destPath]* [--show-errors]`,
        `  ${binaryName} delete --from <sourcePath> [sourcePath]* [--show-errors]`,
    ].join("\n");
}
