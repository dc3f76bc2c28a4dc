import {
    FileOpsConfig,
    Logger,
    OutputFn,
    WithSpanFn,
} from "../types/fileops-config-types";
import {
    DialogCapability,
    FileOperationCapability,
} from "../types/platform-types";
import { isValidLogger } from "../utils/isValidLogger";
import { resolvePlatform } from "../platform";

export const DEFAULT_BINARY_NAME = "native-file-ops";

const stderrLogger: Logger = {
    info: console.error,
    warn: console.warn,
    error: console.error,
};

/**
 ╔════════════════════════════════════════════════════════════════╗
 ║ 🗂️ FILE OPS CONTEXT                                            ║
 ║ Holds the platform capabilities and the shared logging,        ║
 ║ tracing and output plumbing used by every component.           ║
 ╚════════════════════════════════════════════════════════════════╝
 */
export class FileOpsContext {
    public readonly platform: FileOperationCapability;
    public readonly dialog: DialogCapability;
    public readonly logger: Logger;
    public readonly withSpan: WithSpanFn;
    public readonly output: OutputFn;
    public readonly binaryName: string;
    public readonly allowVerboseLogging: boolean;

    constructor(config: FileOpsConfig = {}) {
        // Only look up the native binding when something is missing, so
        // fully injected contexts work on any host.
        if (config.platform && config.dialog) {
            this.platform = config.platform;
            this.dialog = config.dialog;
        } else {
            const native = resolvePlatform(process.platform);
            this.platform = config.platform ?? native.platform;
            this.dialog = config.dialog ?? native.dialog;
        }

        this.logger = isValidLogger(config.logger)
            ? config.logger
            : stderrLogger;

        this.withSpan =
            config.withSpan ?? (async (_n, _m, work) => await work());

        this.output =
            config.output ?? ((line) => void process.stdout.write(`${line}\n`));

        this.binaryName = config.binaryName ?? DEFAULT_BINARY_NAME;
        this.allowVerboseLogging = config.verboseLogging ?? false;
    }

    // ════════════════════════════════════════════════════════════════
    // 🗯 VERBOSE LOG
    // Outputs a verbose-level log message if verbosity is enabled
    // ════════════════════════════════════════════════════════════════
    public verboseLog(message: string, type: "info" | "warn" = "info") {
        if (!this.allowVerboseLogging) return;

        if (type === "warn") {
            this.logger.warn(message);
        } else {
            this.logger.info(message);
        }
    }
}
