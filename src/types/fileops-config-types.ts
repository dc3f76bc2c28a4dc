import type {
    DialogCapability,
    FileOperationCapability,
} from "./platform-types";

export interface FileOpsConfig {
    platform?: FileOperationCapability; // Defaults to the adapter for process.platform
    dialog?: DialogCapability;
    output?: OutputFn;
    logger?: Logger;
    verboseLogging?: boolean;
    withSpan?: WithSpanFn;
    binaryName?: string; // Shown in usage text
}

// Optional custom logging plugin
export interface Logger {
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
}

// Receives each result line without its trailing newline
export type OutputFn = (line: string) => void;

// Optional tracer plugin
export type WithSpanFn = <T>(
    name: string,
    metadata: Record<string, unknown>,
    fn: () => Promise<T>
) => Promise<T>;
