import { FileOpsManager } from "./file-ops-manager";
import { FileOpsConfig, Logger, OutputFn, WithSpanFn } from "./types/fileops-config-types";

export default FileOpsManager;
export { FileOpsManager };
export type { FileOpsConfig, Logger, OutputFn, WithSpanFn };
export type {
    PathInput,
    FileOpOptions,
    CopyOptions,
    MoveOptions,
    DeleteOptions,
} from "./types/input-types";
export type {
    Action,
    OperationRequest,
    OperationResult,
    SuccessResult,
    CancelledResult,
    FailedResult,
} from "./types/operation-types";
export { exitCodeOf } from "./types/operation-types";
export type {
    DialogCapability,
    ErrorCatalog,
    FileOperationCapability,
    PlatformCall,
    PlatformOutcome,
} from "./types/platform-types";
export { OperationFlags } from "./types/platform-types";
export { UsageError, UnsupportedPlatformError } from "./core/errors";
export { buildRequest, formatUsage } from "./core/requestBuilder";
export { SHELL_FILE_OPERATION_ERRORS } from "./core/errorCatalog";
export { encodePathList, decodePathList } from "./utils/pathList";
export { resolvePlatform } from "./platform";
export { runCli } from "./cli";
