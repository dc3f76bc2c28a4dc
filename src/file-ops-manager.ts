import Bottleneck from "bottleneck";
import { FileOpsConfig } from "./types/fileops-config-types";
import {
    CopyOptions,
    DeleteOptions,
    FileOpOptions,
    MoveOptions,
    PathInput,
} from "./types/input-types";
import {
    Action,
    OperationRequest,
    OperationResult,
    exitCodeOf,
} from "./types/operation-types";
import { FileOpsContext } from "./core/context";
import { OperationExecutor } from "./core/operationExecutor";
import { UsageError } from "./core/errors";
import {
    buildRequest,
    formatUsage,
    requestFromInput,
} from "./core/requestBuilder";

export const USAGE_EXIT_CODE = 1;

/**
 * ╔════════════════════════════════════════════════════════════════════════════╗
 * ║ 📦 FILE OPS MANAGER                                                        ║
 * ║ Primary facade for copying, moving and deleting files through the         ║
 * ║ operating system's own file manager engine. Requests are queued so only   ║
 * ║ one platform operation is ever in flight.                                 ║
 * ╚════════════════════════════════════════════════════════════════════════════╝
 */
export class FileOpsManager {
    private readonly sharedContext: FileOpsContext;
    private readonly executor: OperationExecutor;
    private readonly limiter: Bottleneck;

    constructor(config: FileOpsConfig = {}) {
        this.sharedContext = new FileOpsContext(config);
        this.executor = new OperationExecutor(this.sharedContext);
        this.limiter = new Bottleneck({ maxConcurrent: 1 });
    }

    /**
     * Copies the source path(s) to the destination path(s). One destination
     * with several sources is treated as the target folder; otherwise the
     * lists pair up by position. Paths should be absolute.
     * @throws UsageError when the paths cannot form a request.
     */
    public async copy(
        src: PathInput,
        dest: PathInput,
        options?: CopyOptions
    ): Promise<OperationResult> {
        return await this.fromInput("copy", src, dest, options);
    }

    /**
     * Moves the source path(s) to the destination path(s), pairing them the
     * same way as {@link FileOpsManager.copy}.
     * @throws UsageError when the paths cannot form a request.
     */
    public async move(
        src: PathInput,
        dest: PathInput,
        options?: MoveOptions
    ): Promise<OperationResult> {
        return await this.fromInput("move", src, dest, options);
    }

    /**
     * Deletes the source path(s), to the recycle bin or trash where the
     * platform has one.
     * @throws UsageError when no source path is given.
     */
    public async del(
        src: PathInput,
        options?: DeleteOptions
    ): Promise<OperationResult> {
        return await this.fromInput("delete", src, [], options);
    }

    /**
     * Runs a command line such as `copy --from a --to b` and returns the
     * process exit status. Usage problems print the reason and the usage
     * text and return 1.
     */
    public async run(tokens: readonly string[]): Promise<number> {
        let request: OperationRequest;
        try {
            request = buildRequest(tokens);
        } catch (error) {
            if (error instanceof UsageError) {
                this.sharedContext.output(`error: ${error.message}`);
                this.sharedContext.output(
                    formatUsage(this.sharedContext.binaryName)
                );
                return USAGE_EXIT_CODE;
            }
            throw error;
        }

        const result = await this.execute(request);
        return exitCodeOf(result);
    }

    private async fromInput(
        action: Action,
        src: PathInput,
        dest: PathInput,
        options: FileOpOptions = {}
    ): Promise<OperationResult> {
        const { showDialogOnError = true } = options;
        const request = requestFromInput(action, src, dest, showDialogOnError);
        return await this.execute(request);
    }

    private async execute(request: OperationRequest): Promise<OperationResult> {
        return await this.limiter.schedule(() =>
            this.executor.execute(request)
        );
    }
}
