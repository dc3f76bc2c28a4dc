import { FileOpsConfig, Logger } from "./types/fileops-config-types";
import { FileOpsManager } from "./file-ops-manager";
import { errorString } from "./core/errors";

export const INTERNAL_FAILURE_EXIT_CODE = 70;

const VERBOSE_ENV = "NATIVE_FILE_OPS_VERBOSE";

export function configFromEnv(env: NodeJS.ProcessEnv): FileOpsConfig {
    const verbose = env[VERBOSE_ENV]?.trim().toLowerCase();
    return {
        verboseLogging: verbose === "1" || verbose === "true",
    };
}

/**
 * Entry point behind the binary. Anything that keeps the request from
 * reaching the platform at all (no engine for this OS, the engine's host
 * program missing) is logged and reported as exit status 70.
 */
export async function runCli(
    tokens: readonly string[],
    config: FileOpsConfig = configFromEnv(process.env)
): Promise<number> {
    const logger: Logger = config.logger ?? console;

    try {
        const manager = new FileOpsManager(config);
        return await manager.run(tokens);
    } catch (error) {
        logger.error(`native-file-ops failed: ${errorString(error)}`);
        return INTERNAL_FAILURE_EXIT_CODE;
    }
}
