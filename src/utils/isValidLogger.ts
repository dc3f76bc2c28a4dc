/**
 * Type guard to validate a logger implements the Logger interface.
 */

import { Logger } from "../types/fileops-config-types";

export const isValidLogger = (obj: unknown): obj is Logger => {
    if (
        typeof obj === "object" &&
        obj !== null &&
        "info" in obj &&
        "warn" in obj &&
        "error" in obj &&
        typeof obj.info === "function" &&
        typeof obj.warn === "function" &&
        typeof obj.error === "function"
    ) {
        return true;
    } else if (obj != null) {
        console.error(
            `Invalid \`logger\` provided (type: ${typeof obj}); ` +
                `it must have \`info\`, \`warn\`, and \`error\` methods. ` +
                `Using default stderr logger instead.`
        );
    }
    return false;
};
