/**
 * Raised by the request builder when the arguments cannot form a request.
 * Always reported together with the usage text and exit status 1.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

export class UnsupportedPlatformError extends Error {
    public readonly platform: string;

    constructor(platform: string) {
        super(`No native file operation backend for platform '${platform}'`);
        this.name = "UnsupportedPlatformError";
        this.platform = platform;
    }
}

export const errorString = (err: unknown): string => {
    return err instanceof Error ? err.message : String(err);
};
