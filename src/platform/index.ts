import { PlatformBinding } from "../types/platform-types";
import { UnsupportedPlatformError } from "../core/errors";
import { FinderDialog, FinderShellPlatform } from "./finderShell";
import { GioShellPlatform, ZenityDialog } from "./gioShell";
import { ProcessRunner, runProcess } from "./runProcess";
import { WindowsMessageBox, WindowsShellPlatform } from "./windowsShell";

/**
 * Picks the native file operation engine and dialog for a platform name as
 * reported by `process.platform`.
 */
export function resolvePlatform(
    platformName: string,
    run: ProcessRunner = runProcess
): PlatformBinding {
    switch (platformName) {
        case "win32":
            return {
                platform: new WindowsShellPlatform(run),
                dialog: new WindowsMessageBox(run),
            };
        case "darwin":
            return {
                platform: new FinderShellPlatform(run),
                dialog: new FinderDialog(run),
            };
        case "linux":
        case "freebsd":
        case "openbsd":
            return {
                platform: new GioShellPlatform(run),
                dialog: new ZenityDialog(run),
            };
        default:
            throw new UnsupportedPlatformError(platformName);
    }
}

export { runProcess };
export type { ProcessRunner };
