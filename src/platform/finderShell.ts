import {
    DialogCapability,
    FileOperationCapability,
    OperationFlags,
    PlatformCall,
    PlatformOutcome,
} from "../types/platform-types";
import { EMPTY_ERROR_CATALOG } from "../core/errorCatalog";
import { decodePathList } from "../utils/pathList";
import { ProcessRunner, lastLine, runProcess } from "./runProcess";

// |userCanceledErr| (-128)
export const FINDER_CANCELLED = 128;

const FILE_OPERATION_SCRIPT = `
on run argv
    set verb to item 1 of argv
    set pairwise to (item 2 of argv) is "1"
    set makeFolders to (item 3 of argv) is "1"
    set sourceCount to (item 4 of argv) as integer
    set sourcePaths to items 5 thru (4 + sourceCount) of argv
    if (count of argv) > (4 + sourceCount) then
        set targetPaths to items (5 + sourceCount) thru -1 of argv
    else
        set targetPaths to {}
    end if
    try
        if verb is "delete" then
            set doomed to my itemsFor(sourcePaths)
            tell application "Finder" to delete doomed
        else if pairwise or (count of sourcePaths) is 1 then
            repeat with i from 1 to count of sourcePaths
                if pairwise then
                    set targetPath to item i of targetPaths
                else
                    set targetPath to item 1 of targetPaths
                end if
                my placeItem(verb, item i of sourcePaths, targetPath, makeFolders)
            end repeat
        else
            set sourceItems to my itemsFor(sourcePaths)
            set targetFolder to my folderFor(item 1 of targetPaths, makeFolders)
            tell application "Finder"
                if verb is "copy" then
                    duplicate sourceItems to targetFolder
                else
                    move sourceItems to targetFolder
                end if
            end tell
        end if
        return "0"
    on error errMsg number errNum
        return (errNum as text) & tab & errMsg
    end try
end run

on itemsFor(posixPaths)
    set found to {}
    repeat with p in posixPaths
        set end of found to (POSIX file (contents of p)) as alias
    end repeat
    return found
end itemsFor

on folderFor(posixPath, makeFolders)
    if makeFolders then do shell script "mkdir -p " & quoted form of posixPath
    return (POSIX file posixPath) as alias
end folderFor

on isDirectory(posixPath)
    try
        do shell script "test -d " & quoted form of posixPath
        return true
    on error
        return false
    end try
end isDirectory

on placeItem(verb, sourcePath, targetPath, makeFolders)
    set sourceItem to (POSIX file sourcePath) as alias
    set newName to missing value
    if my isDirectory(targetPath) then
        set targetFolder to (POSIX file targetPath) as alias
    else
        set parentPath to do shell script "dirname " & quoted form of targetPath
        set newName to do shell script "basename " & quoted form of targetPath
        set targetFolder to my folderFor(parentPath, makeFolders)
    end if
    tell application "Finder"
        if verb is "copy" then
            set placed to duplicate sourceItem to targetFolder
        else
            set placed to move sourceItem to targetFolder
        end if
        if newName is not missing value then
            if name of placed is not newName then set name of placed to newName
        end if
    end tell
end placeItem
`;

const DIALOG_SCRIPT = `
on run argv
    display dialog (item 2 of argv) with title (item 1 of argv) buttons {"OK"} default button 1 with icon caution
end run
`;

const OUTCOME_PATTERN = /^(-?\d+)(?:\t([\s\S]*))?$/;

/**
 ╔════════════════════════════════════════════════════════════════╗
 ║ 🍎 FINDER SHELL                                                ║
 ║ Asks Finder to duplicate, move or trash the items so the user  ║
 ║ gets Finder's own progress, conflict and undo handling.        ║
 ╚════════════════════════════════════════════════════════════════╝
 */
export class FinderShellPlatform implements FileOperationCapability {
    public readonly name = "finder";
    public readonly cancelledStatus = FINDER_CANCELLED;
    public readonly errorCatalog = EMPTY_ERROR_CATALOG;

    constructor(
        private readonly run: ProcessRunner = runProcess,
        private readonly executable = "osascript"
    ) {}

    public async perform(call: PlatformCall): Promise<PlatformOutcome> {
        const result = await this.run(this.executable, finderArgs(call));
        if (result.exitCode !== 0) {
            throw new Error(
                `${this.executable} exited with ${
                    result.exitCode ?? result.signal
                }: ${lastLine(result.stderr) ?? "no error output"}`
            );
        }

        const match = OUTCOME_PATTERN.exec(result.stdout.trim());
        if (!match) {
            throw new Error(
                `Unexpected output from Finder script: ${JSON.stringify(
                    result.stdout
                )}`
            );
        }

        // AppleScript errors are negative; exit statuses are not
        const status = Math.abs(Number(match[1]));
        return {
            status,
            aborted: false,
            detail: match[2]?.trim() || undefined,
        };
    }

    public async lookupSystemMessage(): Promise<string | undefined> {
        return undefined;
    }
}

export function finderArgs(call: PlatformCall): string[] {
    const sources = decodePathList(call.from);
    const targets = decodePathList(call.to);
    const pairwise = (call.flags & OperationFlags.MultiDestFiles) !== 0;
    const makeFolders = (call.flags & OperationFlags.NoConfirmMkdir) !== 0;

    return [
        "-e",
        FILE_OPERATION_SCRIPT,
        call.verb,
        pairwise ? "1" : "0",
        makeFolders ? "1" : "0",
        String(sources.length),
        ...sources,
        ...targets,
    ];
}

export class FinderDialog implements DialogCapability {
    constructor(
        private readonly run: ProcessRunner = runProcess,
        private readonly executable = "osascript"
    ) {}

    public async showWarning(title: string, body: string): Promise<void> {
        const result = await this.run(this.executable, [
            "-e",
            DIALOG_SCRIPT,
            title,
            body,
        ]);

        if (result.exitCode !== 0) {
            throw new Error(
                `${this.executable} exited with ${
                    result.exitCode ?? result.signal
                }: ${lastLine(result.stderr) ?? "no error output"}`
            );
        }
    }
}
