import {
    DialogCapability,
    FileOperationCapability,
    PlatformCall,
    PlatformOutcome,
} from "../types/platform-types";
import { Action } from "../types/operation-types";
import { SHELL_FILE_OPERATION_ERRORS } from "../core/errorCatalog";
import { fromWideBase64, toWideBase64 } from "../utils/platformText";
import { ProcessRunner, lastLine, runProcess } from "./runProcess";

export const ERROR_CANCELLED = 1223;

// SHFILEOPSTRUCT.wFunc
const FILE_FUNCTIONS: Record<Action, number> = {
    move: 0x1,
    copy: 0x2,
    delete: 0x3,
};

const ENV_PREFIX = "NATIVE_FILE_OPS_";

const WIDE_TEXT_HELPER = `
function Read-WideText([string]$value) {
    [Text.Encoding]::Unicode.GetString([Convert]::FromBase64String($value))
}
function Write-WideText([string]$value) {
    [Console]::Out.Write([Convert]::ToBase64String([Text.Encoding]::Unicode.GetBytes($value)))
}
`;

const FILE_OPERATION_SCRIPT = `
$ErrorActionPreference = 'Stop'
Add-Type -TypeDefinition @'
using System;
using System.Runtime.InteropServices;

public static class NativeFileOps
{
    [StructLayout(LayoutKind.Sequential, CharSet = CharSet.Unicode)]
    public struct SHFILEOPSTRUCT
    {
        public IntPtr hwnd;
        public uint wFunc;
        public string pFrom;
        public string pTo;
        public ushort fFlags;
        [MarshalAs(UnmanagedType.Bool)]
        public bool fAnyOperationsAborted;
        public IntPtr hNameMappings;
        public string lpszProgressTitle;
    }

    [DllImport("shell32.dll", CharSet = CharSet.Unicode)]
    public static extern int SHFileOperation(ref SHFILEOPSTRUCT lpFileOp);
}
'@
${WIDE_TEXT_HELPER}
$op = New-Object NativeFileOps+SHFILEOPSTRUCT
$op.wFunc = [uint32]$env:${ENV_PREFIX}FUNC
$op.pFrom = Read-WideText $env:${ENV_PREFIX}FROM
$op.pTo = Read-WideText $env:${ENV_PREFIX}TO
$op.fFlags = [uint16]$env:${ENV_PREFIX}FLAGS
$status = [NativeFileOps]::SHFileOperation([ref]$op)
[Console]::Out.Write("$status $([int]$op.fAnyOperationsAborted)")
`;

// FORMAT_MESSAGE_FROM_SYSTEM | FORMAT_MESSAGE_IGNORE_INSERTS
const FORMAT_MESSAGE_FLAGS = 0x1000 | 0x200;

// Prints nothing when the system has no text for the code
const SYSTEM_MESSAGE_SCRIPT = `
$ErrorActionPreference = 'Stop'
Add-Type -TypeDefinition @'
using System;
using System.Runtime.InteropServices;
using System.Text;

public static class NativeSystemMessage
{
    [DllImport("kernel32.dll", CharSet = CharSet.Unicode)]
    public static extern uint FormatMessage(uint dwFlags, IntPtr lpSource, uint dwMessageId, uint dwLanguageId, StringBuilder lpBuffer, uint nSize, IntPtr Arguments);
}
'@
${WIDE_TEXT_HELPER}
$buffer = New-Object System.Text.StringBuilder 4096
$length = [NativeSystemMessage]::FormatMessage(${FORMAT_MESSAGE_FLAGS}, [IntPtr]::Zero, [uint32]$env:${ENV_PREFIX}CODE, 0, $buffer, [uint32]$buffer.Capacity, [IntPtr]::Zero)
if ($length -gt 0) {
    Write-WideText $buffer.ToString(0, [int]$length)
}
`;

const DIALOG_SCRIPT = `
$ErrorActionPreference = 'Stop'
Add-Type -AssemblyName System.Windows.Forms
${WIDE_TEXT_HELPER}
$title = Read-WideText $env:${ENV_PREFIX}TITLE
$body = Read-WideText $env:${ENV_PREFIX}BODY
[void][System.Windows.Forms.MessageBox]::Show($body, $title, 'OK', 'Warning')
`;

const OUTCOME_PATTERN = /^(-?\d+) ([01])$/;

/**
 ╔════════════════════════════════════════════════════════════════╗
 ║ 🪟 WINDOWS SHELL                                               ║
 ║ Hands the request to shell32's SHFileOperationW, the engine    ║
 ║ behind Explorer's copy, move and recycle bin.                  ║
 ╚════════════════════════════════════════════════════════════════╝
 */
export class WindowsShellPlatform implements FileOperationCapability {
    public readonly name = "windows-shell";
    public readonly cancelledStatus = ERROR_CANCELLED;
    public readonly errorCatalog = SHELL_FILE_OPERATION_ERRORS;

    constructor(
        private readonly run: ProcessRunner = runProcess,
        private readonly executable = "powershell.exe"
    ) {}

    public async perform(call: PlatformCall): Promise<PlatformOutcome> {
        const stdout = await runPowerShell(
            this.run,
            this.executable,
            FILE_OPERATION_SCRIPT,
            {
                FUNC: String(FILE_FUNCTIONS[call.verb]),
                FROM: toWideBase64(call.from),
                TO: toWideBase64(call.to),
                FLAGS: String(call.flags),
            }
        );

        const match = OUTCOME_PATTERN.exec(stdout.trim());
        if (!match) {
            throw new Error(
                `Unexpected output from SHFileOperation host: ${JSON.stringify(
                    stdout
                )}`
            );
        }

        return {
            status: Number(match[1]),
            aborted: match[2] === "1",
        };
    }

    public async lookupSystemMessage(
        code: number
    ): Promise<string | undefined> {
        const stdout = await runPowerShell(
            this.run,
            this.executable,
            SYSTEM_MESSAGE_SCRIPT,
            { CODE: String(code >>> 0) }
        );
        const message = fromWideBase64(stdout.trim()).trim();
        return message || undefined;
    }
}

export class WindowsMessageBox implements DialogCapability {
    constructor(
        private readonly run: ProcessRunner = runProcess,
        private readonly executable = "powershell.exe"
    ) {}

    public async showWarning(title: string, body: string): Promise<void> {
        await runPowerShell(this.run, this.executable, DIALOG_SCRIPT, {
            TITLE: toWideBase64(title),
            BODY: toWideBase64(body),
        });
    }
}

export const powerShellArgs = (script: string): string[] => [
    "-NoProfile",
    "-NonInteractive",
    "-ExecutionPolicy",
    "Bypass",
    "-EncodedCommand",
    toWideBase64(script),
];

async function runPowerShell(
    run: ProcessRunner,
    executable: string,
    script: string,
    variables: Record<string, string>
): Promise<string> {
    const env: NodeJS.ProcessEnv = { ...process.env };
    for (const [key, value] of Object.entries(variables)) {
        env[`${ENV_PREFIX}${key}`] = value;
    }

    const result = await run(executable, powerShellArgs(script), { env });
    if (result.exitCode !== 0) {
        throw new Error(
            `${executable} exited with ${
                result.exitCode ?? result.signal
            }: ${lastLine(result.stderr) ?? "no error output"}`
        );
    }

    return result.stdout;
}
