import { spawn } from "child_process";

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
}

export interface RunOptions {
    env?: NodeJS.ProcessEnv;
}

export type ProcessRunner = (
    command: string,
    args: readonly string[],
    options?: RunOptions
) => Promise<ProcessResult>;

/**
 * Runs a program to completion. A non-zero exit is a result, not an error;
 * the promise only rejects when the program cannot be started.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
    return new Promise((resolve, reject) => {
        const child = spawn(command, [...args], {
            env: options.env ?? process.env,
            stdio: ["ignore", "pipe", "pipe"],
            windowsHide: true,
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        child.on("error", (error) => {
            reject(
                new Error(`Failed to start ${command}: ${error.message}`, {
                    cause: error,
                })
            );
        });

        child.on("close", (exitCode, signal) => {
            resolve({
                exitCode,
                signal,
                stdout: Buffer.concat(stdout).toString("utf-8"),
                stderr: Buffer.concat(stderr).toString("utf-8"),
            });
        });
    });
};

export const lastLine = (text: string): string | undefined => {
    const lines = text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter(Boolean);
    return lines[lines.length - 1];
};
