import { Action } from "./operation-types";

export type ErrorCatalog = ReadonlyMap<number, string>;

/**
 * Behaviour flags handed to the platform. Values match shell32's FOF_* bits
 * so the Windows adapter can pass them through untouched.
 */
export const OperationFlags = {
    MultiDestFiles: 0x0001,
    AllowUndo: 0x0040,
    NoConfirmMkdir: 0x0200,
    WantNukeWarning: 0x4000,
} as const;

export interface PlatformCall {
    verb: Action;
    from: string; // encoded path list
    to: string; // encoded path list, "\0" when empty
    flags: number;
}

export interface PlatformOutcome {
    status: number;
    aborted: boolean;
    detail?: string;
}

export interface FileOperationCapability {
    readonly name: string;
    readonly cancelledStatus: number;
    readonly errorCatalog: ErrorCatalog;
    perform(call: PlatformCall): Promise<PlatformOutcome>;
    lookupSystemMessage(code: number): Promise<string | undefined>;
}

export interface DialogCapability {
    showWarning(title: string, body: string): Promise<void>;
}

export interface PlatformBinding {
    platform: FileOperationCapability;
    dialog: DialogCapability;
}
