export type PathInput = string | string[];

export interface FileOpOptions {
    /**
     * Show the user an error dialog if the operation fails.
     * @default true
     */
    showDialogOnError?: boolean;
}

export interface CopyOptions extends FileOpOptions {}

export interface MoveOptions extends FileOpOptions {}

export interface DeleteOptions extends FileOpOptions {}
