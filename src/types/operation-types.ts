export const ACTIONS = ["copy", "move", "delete"] as const;

export type Action = (typeof ACTIONS)[number];

export const isAction = (value: string): value is Action => {
    return value === "copy" || value === "move" || value === "delete";
};

export type PathList = readonly string[];

export interface OperationRequest {
    readonly action: Action;
    readonly sources: PathList;
    readonly destinations: PathList;
    readonly showErrorDialog: boolean;
}

export interface SuccessResult {
    kind: "success";
}

export interface CancelledResult {
    kind: "cancelled";
    status: number;
}

export interface FailedResult {
    kind: "failed";
    code: number;
    message: string;
}

export type OperationResult = SuccessResult | CancelledResult | FailedResult;

export const exitCodeOf = (result: OperationResult): number => {
    switch (result.kind) {
        case "success":
            return 0;
        case "cancelled":
            return result.status;
        case "failed":
            return result.code;
    }
};
