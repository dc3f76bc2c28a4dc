import { PathList } from "../types/operation-types";

const TERMINATOR = "\0";

/**
 * Encodes paths as a double-null-terminated list: each entry ends with a
 * NUL and the list ends with one more. An empty list encodes to a single NUL.
 * Empty entries are refused: they would read back as the end of the list.
 */
export const encodePathList = (paths: PathList): string => {
    for (const p of paths) {
        if (p.length === 0) {
            throw new TypeError("Path list entries cannot be empty");
        }
        if (p.includes(TERMINATOR)) {
            throw new TypeError(
                `Path contains a NUL character and cannot be encoded: ${JSON.stringify(
                    p
                )}`
            );
        }
    }

    return paths.map((p) => p + TERMINATOR).join("") + TERMINATOR;
};

/**
 * Reads entries up to the first empty one, the way shell32 walks pFrom/pTo.
 */
export const decodePathList = (encoded: string): string[] => {
    const paths: string[] = [];
    let start = 0;

    while (start < encoded.length) {
        const end = encoded.indexOf(TERMINATOR, start);
        if (end === -1 || end === start) break;
        paths.push(encoded.slice(start, end));
        start = end + 1;
    }

    return paths;
};
