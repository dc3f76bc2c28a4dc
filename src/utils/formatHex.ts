// Unsigned 32-bit view, so negative statuses print like a DWORD does.
export const formatHex = (code: number): string => {
    return `0x${(code >>> 0).toString(16)}`;
};
