import { Buffer } from "buffer";

// Windows wide strings are UTF-16LE; argv and env only carry text safely
// as base64 of those bytes.
export const toWideBase64 = (text: string): string => {
    return Buffer.from(text, "utf16le").toString("base64");
};

export const fromWideBase64 = (encoded: string): string => {
    return Buffer.from(encoded, "base64").toString("utf16le");
};
