import * as fs from "fs";
import { NIL, NativeValue, str, stringify } from "@rift/core";
import { NativePackage } from "../types";
import { native } from "../utils/native";

const STDIN_FD = 0;
const RETRY_DELAY_MS = 10;

function sleepSync(ms: number) {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function isErrno(e: unknown, code: string): boolean {
    return e instanceof Error && "code" in e && e.code === code;
}

/**
 * Read one line from stdin synchronously, without the line ending
 * @returns the line, or null at end of input
 */
export function readStdinLine(): string | null {
    const buffer = Buffer.alloc(1);
    const bytes: number[] = [];

    while (true) {
        let read: number;
        try {
            read = fs.readSync(STDIN_FD, buffer, 0, 1, null);
        } catch (e) {
            // Non-blocking stdin with nothing buffered yet
            if (isErrno(e, "EAGAIN")) {
                sleepSync(RETRY_DELAY_MS);
                continue;
            }
            if (isErrno(e, "EOF")) break;
            throw e;
        }

        if (read === 0) break;
        if (buffer[0] === 0x0a) {
            return Buffer.from(bytes).toString("utf8").replace(/\r$/, "");
        }
        bytes.push(buffer[0]);
    }

    if (bytes.length === 0) return null;
    return Buffer.from(bytes).toString("utf8").replace(/\r$/, "");
}

/**
 * Build the `input` native over a line source and a prompt writer.
 */
export function createInput(
    readLine: () => string | null,
    write: (text: string) => void,
): NativeValue {
    return native(
        "input",
        (prompt) => {
            write(stringify(prompt));
            const line = readLine();
            return line === null ? NIL : str(line);
        },
        {
            params: [{ name: "prompt", description: "text shown before reading" }],
            description: "Read a line from stdin",
        },
    );
}

export const io: NativePackage = {
    /**
     * Write a prompt and read a line from stdin
     * @returns the line, or nil at end of input
     */
    input: createInput(readStdinLine, (text) => {
        process.stdout.write(text);
    }),
};
