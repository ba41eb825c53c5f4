import { Interpreter, NativeValue } from "@rift/core";
import { io } from "./packages/io";
import { reflect } from "./packages/reflect";
import { strings } from "./packages/strings";
import { time } from "./packages/time";
import { NativePackage } from "./types";

export * from "./types";
export { native } from "./utils/native";
export { createInput, readStdinLine } from "./packages/io";

export const packages: Record<string, NativePackage> = {
    "rift/io": io,
    "rift/reflect": reflect,
    "rift/strings": strings,
    "rift/time": time,
};

/** Every standard native, in registration order. */
export const stdlib: NativeValue[] = Object.values(packages).flatMap((pkg) =>
    Object.values(pkg),
);

export function registerStdlib(interpreter: Interpreter) {
    for (const fn of stdlib) {
        interpreter.defineNative(fn);
    }
}
