import { NativeSignature, NativeValue, RuntimeValue } from "@rift/core";

export type { NativeSignature, NativeValue, RuntimeValue };

export type NativeImplementation = (...args: RuntimeValue[]) => RuntimeValue;

/** A named group of natives, registered into the global frame together. */
export type NativePackage = Record<string, NativeValue>;
