import { NativeSignature, NativeValue } from "@rift/core";
import { NativeImplementation } from "../types";

/**
 * Define a native function. Its arity is the number of params in the
 * signature.
 * @param name Global name the function is registered under
 * @param fn Implementation
 * @param signature Signature metadata
 */
export function native(
    name: string,
    fn: NativeImplementation,
    signature: NativeSignature,
): NativeValue {
    return {
        type: "native",
        name,
        arity: signature.params.length,
        call: (args) => fn(...args),
        signature,
    };
}
