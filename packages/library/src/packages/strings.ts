import { NativeError, num, str, stringify, typeName } from "@rift/core";
import { NativePackage } from "../types";
import { native } from "../utils/native";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export const strings: NativePackage = {
    /**
     * Length of a string
     * @param s string
     * @returns number of characters
     */
    len: native(
        "len",
        (s) => {
            if (s.type !== "str") {
                throw new NativeError(
                    `expected a string, got ${typeName(s)}`,
                );
            }
            return num([...s.value].length);
        },
        {
            params: [{ name: "s", description: "string to measure" }],
            description: "Length of a string",
        },
    ),

    /**
     * Convert any value to its printed form
     */
    str: native("str", (value) => str(stringify(value)), {
        params: [{ name: "value" }],
        description: "Convert a value to a string",
    }),

    /**
     * Parse a number from a string
     * @param s numeric string, e.g. "3.5"
     */
    num: native(
        "num",
        (s) => {
            if (s.type !== "str") {
                throw new NativeError(
                    `expected a string, got ${typeName(s)}`,
                );
            }
            const text = s.value.trim();
            if (!DECIMAL.test(text)) {
                throw new NativeError(
                    `cannot convert "${s.value}" to a number`,
                );
            }
            return num(Number(text));
        },
        {
            params: [{ name: "s", description: "numeric string" }],
            description: "Parse a number from a string",
        },
    ),
};
