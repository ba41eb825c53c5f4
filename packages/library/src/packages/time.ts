import { num } from "@rift/core";
import { NativePackage } from "../types";
import { native } from "../utils/native";

export const time: NativePackage = {
    /**
     * Seconds since the Unix epoch, with millisecond precision
     */
    clock: native("clock", () => num(Date.now() / 1000), {
        params: [],
        description: "Seconds since the Unix epoch",
    }),
};
