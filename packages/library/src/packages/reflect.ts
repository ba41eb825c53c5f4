import { RuntimeValue, str } from "@rift/core";
import { NativePackage } from "../types";
import { native } from "../utils/native";

function typeOf(value: RuntimeValue): string {
    switch (value.type) {
        case "nil":
            return "nil";
        case "bool":
            return "bool";
        case "num":
            return "number";
        case "str":
            return "string";
        case "instance":
            return value.klass.name;
        case "function":
        case "bound":
        case "native":
        case "class":
            return "function";
    }
}

export const reflect: NativePackage = {
    /**
     * Name of a value's type; an instance reports its class name
     */
    type: native("type", (value) => str(typeOf(value)), {
        params: [{ name: "value" }],
        description: "Name of a value's type",
    }),
};
