import { FunctionStatement } from "../parser/statements";
import { Environment } from "./Environment";

export interface NilValue {
    type: "nil";
}

export interface BoolValue {
    type: "bool";
    value: boolean;
}

export interface NumberValue {
    type: "num";
    value: number;
}

export interface StringValue {
    type: "str";
    value: string;
}

/** A user-defined function or method together with the frame it closes over. */
export interface FunctionValue {
    type: "function";
    declaration: FunctionStatement;
    closure: Environment;
    isInitializer: boolean;
    /** Text of the program the declaration came from */
    source: string;
}

/**
 * A method bound to its receiver. `closure` is a frame holding `this`,
 * enclosed by the method's own closure.
 */
export interface BoundMethodValue {
    type: "bound";
    method: FunctionValue;
    receiver: InstanceValue;
    closure: Environment;
}

export interface NativeSignature {
    params: { name: string; description?: string }[];
    description?: string;
}

export interface NativeValue {
    type: "native";
    name: string;
    arity: number;
    call: (args: RuntimeValue[]) => RuntimeValue;
    signature?: NativeSignature;
}

export interface ClassValue {
    type: "class";
    name: string;
    superclass: ClassValue | null;
    methods: Map<string, FunctionValue>;
}

export interface InstanceValue {
    type: "instance";
    klass: ClassValue;
    fields: Map<string, RuntimeValue>;
}

export type CallableValue =
    | FunctionValue
    | BoundMethodValue
    | NativeValue
    | ClassValue;

export type RuntimeValue =
    | NilValue
    | BoolValue
    | NumberValue
    | StringValue
    | CallableValue
    | InstanceValue;

export const NIL: NilValue = { type: "nil" };

export function bool(value: boolean): BoolValue {
    return { type: "bool", value };
}

export function num(value: number): NumberValue {
    return { type: "num", value };
}

export function str(value: string): StringValue {
    return { type: "str", value };
}

export function isCallable(value: RuntimeValue): value is CallableValue {
    switch (value.type) {
        case "function":
        case "bound":
        case "native":
        case "class":
            return true;
        default:
            return false;
    }
}

/** `nil` and `false` are falsy, everything else is truthy. */
export function isTruthy(value: RuntimeValue): boolean {
    switch (value.type) {
        case "nil":
            return false;
        case "bool":
            return value.value;
        default:
            return true;
    }
}

export function valuesEqual(a: RuntimeValue, b: RuntimeValue): boolean {
    switch (a.type) {
        case "nil":
            return b.type === "nil";
        case "bool":
            return b.type === "bool" && a.value === b.value;
        case "num":
            return b.type === "num" && a.value === b.value;
        case "str":
            return b.type === "str" && a.value === b.value;
        default:
            return a === b;
    }
}

function formatNumber(value: number): string {
    if (Object.is(value, -0)) return "-0";
    return String(value);
}

/** The text `print` writes for a value. */
export function stringify(value: RuntimeValue): string {
    switch (value.type) {
        case "nil":
            return "nil";
        case "bool":
            return value.value ? "true" : "false";
        case "num":
            return formatNumber(value.value);
        case "str":
            return value.value;
        case "function":
            return `<fn ${value.declaration.name}>`;
        case "bound":
            return `<fn ${value.method.declaration.name}>`;
        case "native":
            return `<native fn ${value.name}>`;
        case "class":
            return `<class ${value.name}>`;
        case "instance":
            return `<${value.klass.name} instance>`;
    }
}

/** Name of a value's kind, as used in error messages. */
export function typeName(value: RuntimeValue): string {
    switch (value.type) {
        case "nil":
            return "nil";
        case "bool":
            return "boolean";
        case "num":
            return "number";
        case "str":
            return "string";
        case "function":
        case "bound":
        case "native":
            return "function";
        case "class":
            return "class";
        case "instance":
            return `${value.klass.name} instance`;
    }
}

/** Looks a method up on a class, then along its superclass chain. */
export function findMethod(
    klass: ClassValue,
    name: string,
): FunctionValue | undefined {
    let current: ClassValue | null = klass;
    while (current) {
        const method = current.methods.get(name);
        if (method) return method;
        current = current.superclass;
    }
    return undefined;
}

export function bindMethod(
    method: FunctionValue,
    receiver: InstanceValue,
): BoundMethodValue {
    const closure = method.closure.child();
    closure.define("this", receiver);
    return { type: "bound", method, receiver, closure };
}

export function arityOf(callee: CallableValue): number {
    switch (callee.type) {
        case "function":
            return callee.declaration.params.length;
        case "bound":
            return callee.method.declaration.params.length;
        case "native":
            return callee.arity;
        case "class": {
            const init = findMethod(callee, "init");
            return init ? init.declaration.params.length : 0;
        }
    }
}

export function callableName(callee: CallableValue): string {
    switch (callee.type) {
        case "function":
            return callee.declaration.name;
        case "bound":
            return callee.method.declaration.name;
        case "native":
        case "class":
            return callee.name;
    }
}
