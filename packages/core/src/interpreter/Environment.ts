import { RiftRuntimeError } from "../utils/Error";
import { RuntimeValue } from "./values";

/**
 * A frame of variables linked to its enclosing frame. Frames are shared by
 * reference between every closure created while they were active.
 */
export class Environment {
    private variables: Map<string, RuntimeValue> = new Map();
    public readonly enclosing?: Environment;

    constructor(enclosing?: Environment) {
        this.enclosing = enclosing;
    }

    public define(name: string, value: RuntimeValue): void {
        this.variables.set(name, value);
    }

    public get(distance: number, name: string): RuntimeValue {
        const value = this.ancestor(distance).variables.get(name);
        if (value === undefined) {
            throw undefinedVariable(name);
        }
        return value;
    }

    public getGlobal(name: string): RuntimeValue {
        return this.global().get(0, name);
    }

    public assign(distance: number, name: string, value: RuntimeValue): void {
        const frame = this.ancestor(distance);
        if (!frame.variables.has(name)) {
            throw undefinedVariable(name);
        }
        frame.variables.set(name, value);
    }

    public assignGlobal(name: string, value: RuntimeValue): void {
        this.global().assign(0, name, value);
    }

    public child(): Environment {
        return new Environment(this);
    }

    public has(name: string): boolean {
        return this.variables.has(name);
    }

    public names(): string[] {
        return Array.from(this.variables.keys());
    }

    private ancestor(distance: number): Environment {
        let frame: Environment = this;
        for (let i = 0; i < distance; i++) {
            if (!frame.enclosing) {
                throw new RiftRuntimeError(
                    "UndefinedVariable",
                    `scope distance ${distance} is past the global scope`,
                );
            }
            frame = frame.enclosing;
        }
        return frame;
    }

    private global(): Environment {
        let frame: Environment = this;
        while (frame.enclosing) {
            frame = frame.enclosing;
        }
        return frame;
    }
}

function undefinedVariable(name: string): RiftRuntimeError {
    return new RiftRuntimeError(
        "UndefinedVariable",
        `undefined variable '${name}'`,
    );
}
