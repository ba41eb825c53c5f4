export interface RiftConfig {
    entrypoint: string;
    maxCallDepth?: number;
    /** Register the standard library before running. Defaults to true. */
    stdlib: boolean;
}

export const CONFIG_FILES = ["rift.yml", "rift.yaml"];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a project configuration loaded from rift.yml.
 */
export function parseConfig(raw: unknown): RiftConfig {
    if (!isRecord(raw)) {
        throw new Error("Invalid config: expected a mapping of settings");
    }

    const { entrypoint, maxCallDepth, stdlib } = raw;

    if (typeof entrypoint !== "string" || entrypoint.trim() === "") {
        throw new Error("Invalid config: 'entrypoint' must be a file path");
    }

    if (
        maxCallDepth !== undefined &&
        (typeof maxCallDepth !== "number" ||
            !Number.isInteger(maxCallDepth) ||
            maxCallDepth <= 0)
    ) {
        throw new Error(
            "Invalid config: 'maxCallDepth' must be a positive integer",
        );
    }

    if (stdlib !== undefined && typeof stdlib !== "boolean") {
        throw new Error("Invalid config: 'stdlib' must be true or false");
    }

    return {
        entrypoint,
        maxCallDepth,
        stdlib: stdlib ?? true,
    };
}
