import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { CONFIG_FILES, parseConfig, RiftConfig, RiftError } from "@rift/core";

export const LOG_DIR = path.join(".rift", "logs");

/**
 * Walks up from a directory looking for rift.yml (or rift.yaml)
 * @returns path of the config file, or null if there is none
 */
export function findConfigFile(startDir: string): string | null {
    let currentDir = path.resolve(startDir);

    while (true) {
        for (const name of CONFIG_FILES) {
            const configPath = path.join(currentDir, name);
            if (fs.existsSync(configPath)) {
                return configPath;
            }
        }

        const parent = path.dirname(currentDir);
        if (parent === currentDir) return null;
        currentDir = parent;
    }
}

export function loadConfig(configPath: string): RiftConfig {
    const content = fs.readFileSync(configPath, "utf-8");
    try {
        return parseConfig(yaml.load(content));
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new Error(`${configPath}: ${message}`);
    }
}

export interface RunTarget {
    projectDir: string;
    entrypoint: string;
    config: RiftConfig | null;
}

/**
 * Works out what `rift run <target>` executes: a source file directly, or
 * the entrypoint of the project whose rift.yml is found from a directory.
 */
export function resolveRunTarget(target: string): RunTarget {
    const resolved = path.resolve(target);

    if (!fs.existsSync(resolved)) {
        throw new Error(`No such file or directory: ${target}`);
    }

    if (fs.statSync(resolved).isFile()) {
        const configPath = findConfigFile(path.dirname(resolved));
        return {
            projectDir: configPath
                ? path.dirname(configPath)
                : path.dirname(resolved),
            entrypoint: resolved,
            config: configPath ? loadConfig(configPath) : null,
        };
    }

    const configPath = findConfigFile(resolved);
    if (!configPath) {
        throw new Error(
            `No ${CONFIG_FILES.join(" or ")} found in ${resolved} or its parents`,
        );
    }

    const config = loadConfig(configPath);
    const projectDir = path.dirname(configPath);
    return {
        projectDir,
        entrypoint: path.join(projectDir, config.entrypoint),
        config,
    };
}

export function stripAnsi(text: string): string {
    return text.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

/**
 * Writes the static errors of a failed run to .rift/logs/latest.txt
 * @returns path of the log file
 */
export function writeErrorLog(projectDir: string, errors: RiftError[]): string {
    let errorLog = `Date: ${new Date().toISOString()}\n`;
    for (const error of errors) {
        errorLog += error.message + "\n";
    }
    errorLog += `\nFound ${errors.length} error${errors.length === 1 ? "" : "s"}.\n`;

    const logDir = path.join(projectDir, LOG_DIR);
    fs.mkdirSync(logDir, { recursive: true });
    const logPath = path.join(logDir, "latest.txt");
    fs.writeFileSync(logPath, stripAnsi(errorLog), "utf-8");
    return logPath;
}
