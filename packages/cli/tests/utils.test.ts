import * as fs from "fs";
import * as path from "path";
import { RiftError } from "@rift/core";
import { findConfigFile, loadConfig, stripAnsi, writeErrorLog } from "../src/utils";

// Mock fs module
jest.mock("fs");

describe("Utils", () => {
    beforeEach(() => {
        jest.resetAllMocks();
    });

    describe("findConfigFile", () => {
        test("find rift.yml in a parent directory", () => {
            jest.mocked(fs.existsSync).mockImplementation(
                (p) => String(p) === "/home/user/project/rift.yml",
            );

            expect(findConfigFile("/home/user/project/src/lib")).toBe(
                "/home/user/project/rift.yml",
            );
        });

        test("prefer the nearest directory", () => {
            jest.mocked(fs.existsSync).mockImplementation(
                (p) =>
                    String(p) === "/home/user/rift.yml" ||
                    String(p) === "/home/user/project/rift.yaml",
            );

            expect(findConfigFile("/home/user/project")).toBe(
                "/home/user/project/rift.yaml",
            );
        });

        test("return null if no config found", () => {
            jest.mocked(fs.existsSync).mockReturnValue(false);

            expect(findConfigFile("/home/user/other")).toBeNull();
        });
    });

    describe("loadConfig", () => {
        test("read and validate rift.yml", () => {
            jest.mocked(fs.readFileSync).mockReturnValue(
                "entrypoint: main.rf\nmaxCallDepth: 100\n",
            );

            expect(loadConfig("/p/rift.yml")).toEqual({
                entrypoint: "main.rf",
                maxCallDepth: 100,
                stdlib: true,
            });
        });

        test("name the file in validation errors", () => {
            jest.mocked(fs.readFileSync).mockReturnValue("maxCallDepth: 5\n");

            expect(() => loadConfig("/p/rift.yml")).toThrow(
                "/p/rift.yml: Invalid config: 'entrypoint' must be a file path",
            );
        });
    });

    describe("writeErrorLog", () => {
        test("write errors without colors", () => {
            const error = new RiftError(
                "resolve",
                "cannot return from top-level code",
                { line: 1, col: 1, len: 6 },
                "return 1;",
            );

            const logPath = writeErrorLog("/proj", [error]);

            const expectedPath = path.join("/proj", ".rift", "logs", "latest.txt");
            expect(logPath).toBe(expectedPath);
            expect(fs.mkdirSync).toHaveBeenCalledWith(
                path.join("/proj", ".rift", "logs"),
                { recursive: true },
            );

            const [file, content] = jest.mocked(fs.writeFileSync).mock.calls[0];
            expect(file).toBe(expectedPath);
            const lines = String(content).split("\n");
            expect(lines[0]).toMatch(/^Date: /);
            expect(lines.slice(1)).toEqual([
                "",
                "Error: cannot return from top-level code",
                "  --> line 1:1",
                "  |",
                "1 | return 1;",
                "  | ^^^^^^",
                "  |",
                "",
                "Found 1 error.",
                "",
            ]);
        });
    });

    test("stripAnsi", () => {
        expect(stripAnsi("\x1B[31mred\x1B[39m plain")).toBe("red plain");
    });
});
