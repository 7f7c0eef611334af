import chalk from "chalk";

import { EXIT_PARSE_ERROR, EXIT_RUNTIME_ERROR, run } from "../src";
import { YpshError } from "../src/utils/Error";
import { FakeRunner, captureOutput } from "./helpers";

describe("YpshError", () => {
    beforeAll(() => {
        chalk.level = 0;
    });

    test("format without a location", () => {
        expect(new YpshError("NameError", "boom").format()).toBe(
            "NameError: boom",
        );
    });

    test("format with file, code frame and hint", () => {
        const error = new YpshError(
            "TypeError",
            "bad",
            { line: 2, col: 5, len: 3 },
            { source: "a\nvar x = y\n", file: "f.ypsh", hint: "try" },
        );
        expect(error.format()).toBe(
            [
                "TypeError: bad",
                "  --> f.ypsh:2:5",
                "  |",
                "2 | var x = y",
                "  |     ^^^",
                "  |",
                "  = try",
            ].join("\n"),
        );
    });

    test("without a file the line is shown", () => {
        const error = new YpshError("Error", "x", { line: 1, col: 1 });
        expect(error.format()).toBe("Error: x\n  --> line 1:1");
    });

    test("attach fills only what is missing", () => {
        const error = new YpshError("Error", "x", { line: 3, col: 2 });
        error.attach({ line: 1, col: 1 }, "src", "a.ypsh");
        expect(error.loc).toEqual({ line: 3, col: 2 });
        expect(error.source).toBe("src");
        expect(error.file).toBe("a.ypsh");

        error.attach(undefined, "other", "b.ypsh");
        expect(error.file).toBe("a.ypsh");
    });
});

describe("run", () => {
    beforeAll(() => {
        chalk.level = 0;
    });

    test("successful program", () => {
        const output = captureOutput();
        const outcome = run('print("ok")', "t.ypsh", {
            output,
            commandRunner: new FakeRunner(),
        });
        expect(outcome).toEqual({ ok: true });
        expect(output.stdout).toBe("ok\n");
    });

    test("syntax errors stop before anything runs", () => {
        const output = captureOutput();
        const outcome = run('print("never")\nvar = 1', "t.ypsh", { output });

        expect(outcome).toMatchObject({
            ok: false,
            exitCode: EXIT_PARSE_ERROR,
            kind: "ParseError",
            message: "Expected variable name, found '='",
        });
        expect(output.stdout).toBe("");
        expect(output.stderr.split("\n").slice(0, 2)).toEqual([
            "ParseError: Expected variable name, found '='",
            "  --> t.ypsh:2:5",
        ]);
    });

    test("runtime errors keep earlier output", () => {
        const output = captureOutput();
        const outcome = run("print(1)\nprint(nope)", "t.ypsh", {
            output,
            commandRunner: new FakeRunner(),
        });

        expect(outcome).toMatchObject({
            ok: false,
            exitCode: EXIT_RUNTIME_ERROR,
            kind: "NameError",
            message: "Name 'nope' is not defined",
            loc: { line: 2, col: 7 },
        });
        expect(output.stdout).toBe("1\n");
        expect(output.stderr.split("\n")[0]).toBe(
            "NameError: Name 'nope' is not defined",
        );
    });

    test("oversized values fail the run instead of throwing", () => {
        const output = captureOutput();
        const outcome = run('var s = "ab" * 10000000000\nprint(1)', "t.ypsh", {
            output,
            commandRunner: new FakeRunner(),
        });

        expect(outcome).toMatchObject({
            ok: false,
            exitCode: EXIT_RUNTIME_ERROR,
            kind: "ValueError",
            loc: { line: 1, col: 9 },
        });
        expect(output.stdout).toBe("");
    });
});
