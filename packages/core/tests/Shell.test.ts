import { FakeRunner, execute, lines, runError, runOk } from "./helpers";

describe("Shell lines", () => {
    test("output is relayed in program order", () => {
        const runner = new FakeRunner(() => ({ stdout: "hi\n" }));
        const output = runOk(lines("$ echo hi", 'print("after")'), {
            commandRunner: runner,
        });
        expect(output).toBe("hi\nafter\n");
        expect(runner.commands).toEqual(["echo hi"]);
    });

    test("interpolated values are inserted as text", () => {
        const runner = new FakeRunner();
        runOk(lines('var files = "a b.txt"', String.raw`$ touch \(files)`), {
            commandRunner: runner,
        });
        expect(runner.commands).toEqual(["touch a b.txt"]);
    });

    test("a failing command stops the program", () => {
        const runner = new FakeRunner(() => ({ code: 3, stderr: "nope\n" }));
        const { completion, output } = execute(
            lines("$ false", 'print("never")'),
            { commandRunner: runner },
        );

        expect(completion.kind).toBe("error");
        if (completion.kind !== "error") return;
        expect(completion.error.kind).toBe("ShellCommandError");
        expect(completion.error.rawMessage).toBe(
            "Command exited with code 3: false",
        );
        expect(completion.error.exitCode).toBe(3);
        expect(output.stderr).toBe("nope\n");
        expect(output.stdout).toBe("");
    });

    test("the exit code is available to a handler", () => {
        const runner = new FakeRunner(() => ({ code: 2 }));
        const output = runOk(
            "do {\n$ grep x y\n} catch e { print(e.name, e.code) }",
            { commandRunner: runner },
        );
        expect(output).toBe("ShellCommandError 2\n");
    });

    test("shell.run captures output and never raises", () => {
        const runner = new FakeRunner(() => ({
            code: 1,
            stdout: "out",
            stderr: "err",
        }));
        const output = runOk(
            lines('var r = shell.run("ls")', "print(r.code, r.stdout, r.stderr)"),
            { commandRunner: runner },
        );
        expect(output).toBe("1 out err\n");
        expect(runner.commands).toEqual(["ls"]);
    });

    test("shell.run expects a string", () => {
        expect(runError("shell.run(1)").rawMessage).toBe(
            "shell.run() expects a 'str' command",
        );
    });

    test("shell.cwd reports the runner's directory", () => {
        expect(runOk("print(shell.cwd())")).toBe("/work\n");
    });
});
