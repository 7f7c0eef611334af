import { Orchestrator } from "../src/orchestrator/Orchestrator";
import { SpawnResult, Spawner } from "../src/orchestrator/container/BashContainer";
import { captureOutput, execute, lines, runError, runOk } from "./helpers";

describe("Foreign blocks", () => {
    const orchestrator = new Orchestrator({ output: captureOutput() });

    test("attributes are passed in and the result comes back", () => {
        const output = runOk(
            lines(
                "var n = 21",
                "var r = <js n={n}>return n * 2</js>",
                "print(r, type(r))",
            ),
            { orchestrator },
        );
        expect(output).toBe("42 int\n");
    });

    test("objects and arrays become dicts and lists", () => {
        const output = runOk(
            lines("var r = <js>return {a: [1, 2.5, null]}</js>", "print(r)"),
            { orchestrator },
        );
        expect(output).toBe('{"a": [1, 2.5, None]}\n');
    });

    test("integers past the safe range come back as floats", () => {
        const output = runOk(
            "print(type(<js>return 2 ** 60</js>), type(<js>return 2 ** 52</js>))",
            { orchestrator },
        );
        expect(output).toBe("float int\n");
    });

    test("script values are converted for the block", () => {
        const output = runOk(
            lines(
                'var d = {"xs": [1, 2], "ok": true, "none": none}',
                "print(<js d={d}>return d.xs.length + (d.ok ? 1 : 0) + (d.none === null ? 1 : 0)</js>)",
            ),
            { orchestrator },
        );
        expect(output).toBe("4\n");
    });

    test("script functions can be called from the block", () => {
        const output = runOk(
            lines(
                "func double(x) { return x * 2 }",
                "print(<js f={double}>return f(21)</js>)",
            ),
            { orchestrator },
        );
        expect(output).toBe("42\n");
    });

    test("console output goes to the program output", () => {
        const sink = captureOutput();
        const withSink = new Orchestrator({ output: sink });
        execute('<js>console.log("hi", 1, {a: 1})</js>', {
            orchestrator: withSink,
        });
        expect(sink.stdout).toBe('hi 1 {"a":1}\n');
    });

    test("errors thrown in the block", () => {
        const error = runError('var r = <js>throw new Error("boom")</js>', {
            orchestrator,
        });
        expect(error.kind).toBe("ForeignExecutionError");
        expect(error.rawMessage).toBe("<js> block failed: boom");
        expect(error.loc).toMatchObject({ line: 1, col: 9 });
    });

    test("a handler can catch block failures", () => {
        const output = runOk(
            'do { <js>throw new Error("x")</js> } catch e { print(e.name) }',
            { orchestrator },
        );
        expect(output).toBe("ForeignExecutionError\n");
    });

    test("unknown container", () => {
        const error = runError("var r = <py>x</py>", { orchestrator });
        expect(error.rawMessage).toBe("Container 'py' not found");
        expect(error.hint).toBe("Available containers: js, sh");
    });

    test("blocks need an orchestrator", () => {
        const error = runError("var r = <js>return 1</js>");
        expect(error.rawMessage).toBe(
            "No orchestrator attached, cannot run <js> block",
        );
    });

    test("sh blocks see attributes as environment variables", () => {
        const calls: Parameters<Spawner>[] = [];
        const spawner: Spawner = (command, args, options): SpawnResult => {
            calls.push([command, args, options]);
            return { status: 0, stdout: `${options.env.NAME ?? ""}\n`, stderr: "" };
        };
        const withShell = new Orchestrator({
            output: captureOutput(),
            spawner,
            cwd: "/srv",
        });

        const output = runOk(
            lines('var r = <sh NAME={"ypsh"}>echo $NAME</sh>', "print(r)"),
            { orchestrator: withShell },
        );

        expect(output).toBe("ypsh\n");
        expect(calls).toHaveLength(1);
        expect(calls[0][0]).toBe("/bin/sh");
        expect(calls[0][1]).toEqual(["-c", "echo $NAME"]);
        expect(calls[0][2].cwd).toBe("/srv");
    });
});
