import fs from "fs";
import os from "os";
import path from "path";

import {
    BashContainer,
    SpawnResult,
    Spawner,
} from "../src/orchestrator/container/BashContainer";
import { NodejsContainer } from "../src/orchestrator/container/NodejsContainer";
import { Orchestrator } from "../src/orchestrator/Orchestrator";
import { YpshError } from "../src/utils/Error";
import { captureOutput } from "./helpers";

function recordingSpawner(result: Partial<SpawnResult> = {}) {
    const calls: Parameters<Spawner>[] = [];
    const spawner: Spawner = (command, args, options) => {
        calls.push([command, args, options]);
        return { status: 0, stdout: "", stderr: "", ...result };
    };
    return { spawner, calls };
}

describe("BashContainer", () => {
    let tmp: string;

    beforeEach(() => {
        tmp = fs.mkdtempSync(path.join(os.tmpdir(), "ypsh-"));
    });

    afterEach(() => {
        fs.rmSync(tmp, { recursive: true, force: true });
    });

    test("commands run through the shell with -c", () => {
        const { spawner, calls } = recordingSpawner({ stdout: "hi\n" });
        const shell = new BashContainer({ spawner, cwd: tmp });

        expect(shell.runCommand("echo hi")).toEqual({
            code: 0,
            stdout: "hi\n",
            stderr: "",
        });
        expect(calls[0][0]).toBe("/bin/sh");
        expect(calls[0][1]).toEqual(["-c", "echo hi"]);
        expect(calls[0][2].cwd).toBe(tmp);
    });

    test("a configured shell path is used", () => {
        const { spawner, calls } = recordingSpawner();
        new BashContainer({ spawner, shellPath: "/usr/bin/bash" }).runCommand("true");
        expect(calls[0][0]).toBe("/usr/bin/bash");
    });

    test("spawn failures become exit code 127", () => {
        const { spawner } = recordingSpawner({
            status: null,
            error: new Error("spawn /bin/sh ENOENT"),
        });
        expect(new BashContainer({ spawner }).runCommand("ls")).toEqual({
            code: 127,
            stdout: "",
            stderr: "spawn /bin/sh ENOENT\n",
        });
    });

    test("a command killed by a signal reports code 1", () => {
        const { spawner } = recordingSpawner({ status: null });
        expect(new BashContainer({ spawner }).runCommand("sleep 9").code).toBe(1);
    });

    test("cd changes the directory for later commands", () => {
        fs.mkdirSync(path.join(tmp, "sub"));
        const { spawner, calls } = recordingSpawner();
        const shell = new BashContainer({ spawner, cwd: tmp });

        expect(shell.runCommand("cd sub").code).toBe(0);
        expect(shell.cwd).toBe(path.join(tmp, "sub"));

        shell.runCommand("ls");
        expect(calls).toHaveLength(1);
        expect(calls[0][2].cwd).toBe(path.join(tmp, "sub"));

        shell.runCommand('cd ".."');
        expect(shell.cwd).toBe(tmp);
    });

    test("cd into a missing directory", () => {
        const shell = new BashContainer({ cwd: tmp });
        expect(shell.runCommand("cd missing")).toEqual({
            code: 1,
            stdout: "",
            stderr: "cd: missing: No such file or directory\n",
        });
        expect(shell.cwd).toBe(tmp);
    });

    test("large output is passed through whole", () => {
        const result = new BashContainer({ cwd: tmp }).runCommand(
            "head -c 2000000 /dev/zero | tr '\\0' a",
        );
        expect(result.code).toBe(0);
        expect(result.stdout).toHaveLength(2000000);
        expect(result.stderr).toBe("");
    });

    test("blocks return trimmed output", () => {
        const { spawner } = recordingSpawner({ stdout: "  value \n" });
        expect(new BashContainer({ spawner }).executeSync("echo", {})).toBe(
            "value",
        );
    });

    test("failing blocks throw with the error output", () => {
        const failing = recordingSpawner({ status: 2, stderr: "oops\n" });
        expect(() =>
            new BashContainer({ spawner: failing.spawner }).executeSync("x", {}),
        ).toThrow("oops");

        const silent = recordingSpawner({ status: 2 });
        expect(() =>
            new BashContainer({ spawner: silent.spawner }).executeSync("x", {}),
        ).toThrow("Command failed with code 2");
    });

    test("context values become environment variables", () => {
        const { spawner, calls } = recordingSpawner();
        new BashContainer({ spawner }).executeSync("env", {
            n: 1,
            o: { a: 1 },
            z: null,
        });
        const env = calls[0][2].env;
        expect(env.n).toBe("1");
        expect(env.o).toBe('{"a":1}');
        expect(env.z).toBe("");
    });
});

describe("NodejsContainer", () => {
    test("returns the block's value", () => {
        const container = new NodejsContainer("js", { output: captureOutput() });
        expect(container.executeSync("return a + 1", { a: 1 })).toBe(2);
    });

    test("console output goes to the sink", () => {
        const output = captureOutput();
        new NodejsContainer("js", { output }).executeSync(
            'console.log("x", [1]); console.error("e"); console.warn("w")',
            {},
        );
        expect(output.stdout).toBe("x [1]\n");
        expect(output.stderr).toBe("e\nw\n");
    });

    test("errors propagate", () => {
        const container = new NodejsContainer("js", { output: captureOutput() });
        let caught: unknown;
        try {
            container.executeSync('throw new Error("bad")', {});
        } catch (e) {
            caught = e;
        }
        expect(String(caught)).toBe("Error: bad");
    });

    test("every block gets a fresh context", () => {
        const container = new NodejsContainer("js", { output: captureOutput() });
        container.executeSync("globalThis.leak = 1", {});
        expect(container.executeSync("return typeof leak", {})).toBe(
            "undefined",
        );
    });
});

describe("Orchestrator", () => {
    test("js and sh are always available", () => {
        const orchestrator = new Orchestrator({
            output: captureOutput(),
            containers: { node: { runtime: "nodejs" }, bash: { runtime: "bash" } },
        });
        expect(orchestrator.names()).toEqual(["js", "sh", "node", "bash"]);
        expect(orchestrator.has("node")).toBe(true);
        expect(orchestrator.has("py")).toBe(false);
    });

    test("executes in the named container", () => {
        const orchestrator = new Orchestrator({ output: captureOutput() });
        expect(orchestrator.execute("js", "return x * 2", { x: 4 })).toBe(8);
    });

    test("unknown container", () => {
        const orchestrator = new Orchestrator({ output: captureOutput() });
        let caught: unknown;
        try {
            orchestrator.execute("py", "", {});
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(YpshError);
        expect(caught).toMatchObject({
            kind: "ForeignExecutionError",
            rawMessage: "Container 'py' not found",
            hint: "Available containers: js, sh",
        });
    });

    test("the shell keeps the configured directory", () => {
        const orchestrator = new Orchestrator({ cwd: "/srv/app" });
        expect(orchestrator.shell.cwd).toBe("/srv/app");
    });
});
