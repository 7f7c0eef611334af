import { ModuleLoader } from "../src/interpreter/Interpreter";
import { lines, runError, runOk } from "./helpers";

function memoryLoader(files: Record<string, string>) {
    const requests: string[] = [];
    const loader: ModuleLoader = (modulePath) => {
        requests.push(modulePath);
        return files[modulePath] ?? null;
    };
    return { loader, requests };
}

describe("Imports", () => {
    const util = lines(
        'func greet(n) { return "hi " + n }',
        "var version = 2",
    );

    test("whole module under an alias", () => {
        const { loader } = memoryLoader({ "./util": util });
        const output = runOk(
            lines('import "./util" as u', 'print(u.greet("A"), u)'),
            { moduleLoader: loader },
        );
        expect(output).toBe("hi A <module util>\n");
    });

    test("whole module under its file name", () => {
        const { loader } = memoryLoader({ "./lib/util.ypsh": util });
        const output = runOk(
            lines('import "./lib/util.ypsh"', "print(util.version)"),
            { moduleLoader: loader },
        );
        expect(output).toBe("2\n");
    });

    test("named imports", () => {
        const { loader } = memoryLoader({ "./util": util });
        const output = runOk(
            lines(
                'import { greet, version as v } from "./util"',
                'print(greet("B"), v)',
            ),
            { moduleLoader: loader },
        );
        expect(output).toBe("hi B 2\n");
    });

    test("missing binding", () => {
        const { loader } = memoryLoader({ "./util": util });
        const error = runError('import { nope } from "./util"', {
            moduleLoader: loader,
        });
        expect(error.kind).toBe("ImportError");
        expect(error.rawMessage).toBe("Module './util' has no binding 'nope'");
    });

    test("missing module", () => {
        const { loader } = memoryLoader({});
        const error = runError('import "./missing"', { moduleLoader: loader });
        expect(error.rawMessage).toBe("Module './missing' not found");
    });

    test("without a loader", () => {
        const error = runError('import "./util"');
        expect(error.rawMessage).toBe(
            "Module loader not configured. Cannot import './util'",
        );
    });

    test("circular imports", () => {
        const { loader } = memoryLoader({
            "./a": 'import "./b"',
            "./b": 'import "./a"',
        });
        const error = runError('import "./a"', { moduleLoader: loader });
        expect(error.kind).toBe("ImportError");
        expect(error.rawMessage).toBe("Circular import of './a'");
    });

    test("syntax errors in a module", () => {
        const { loader } = memoryLoader({ "./bad": "var = 1" });
        const error = runError('import "./bad"', { moduleLoader: loader });
        expect(error.rawMessage).toBe(
            "Error in module './bad' (line 1:5): Expected variable name, found '='",
        );
    });

    test("runtime errors in a module keep their kind and file", () => {
        const { loader } = memoryLoader({ "./boom": "var x = 1 / 0" });
        const error = runError('import "./boom"', { moduleLoader: loader });
        expect(error.kind).toBe("ZeroDivisionError");
        expect(error.file).toBe("boom");
    });

    test("modules run once per session", () => {
        const { loader, requests } = memoryLoader({
            "./util": 'print("loaded")',
        });
        const output = runOk(
            lines('import "./util" as a', 'import "./util" as b', "print(a == b)"),
            { moduleLoader: loader },
        );
        expect(output).toBe("loaded\ntrue\n");
        expect(requests).toEqual(["./util"]);
    });
});
