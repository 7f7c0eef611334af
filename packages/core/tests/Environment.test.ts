import { Environment } from "../src/interpreter/Environment";
import { YpshError } from "../src/utils/Error";
import { int } from "../src/values/Value";

describe("Environment", () => {
    function chain() {
        const global = new Environment("global");
        const fn = new Environment("function", global);
        const block = new Environment("block", fn);
        const inner = new Environment("block", block);
        return { global, fn, block, inner };
    }

    test("default declarations go to the nearest function frame", () => {
        const { fn, inner } = chain();
        inner.declare("x", int(1));
        expect(fn.hasOwn("x")).toBe(true);
        expect(inner.hasOwn("x")).toBe(false);
    });

    test("local declarations stay in the current frame", () => {
        const { fn, inner } = chain();
        inner.declare("x", int(1), false, "local");
        expect(inner.hasOwn("x")).toBe(true);
        expect(fn.has("x")).toBe(false);
    });

    test("global declarations go to the root", () => {
        const { global, inner } = chain();
        inner.declare("x", int(1), false, "global");
        expect(global.getOwn("x")).toEqual(int(1));
    });

    test("assignment updates the binding where it lives", () => {
        const { global, inner } = chain();
        global.define("x", int(1));
        inner.assign("x", int(2));
        expect(global.get("x")).toEqual(int(2));
    });

    test("assigning an unknown name", () => {
        const { inner } = chain();
        expect(() => inner.assign("nope", int(1))).toThrow(YpshError);
        expect(() => inner.assign("nope", int(1))).toThrow(
            "Variable 'nope' is not declared",
        );
    });

    test("constants", () => {
        const env = new Environment();
        env.define("k", int(1), true);
        expect(() => env.assign("k", int(2))).toThrow(
            "Cannot assign to constant 'k'",
        );
        expect(() => env.define("k", int(3))).toThrow(
            "Cannot redeclare constant 'k'",
        );
    });

    test("shadowing", () => {
        const { global, block } = chain();
        global.define("x", int(1));
        block.define("x", int(2));
        expect(block.get("x")).toEqual(int(2));
        expect(global.get("x")).toEqual(int(1));
        expect(block.names()).toEqual(["x"]);
    });
});
