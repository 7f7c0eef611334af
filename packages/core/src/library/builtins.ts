import {
    NONE,
    Value,
    bool,
    dict,
    float,
    int,
    list,
    str,
} from "../values/Value";
import { native, nativeValue } from "./utils/native";
import { unify } from "./utils/unify";
import {
    binaryOperation,
    checkLength,
    isTruthy,
} from "../interpreter/operators";
import { typeName } from "../utils/typesystem";
import { YpshError } from "../utils/Error";
import { OutputSink } from "../utils/output";
import { ICommandRunner } from "../orchestrator/container/IRuntimeContainer";

export interface BuiltinHost {
    output: OutputSink;
    commandRunner: ICommandRunner;
}

export const BUILTIN_NAMES = [
    "print",
    "mod",
    "min",
    "max",
    "count",
    "len",
    "range",
    "str",
    "int",
    "float",
    "bool",
    "type",
    "keys",
    "append",
    "raise",
    "shell",
    "env",
] as const;

export type BuiltinName = (typeof BUILTIN_NAMES)[number];

function typeError(message: string): YpshError {
    return new YpshError("TypeError", message);
}

function extremum(name: "min" | "max", values: Value[]): Value {
    const items =
        values.length === 1 && values[0].type === "list"
            ? values[0].value
            : values;
    if (items.length === 0) {
        throw new YpshError("ValueError", `${name}() arg is an empty sequence`);
    }

    const operator = name === "min" ? "<" : ">";
    let best = items[0];
    for (const item of items.slice(1)) {
        if (isTruthy(binaryOperation(operator, item, best))) best = item;
    }
    return best;
}

function size(value: Value): number {
    switch (value.type) {
        case "str":
            return [...value.value].length;
        case "list":
            return value.value.length;
        case "dict":
            return value.value.size;
        default:
            throw typeError(`Object of type '${typeName(value)}' has no length`);
    }
}

function toInt(value: Value): Value {
    switch (value.type) {
        case "int":
            return value;
        case "float":
            return int(Math.trunc(value.value));
        case "bool":
            return int(value.value ? 1 : 0);
        case "str":
            if (/^\s*[+-]?\d+\s*$/.test(value.value)) {
                return int(parseInt(value.value, 10));
            }
            throw new YpshError(
                "ValueError",
                `Invalid literal for int(): '${value.value}'`,
            );
        default:
            throw typeError(`Cannot convert '${typeName(value)}' to int`);
    }
}

function toFloat(value: Value): Value {
    switch (value.type) {
        case "int":
        case "float":
            return float(value.value);
        case "bool":
            return float(value.value ? 1 : 0);
        case "str":
            if (/^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/.test(value.value)) {
                return float(Number(value.value));
            }
            throw new YpshError(
                "ValueError",
                `Could not convert string to float: '${value.value}'`,
            );
        default:
            throw typeError(`Cannot convert '${typeName(value)}' to float`);
    }
}

/**
 * Creates the global bindings every program starts with.
 */
export function createBuiltins(host: BuiltinHost): Map<string, Value> {
    const builtins: Record<BuiltinName, Value> = {
        /**
         * Write values to stdout, separated by spaces
         */
        print: nativeValue(
            "print",
            native(
                (...values) => {
                    host.output.write(values.map(unify).join(" ") + "\n");
                    return NONE;
                },
                {
                    params: [{ name: "...values", type: "any" }],
                    returnType: "none",
                },
            ),
        ),

        mod: nativeValue(
            "mod",
            native((a, b) => binaryOperation("%", a, b), {
                params: [
                    { name: "a", type: "int" },
                    { name: "b", type: "int" },
                ],
                returnType: "int",
                description: "Floored modulo",
            }),
        ),

        min: nativeValue(
            "min",
            native((...values) => extremum("min", values), {
                params: [{ name: "...values", type: "any" }],
                returnType: "any",
            }),
        ),

        max: nativeValue(
            "max",
            native((...values) => extremum("max", values), {
                params: [{ name: "...values", type: "any" }],
                returnType: "any",
            }),
        ),

        count: nativeValue(
            "count",
            native((value) => int(size(value)), {
                params: [{ name: "value", type: "any" }],
                returnType: "int",
            }),
        ),

        len: nativeValue(
            "len",
            native((value) => int(size(value)), {
                params: [{ name: "value", type: "any" }],
                returnType: "int",
            }),
        ),

        /**
         * Inclusive range: range(3) is [1, 2, 3], range(2, 4) is [2, 3, 4]
         */
        range: nativeValue(
            "range",
            native(
                (first, second?: Value) => {
                    const [start, end] = second ? [first, second] : [int(1), first];
                    if (start.type !== "int" || end.type !== "int") {
                        throw typeError("range() bounds must be 'int'");
                    }
                    checkLength(end.value - start.value + 1);
                    const items: Value[] = [];
                    for (let i = start.value; i <= end.value; i++) {
                        items.push(int(i));
                    }
                    return list(items);
                },
                {
                    params: [
                        { name: "start", type: "int" },
                        { name: "end?", type: "int" },
                    ],
                    returnType: "list",
                },
            ),
        ),

        str: nativeValue(
            "str",
            native((value) => str(unify(value)), {
                params: [{ name: "value", type: "any" }],
                returnType: "str",
            }),
        ),

        int: nativeValue(
            "int",
            native(toInt, {
                params: [{ name: "value", type: "any" }],
                returnType: "int",
            }),
        ),

        float: nativeValue(
            "float",
            native(toFloat, {
                params: [{ name: "value", type: "any" }],
                returnType: "float",
            }),
        ),

        bool: nativeValue(
            "bool",
            native((value) => bool(isTruthy(value)), {
                params: [{ name: "value", type: "any" }],
                returnType: "bool",
            }),
        ),

        type: nativeValue(
            "type",
            native((value) => str(typeName(value)), {
                params: [{ name: "value", type: "any" }],
                returnType: "str",
            }),
        ),

        keys: nativeValue(
            "keys",
            native(
                (value) => {
                    if (value.type !== "dict") {
                        throw typeError(
                            `keys() expects 'dict', got '${typeName(value)}'`,
                        );
                    }
                    return list([...value.value.keys()].map(str));
                },
                {
                    params: [{ name: "value", type: "dict" }],
                    returnType: "list",
                },
            ),
        ),

        append: nativeValue(
            "append",
            native(
                (target, item) => {
                    if (target.type !== "list") {
                        throw typeError(
                            `append() expects 'list', got '${typeName(target)}'`,
                        );
                    }
                    target.value.push(item);
                    return NONE;
                },
                {
                    params: [
                        { name: "list", type: "list" },
                        { name: "item", type: "any" },
                    ],
                    returnType: "none",
                },
            ),
        ),

        /**
         * Raise a user error. `catch e` receives the payload as is.
         */
        raise: nativeValue(
            "raise",
            native(
                (payload?: Value) => {
                    const message = !payload
                        ? "Error raised"
                        : unify(payload);
                    throw new YpshError("Error", message, undefined, {
                        payload: payload ?? str(message),
                    });
                },
                {
                    params: [{ name: "payload?", type: "any" }],
                    returnType: "none",
                },
            ),
        ),

        shell: dict([
            [
                "run",
                nativeValue(
                    "shell.run",
                    native(
                        (command) => {
                            if (command.type !== "str") {
                                throw typeError("shell.run() expects a 'str' command");
                            }
                            const result = host.commandRunner.runCommand(
                                command.value,
                            );
                            return dict([
                                ["code", int(result.code)],
                                ["stdout", str(result.stdout)],
                                ["stderr", str(result.stderr)],
                            ]);
                        },
                        {
                            params: [{ name: "command", type: "str" }],
                            returnType: "dict",
                            description:
                                "Run a command and capture its output, never raises",
                        },
                    ),
                ),
            ],
            [
                "cwd",
                nativeValue(
                    "shell.cwd",
                    native(() => str(host.commandRunner.cwd), {
                        params: [],
                        returnType: "str",
                    }),
                ),
            ],
        ]),

        env: nativeValue(
            "env",
            native(
                (name, fallback?: Value) => {
                    if (name.type !== "str") {
                        throw typeError("env() expects a 'str' name");
                    }
                    const value = process.env[name.value];
                    if (value !== undefined) return str(value);
                    return fallback ?? NONE;
                },
                {
                    params: [
                        { name: "name", type: "str" },
                        { name: "default?", type: "str" },
                    ],
                    returnType: "str",
                },
            ),
        ),
    };

    return new Map(Object.entries(builtins));
}
