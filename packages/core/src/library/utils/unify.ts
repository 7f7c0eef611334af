import { Value } from "../../values/Value";

/**
 * This function unifies the value to a string, the way `print` and string
 * interpolation show it. Strings nested in lists and dicts are quoted.
 * @param val
 */
export function unify(val: Value): string {
    return render(val, false, new Set());
}

function render(val: Value, nested: boolean, seen: Set<object>): string {
    switch (val.type) {
        case "none":
            return "None";
        case "bool":
            return val.value ? "true" : "false";
        case "int":
            return String(val.value);
        case "float":
            return formatFloat(val.value);
        case "str":
            return nested ? JSON.stringify(val.value) : val.value;
        case "list": {
            if (seen.has(val)) return "[...]";
            seen.add(val);
            const items = val.value.map((item) => render(item, true, seen));
            seen.delete(val);
            return `[${items.join(", ")}]`;
        }
        case "dict": {
            if (seen.has(val)) return "{...}";
            seen.add(val);
            const entries = [...val.value].map(
                ([key, item]) =>
                    `${JSON.stringify(key)}: ${render(item, true, seen)}`,
            );
            seen.delete(val);
            return `{${entries.join(", ")}}`;
        }
        case "func":
            return `<func ${val.name}>`;
        case "native":
            return `<native ${val.name}>`;
        case "method":
            return `<method ${val.receiver.cls.name}.${val.fn.name}>`;
        case "template":
            return `<template ${val.name}>`;
        case "class":
            return `<class ${val.name}>`;
        case "instance":
            return `<${val.cls.name} instance>`;
        case "enum":
            return `<enum ${val.name}>`;
        case "member":
            return `${val.owner.name}.${val.name}`;
        case "module":
            return `<module ${val.name}>`;
        case "foreign":
            return `<foreign ${typeof val.value}>`;
    }
}

function formatFloat(value: number): string {
    if (Number.isNaN(value)) return "nan";
    if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
