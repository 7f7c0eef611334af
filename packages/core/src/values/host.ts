import { NONE, Value, dict, float, int, list, str } from "./Value";
import { unify } from "../library/utils/unify";

export type Invoker = (callee: Value, args: Value[]) => Value;

/**
 * Converts a script value into a plain JavaScript value for a container.
 * Functions become callable when an invoker is given.
 */
export function toHost(
    value: Value,
    invoke?: Invoker,
    seen: Map<Value, unknown> = new Map(),
): unknown {
    switch (value.type) {
        case "none":
            return null;
        case "bool":
        case "int":
        case "float":
        case "str":
            return value.value;
        case "foreign":
            return value.value;
        case "list": {
            const cached = seen.get(value);
            if (cached !== undefined) return cached;
            const result: unknown[] = [];
            seen.set(value, result);
            for (const item of value.value) {
                result.push(toHost(item, invoke, seen));
            }
            return result;
        }
        case "dict":
        case "instance": {
            const cached = seen.get(value);
            if (cached !== undefined) return cached;
            const result: Record<string, unknown> = {};
            seen.set(value, result);
            const entries = value.type === "dict" ? value.value : value.fields;
            for (const [key, item] of entries) {
                result[key] = toHost(item, invoke, seen);
            }
            return result;
        }
        case "func":
        case "native":
        case "method":
        case "class":
            if (!invoke) return unify(value);
            return (...args: unknown[]) =>
                toHost(invoke(value, args.map(fromHost)), invoke);
        default:
            return unify(value);
    }
}

function isPlainObject(value: object): boolean {
    // Objects made in another vm context have their own Object.prototype
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === null || Object.getPrototypeOf(proto) === null;
}

/**
 * Converts a value coming back from a container into a script value.
 */
export function fromHost(value: unknown): Value {
    if (value === null || value === undefined) return NONE;
    if (typeof value === "boolean") return { type: "bool", value };
    if (typeof value === "number") {
        return Number.isSafeInteger(value) ? int(value) : float(value);
    }
    if (typeof value === "bigint") return fromHost(Number(value));
    if (typeof value === "string") return str(value);
    if (Array.isArray(value)) return list(value.map(fromHost));
    if (typeof value === "object" && isPlainObject(value)) {
        return dict(
            Object.entries(value).map(([key, item]): [string, Value] => [
                key,
                fromHost(item),
            ]),
        );
    }
    return { type: "foreign", value };
}
