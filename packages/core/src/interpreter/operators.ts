import { BinaryOperator } from "../types/expression";
import { Value, bool, float, int, list, str } from "../values/Value";
import { unify } from "../library/utils/unify";
import { YpshError } from "../utils/Error";
import { typeName } from "../utils/typesystem";

export const MAX_SEQUENCE_LENGTH = 1 << 24;

type Numeric = Extract<Value, { type: "int" | "float" }>;

function isNumeric(value: Value): value is Numeric {
    return value.type === "int" || value.type === "float";
}

export function isTruthy(value: Value): boolean {
    switch (value.type) {
        case "none":
            return false;
        case "bool":
            return value.value;
        case "int":
        case "float":
            return value.value !== 0;
        case "str":
            return value.value.length > 0;
        case "list":
            return value.value.length > 0;
        case "dict":
            return value.value.size > 0;
        default:
            return true;
    }
}

export function valuesEqual(a: Value, b: Value): boolean {
    if (isNumeric(a) && isNumeric(b)) return a.value === b.value;

    switch (a.type) {
        case "none":
            return b.type === "none";
        case "bool":
        case "str":
            return b.type === a.type && b.value === a.value;
        case "list":
            return (
                b.type === "list" &&
                a.value.length === b.value.length &&
                a.value.every((item, i) => valuesEqual(item, b.value[i]))
            );
        case "dict": {
            if (b.type !== "dict" || a.value.size !== b.value.size) {
                return false;
            }
            for (const [key, item] of a.value) {
                const other = b.value.get(key);
                if (!other || !valuesEqual(item, other)) return false;
            }
            return true;
        }
        case "member":
            return (
                b.type === "member" &&
                a.owner === b.owner &&
                a.ordinal === b.ordinal
            );
        case "method":
            return (
                b.type === "method" &&
                a.receiver === b.receiver &&
                a.fn === b.fn
            );
        case "foreign":
            return b.type === "foreign" && Object.is(a.value, b.value);
        default:
            return a === b;
    }
}

/**
 * Applies every binary operator except the short-circuiting `&&` and `||`.
 */
export function binaryOperation(
    operator: BinaryOperator,
    left: Value,
    right: Value,
): Value {
    switch (operator) {
        case "==":
            return bool(valuesEqual(left, right));
        case "!=":
            return bool(!valuesEqual(left, right));
        case "<":
        case ">":
        case "<=":
        case ">=":
            return bool(compare(operator, left, right));
        case "+":
            return add(left, right);
        case "*":
            return multiply(left, right);
        case "-":
        case "/":
        case "%":
            return arithmetic(operator, left, right);
        case "&&":
            return bool(isTruthy(left) && isTruthy(right));
        case "||":
            return bool(isTruthy(left) || isTruthy(right));
    }
}

function unsupported(operator: string, left: Value, right: Value): YpshError {
    return new YpshError(
        "TypeError",
        `Unsupported operand types for ${operator}: '${typeName(left)}' and '${typeName(right)}'`,
    );
}

function compare(
    operator: "<" | ">" | "<=" | ">=",
    left: Value,
    right: Value,
): boolean {
    let l: number | string;
    let r: number | string;
    if (isNumeric(left) && isNumeric(right)) {
        l = left.value;
        r = right.value;
    } else if (left.type === "str" && right.type === "str") {
        l = left.value;
        r = right.value;
    } else {
        throw unsupported(operator, left, right);
    }

    switch (operator) {
        case "<":
            return l < r;
        case ">":
            return l > r;
        case "<=":
            return l <= r;
        case ">=":
            return l >= r;
    }
}

function add(left: Value, right: Value): Value {
    if (left.type === "str" || right.type === "str") {
        return str(unify(left) + unify(right));
    }
    if (left.type === "list" && right.type === "list") {
        return list([...left.value, ...right.value]);
    }
    if (isNumeric(left) && isNumeric(right)) {
        return numeric(left, right, left.value + right.value);
    }
    throw unsupported("+", left, right);
}

function multiply(left: Value, right: Value): Value {
    if (isNumeric(left) && isNumeric(right)) {
        return numeric(left, right, left.value * right.value);
    }

    const [seq, times] = right.type === "int" ? [left, right] : [right, left];
    if (times.type === "int") {
        const count = Math.max(0, times.value);
        if (seq.type === "str" || seq.type === "list") {
            checkLength(seq.value.length * count);
        }
        if (seq.type === "str") return str(seq.value.repeat(count));
        if (seq.type === "list") {
            const items: Value[] = [];
            for (let i = 0; i < count; i++) items.push(...seq.value);
            return list(items);
        }
    }
    throw unsupported("*", left, right);
}

export function checkLength(length: number): void {
    if (length > MAX_SEQUENCE_LENGTH) {
        throw new YpshError(
            "ValueError",
            `Sequence of length ${length} exceeds the limit of ${MAX_SEQUENCE_LENGTH}`,
        );
    }
}

function arithmetic(operator: "-" | "/" | "%", left: Value, right: Value): Value {
    if (!isNumeric(left) || !isNumeric(right)) {
        throw unsupported(operator, left, right);
    }

    if (operator === "-") {
        return numeric(left, right, left.value - right.value);
    }

    if (right.value === 0) {
        throw new YpshError(
            "ZeroDivisionError",
            operator === "/" ? "Division by zero" : "Modulo by zero",
        );
    }

    if (operator === "/") {
        return float(left.value / right.value);
    }

    return numeric(left, right, floorMod(left.value, right.value));
}

export function floorMod(a: number, b: number): number {
    const result = a % b;
    return result !== 0 && result < 0 !== b < 0 ? result + b : result;
}

// int op int stays int, anything mixed becomes float
function numeric(left: Numeric, right: Numeric, result: number): Value {
    return left.type === "int" && right.type === "int"
        ? int(result)
        : float(result);
}
