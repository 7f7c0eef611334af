import {
    FunctionSignature,
    NativeFunction,
    NativeValue,
    Value,
} from "../../values/Value";

/**
 * Define a native function with signature
 * @param fn Implementation
 * @param signature Signature metadata, `name?` marks optional and
 * `...name` variadic parameters
 */
export function native(
    fn: (...args: Value[]) => Value,
    signature: FunctionSignature,
): NativeFunction {
    return Object.assign(fn, { signature });
}

export function nativeValue(name: string, fn: NativeFunction): NativeValue {
    return { type: "native", name, fn };
}

/**
 * Checks an argument count against a signature; returns a message when it
 * does not fit.
 */
export function checkArity(
    name: string,
    signature: FunctionSignature,
    count: number,
): string | undefined {
    const params = signature.params;
    const variadic = params.some((p) => p.name.startsWith("..."));
    const required = params.filter(
        (p) => !p.name.endsWith("?") && !p.name.startsWith("..."),
    ).length;
    const max = variadic ? Infinity : params.length;

    if (count < required) {
        return `${name}() takes at least ${required} argument${required === 1 ? "" : "s"}, got ${count}`;
    }
    if (count > max) {
        return `${name}() takes at most ${max} argument${max === 1 ? "" : "s"}, got ${count}`;
    }
    return undefined;
}
