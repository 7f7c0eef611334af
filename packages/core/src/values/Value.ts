import type { Environment } from "../interpreter/Environment";
import type { FuncStatement, VarStatement } from "../parser/statements";
import { YpshError } from "../utils/Error";

export type Value =
    | NoneValue
    | { type: "bool"; value: boolean }
    | { type: "int"; value: number }
    | { type: "float"; value: number }
    | { type: "str"; value: string }
    | ListValue
    | DictValue
    | FuncValue
    | NativeValue
    | MethodValue
    | TemplateValue
    | ClassValue
    | InstanceValue
    | EnumValue
    | EnumMemberValue
    | ModuleValue
    | { type: "foreign"; value: unknown };

export type ValueType = Value["type"];

export interface NoneValue {
    type: "none";
}

export interface ListValue {
    type: "list";
    value: Value[];
}

export interface DictValue {
    type: "dict";
    value: Map<string, Value>;
}

export interface FuncValue {
    type: "func";
    name: string;
    declaration: FuncStatement;
    closure: Environment;
}

export interface FunctionSignature {
    params: { name: string; type: string; description?: string }[];
    returnType: string;
    description?: string;
}

export type NativeFunction = ((...args: Value[]) => Value) & {
    signature: FunctionSignature;
};

export interface NativeValue {
    type: "native";
    name: string;
    fn: NativeFunction;
}

export interface MethodValue {
    type: "method";
    receiver: InstanceValue;
    fn: FuncValue;
}

export interface TemplateValue {
    type: "template";
    name: string;
    fields: VarStatement[];
    methods: Map<string, FuncValue>;
    closure: Environment;
}

export interface ClassValue {
    type: "class";
    name: string;
    fields: VarStatement[];
    methods: Map<string, FuncValue>;
    parent?: TemplateValue | ClassValue;
    closure: Environment;
}

export interface InstanceValue {
    type: "instance";
    cls: ClassValue;
    fields: Map<string, Value>;
    // Fields declared with `let`
    constants: Set<string>;
}

export interface EnumValue {
    type: "enum";
    name: string;
    cases: EnumMemberValue[];
}

export interface EnumMemberValue {
    type: "member";
    owner: EnumValue;
    ordinal: number;
    name: string;
}

export interface ModuleValue {
    type: "module";
    name: string;
    env: Environment;
}

export const NONE: NoneValue = { type: "none" };

export function bool(value: boolean): Value {
    return { type: "bool", value };
}

// ints stay within Number.MAX_SAFE_INTEGER
export function int(value: number): Value {
    if (!Number.isSafeInteger(value)) {
        throw new YpshError("ValueError", "Integer out of range", undefined, {
            hint: `ints are limited to ±${Number.MAX_SAFE_INTEGER}, use a float for larger values`,
        });
    }
    return { type: "int", value };
}

export function float(value: number): Value {
    return { type: "float", value };
}

export function str(value: string): Value {
    return { type: "str", value };
}

export function list(value: Value[]): ListValue {
    return { type: "list", value };
}

export function dict(entries: Iterable<[string, Value]> = []): DictValue {
    return { type: "dict", value: new Map(entries) };
}
