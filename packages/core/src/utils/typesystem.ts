import { ClassValue, TemplateValue, Value } from "../values/Value";
import { TypeAnnotation } from "../types/ast";

const isFunction = (v: Value) =>
    v.type === "func" || v.type === "native" || v.type === "method";

const BUILTIN_TYPES = new Map<string, (value: Value) => boolean>([
    ["int", (v) => v.type === "int"],
    ["float", (v) => v.type === "float"],
    ["str", (v) => v.type === "str"],
    ["bool", (v) => v.type === "bool"],
    ["list", (v) => v.type === "list"],
    ["dict", (v) => v.type === "dict"],
    ["none", (v) => v.type === "none"],
    ["func", isFunction],
    ["function", isFunction],
]);

/**
 * Name of the value's type as scripts see it, `type(x)`.
 */
export function typeName(value: Value): string {
    switch (value.type) {
        case "native":
        case "method":
            return "func";
        case "instance":
            return value.cls.name;
        case "member":
            return value.owner.name;
        default:
            return value.type;
    }
}

export function inheritsFrom(
    cls: ClassValue | TemplateValue,
    ancestor: ClassValue | TemplateValue,
): boolean {
    let current: ClassValue | TemplateValue | undefined = cls;
    while (current) {
        if (current === ancestor) return true;
        current = current.type === "class" ? current.parent : undefined;
    }
    return false;
}

/**
 * Checks a value against an annotation. `resolve` looks up user type names;
 * names that are neither builtin nor a declared class, template or enum
 * accept anything.
 */
export function matchesAnnotation(
    value: Value,
    annotation: TypeAnnotation,
    resolve: (name: string) => Value | undefined,
): boolean {
    const builtin = BUILTIN_TYPES.get(annotation);
    if (builtin) return builtin(value);

    const declared = resolve(annotation);
    if (!declared) return true;

    switch (declared.type) {
        case "class":
        case "template":
            return value.type === "instance" && inheritsFrom(value.cls, declared);
        case "enum":
            return value.type === "member" && value.owner === declared;
        default:
            return true;
    }
}
