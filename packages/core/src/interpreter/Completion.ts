import { Value } from "../values/Value";
import { YpshError } from "../utils/Error";

/**
 * Outcome of executing a statement. Each composite statement decides which
 * kinds it absorbs and which it passes on.
 */
export type Completion =
    | { kind: "normal"; value: Value }
    | { kind: "return"; value: Value }
    | { kind: "break" }
    | { kind: "continue" }
    | { kind: "error"; error: YpshError };

export function normal(value: Value): Completion {
    return { kind: "normal", value };
}
