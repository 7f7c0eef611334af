import { Value } from "../values/Value";
import { YpshError } from "../utils/Error";
import { DeclarationScope } from "../parser/statements";

export type FrameKind = "global" | "function" | "block";

export interface Binding {
    value: Value;
    constant: boolean;
}

/**
 * One frame of the lexical scope chain.
 */
export class Environment {
    private variables: Map<string, Binding> = new Map();

    constructor(
        public readonly kind: FrameKind = "global",
        public readonly parent?: Environment,
    ) {}

    /**
     * Declares a name. `var`/`let` land in the nearest function or global
     * frame, `local` in this frame and `global` in the root frame.
     */
    public declare(
        name: string,
        value: Value,
        constant: boolean = false,
        scope: DeclarationScope = "default",
    ): void {
        const target =
            scope === "local"
                ? this
                : scope === "global"
                  ? this.root()
                  : this.nearestNonBlock();
        target.define(name, value, constant);
    }

    /**
     * Binds directly in this frame (parameters, loop variables, imports).
     */
    public define(name: string, value: Value, constant: boolean = false): void {
        const existing = this.variables.get(name);
        if (existing?.constant) {
            throw new YpshError(
                "ImmutableAssignmentError",
                `Cannot redeclare constant '${name}'`,
            );
        }
        this.variables.set(name, { value, constant });
    }

    public get(name: string): Value | undefined {
        return this.lookup(name)?.value;
    }

    public lookup(name: string): Binding | undefined {
        const binding = this.variables.get(name);
        if (binding) return binding;
        return this.parent?.lookup(name);
    }

    public getOwn(name: string): Value | undefined {
        return this.variables.get(name)?.value;
    }

    public has(name: string): boolean {
        return this.lookup(name) !== undefined;
    }

    public hasOwn(name: string): boolean {
        return this.variables.has(name);
    }

    public assign(name: string, value: Value): void {
        const binding = this.lookup(name);
        if (!binding) {
            throw new YpshError(
                "NameError",
                `Variable '${name}' is not declared`,
                undefined,
                { hint: `Declare it first with 'var ${name} = ...'` },
            );
        }
        if (binding.constant) {
            throw new YpshError(
                "ImmutableAssignmentError",
                `Cannot assign to constant '${name}'`,
            );
        }
        binding.value = value;
    }

    public names(): string[] {
        return [...this.variables.keys()];
    }

    public root(): Environment {
        return this.parent ? this.parent.root() : this;
    }

    public nearestNonBlock(): Environment {
        if (this.kind !== "block" || !this.parent) return this;
        return this.parent.nearestNonBlock();
    }
}
