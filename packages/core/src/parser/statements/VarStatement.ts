import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation, TypeAnnotation } from "../../types/ast";

export type DeclarationScope = "default" | "global" | "local";

/**
 * `var x = 1`, `let y: int = 2`, `global var z = 3`, `local let w = 4`
 */
export class VarStatement implements BaseStatement {
    kind = "VarStatement" as const;

    constructor(
        public name: string,
        public value: Expression,
        public constant: boolean,
        public scope: DeclarationScope,
        public annotation: TypeAnnotation | undefined,
        public loc: SourceLocation,
    ) {}
}
