import { BaseStatement } from "./BaseStatement";
import { BlockStatement } from "./BlockStatement";
import { Expression } from "../../types/expression";
import { SourceLocation, TypeAnnotation } from "../../types/ast";

export interface Parameter {
    name: string;
    annotation?: TypeAnnotation;
    defaultValue?: Expression;
    loc: SourceLocation;
}

export class FuncStatement implements BaseStatement {
    kind = "FuncStatement" as const;

    constructor(
        public name: string,
        public params: Parameter[],
        public returnType: TypeAnnotation | undefined,
        public body: BlockStatement,
        public loc: SourceLocation,
    ) {}
}
