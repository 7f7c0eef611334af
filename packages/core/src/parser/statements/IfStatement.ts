import { BaseStatement } from "./BaseStatement";
import { BlockStatement } from "./BlockStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";

export class IfStatement implements BaseStatement {
    kind = "IfStatement" as const;

    constructor(
        public condition: Expression,
        public thenBranch: BlockStatement,
        // `elif` and `else if` chain as nested IfStatements
        public elseBranch: BlockStatement | IfStatement | undefined,
        public loc: SourceLocation,
    ) {}
}
