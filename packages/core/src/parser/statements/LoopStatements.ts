import { BaseStatement } from "./BaseStatement";
import { BlockStatement } from "./BlockStatement";
import { Expression } from "../../types/expression";

export interface ForStatement extends BaseStatement {
    kind: "ForStatement";
    variable: string;
    iterable: Expression;
    body: BlockStatement;
}

export interface WhileStatement extends BaseStatement {
    kind: "WhileStatement";
    condition: Expression;
    body: BlockStatement;
}

export interface BreakStatement extends BaseStatement {
    kind: "BreakStatement";
}

export interface ContinueStatement extends BaseStatement {
    kind: "ContinueStatement";
}
