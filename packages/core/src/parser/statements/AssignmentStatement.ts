import { BaseStatement } from "./BaseStatement";
import {
    Expression,
    IndexExpression,
    MemberExpression,
} from "../../types/expression";
import { SourceLocation } from "../../types/ast";

export type AssignmentTarget =
    | Extract<Expression, { type: "VarReference" }>
    | MemberExpression
    | IndexExpression;

export type AssignmentOperator = "=" | "+=" | "-=" | "*=" | "/=" | "%=";

export class AssignmentStatement implements BaseStatement {
    kind = "AssignmentStatement" as const;

    constructor(
        public assignee: AssignmentTarget,
        public operator: AssignmentOperator,
        public value: Expression,
        public loc: SourceLocation,
    ) {}
}
