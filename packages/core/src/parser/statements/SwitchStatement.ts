import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export interface SwitchCase {
    values: Expression[];
    body: Statement;
    loc: SourceLocation;
}

export interface SwitchStatement extends BaseStatement {
    kind: "SwitchStatement";
    discriminant: Expression;
    cases: SwitchCase[];
    defaultCase?: Statement;
}
