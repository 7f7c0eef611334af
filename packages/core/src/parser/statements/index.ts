import { VarStatement } from "./VarStatement";
import { AssignmentStatement } from "./AssignmentStatement";
import { ExpressionStatement } from "./ExpressionStatement";
import { BlockStatement } from "./BlockStatement";
import { IfStatement } from "./IfStatement";
import { SwitchStatement } from "./SwitchStatement";
import {
    ForStatement,
    WhileStatement,
    BreakStatement,
    ContinueStatement,
} from "./LoopStatements";
import { ReturnStatement } from "./ReturnStatement";
import { FuncStatement } from "./FuncStatement";
import {
    TemplateStatement,
    ClassStatement,
    EnumStatement,
} from "./TypeStatements";
import { DoCatchStatement } from "./DoCatchStatement";
import { ShellStatement } from "./ShellStatement";
import { ImportStatement } from "./ImportStatement";

export * from "./BaseStatement";
export * from "./VarStatement";
export * from "./AssignmentStatement";
export * from "./ExpressionStatement";
export * from "./BlockStatement";
export * from "./IfStatement";
export * from "./SwitchStatement";
export * from "./LoopStatements";
export * from "./ReturnStatement";
export * from "./FuncStatement";
export * from "./TypeStatements";
export * from "./DoCatchStatement";
export * from "./ShellStatement";
export * from "./ImportStatement";

export type Statement =
    | VarStatement
    | AssignmentStatement
    | ExpressionStatement
    | BlockStatement
    | IfStatement
    | SwitchStatement
    | ForStatement
    | WhileStatement
    | BreakStatement
    | ContinueStatement
    | ReturnStatement
    | FuncStatement
    | TemplateStatement
    | ClassStatement
    | EnumStatement
    | DoCatchStatement
    | ShellStatement
    | ImportStatement;
