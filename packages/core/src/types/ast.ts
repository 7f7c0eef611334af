import type { Statement } from "../parser/statements";
import type { Expression } from "./expression";

export type { Statement } from "../parser/statements";

export interface SourceLocation {
    line: number;
    col: number;
    len?: number;
    endLine: number;
    endCol: number;
}

export type ASTNode = Statement | Expression;

export interface AST {
    statements: Statement[];
}

/**
 * Annotation written after `:` or `->`. Checked at run time for builtin type
 * names and declared classes, templates and enums; anything else is ignored.
 */
export type TypeAnnotation = string;
