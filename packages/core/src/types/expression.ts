import { SourceLocation } from "./ast";

export type Expression =
    | {
          type: "StringLiteral";
          value: string;
          loc: SourceLocation;
      }
    | { type: "IntLiteral"; value: number; loc: SourceLocation }
    | { type: "FloatLiteral"; value: number; loc: SourceLocation }
    | { type: "BoolLiteral"; value: boolean; loc: SourceLocation }
    | { type: "NoneLiteral"; loc: SourceLocation }
    | {
          type: "VarReference";
          varName: string;
          loc: SourceLocation;
      }
    | InterpolatedString
    | ListLiteral
    | DictLiteral
    | CallExpression
    | MemberExpression
    | IndexExpression
    | ForeignExpression
    // Operations
    | BinaryExpression
    | UnaryExpression
    | TernaryExpression;

export type InterpolationPart =
    | { kind: "text"; value: string }
    | { kind: "expr"; expression: Expression };

export interface InterpolatedString {
    type: "InterpolatedString";
    parts: InterpolationPart[];
    loc: SourceLocation;
}

export interface ListLiteral {
    type: "ListLiteral";
    elements: Expression[];
    loc: SourceLocation;
}

export interface DictLiteral {
    type: "DictLiteral";
    entries: { key: string; value: Expression }[];
    loc: SourceLocation;
}

export type BinaryOperator =
    | "+"
    | "-"
    | "*"
    | "/"
    | "%"
    | "=="
    | "!="
    | "<"
    | "<="
    | ">"
    | ">="
    | "&&"
    | "||";

export interface BinaryExpression {
    type: "BinaryExpression";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
    loc: SourceLocation;
}

export interface UnaryExpression {
    type: "UnaryExpression";
    operator: "!" | "-";
    value: Expression;
    loc: SourceLocation;
}

export interface TernaryExpression {
    type: "TernaryExpression";
    condition: Expression;
    consequent: Expression;
    alternate: Expression;
    loc: SourceLocation;
}

export interface KeywordArgument {
    name: string;
    value: Expression;
    loc: SourceLocation;
}

export interface CallExpression {
    type: "CallExpression";
    callee: Expression;
    arguments: Expression[];
    keywordArguments: KeywordArgument[];
    loc: SourceLocation;
}

export interface MemberExpression {
    type: "MemberExpression";
    object: Expression;
    property: string;
    loc: SourceLocation;
}

export interface IndexExpression {
    type: "IndexExpression";
    object: Expression;
    index: Expression;
    loc: SourceLocation;
}

// <js name={expr}> code </js>
export interface ForeignExpression {
    type: "ForeignExpression";
    runtimeName: string;
    attributes: Record<string, Expression>;
    code: string;
    loc: SourceLocation;
}
