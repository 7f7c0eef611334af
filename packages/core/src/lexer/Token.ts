import { TokenType } from "./TokenType";

/**
 * Piece of a string literal or shell line: either raw text or the source of
 * an embedded `\( ... )` expression.
 */
export type TokenPart =
    | { kind: "text"; value: string }
    | { kind: "expr"; source: string; line: number; col: number };

export interface Token {
    type: TokenType;
    value: string;
    line: number;
    col: number;
    length?: number;
    // Set when at least one line break separates this token from the previous one
    newlineBefore: boolean;
    parts?: TokenPart[];
}
