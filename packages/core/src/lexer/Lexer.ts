import { Token, TokenPart } from "./Token";
import { TokenType } from "./TokenType";
import { YpshError } from "../utils/Error";

const KEYWORDS = new Map<string, TokenType>(
    Object.entries({
        var: TokenType.Var,
        let: TokenType.Let,
        global: TokenType.Global,
        local: TokenType.Local,
        func: TokenType.Func,
        return: TokenType.Return,
        if: TokenType.If,
        elif: TokenType.Elif,
        else: TokenType.Else,
        switch: TokenType.Switch,
        case: TokenType.Case,
        default: TokenType.Default,
        for: TokenType.For,
        in: TokenType.In,
        while: TokenType.While,
        break: TokenType.Break,
        continue: TokenType.Continue,
        template: TokenType.Template,
        class: TokenType.Class,
        enum: TokenType.Enum,
        do: TokenType.Do,
        catch: TokenType.Catch,
        import: TokenType.Import,
        from: TokenType.From,
        as: TokenType.As,

        // Literals
        true: TokenType.BoolLiteral,
        True: TokenType.BoolLiteral,
        false: TokenType.BoolLiteral,
        False: TokenType.BoolLiteral,
        none: TokenType.NoneLiteral,
        None: TokenType.NoneLiteral,
    }),
);

const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
    "==": TokenType.Equal,
    "!=": TokenType.NotEqual,
    "<=": TokenType.LessEqual,
    ">=": TokenType.GreaterEqual,
    "&&": TokenType.And,
    "||": TokenType.Or,
    "->": TokenType.Arrow,
    "+=": TokenType.PlusEquals,
    "-=": TokenType.MinusEquals,
    "*=": TokenType.MultiplyEquals,
    "/=": TokenType.DivideEquals,
    "%=": TokenType.ModuloEquals,
};

const ONE_CHAR_OPERATORS: Record<string, TokenType> = {
    "+": TokenType.PlusOp,
    "-": TokenType.MinusOp,
    "*": TokenType.MultiplyOp,
    "/": TokenType.DivideOp,
    "%": TokenType.ModuloOp,
    "=": TokenType.Equals,
    "<": TokenType.Less,
    ">": TokenType.Greater,
    "!": TokenType.Bang,
    "?": TokenType.Question,
    ":": TokenType.Colon,
    ".": TokenType.Dot,
    ",": TokenType.Comma,
    ";": TokenType.Semicolon,
    "(": TokenType.LParen,
    ")": TokenType.RParen,
    "[": TokenType.LBracket,
    "]": TokenType.RBracket,
    "{": TokenType.LBrace,
    "}": TokenType.RBrace,
};

const SIMPLE_ESCAPES: Record<string, string> = {
    n: "\n",
    t: "\t",
    r: "\r",
    "0": "\0",
    "\\": "\\",
    '"': '"',
    "'": "'",
};

// After one of these a `<` is the less-than operator, not a foreign block
const OPERAND_END = new Set<TokenType>([
    TokenType.Identifier,
    TokenType.StringLiteral,
    TokenType.InterpolatedString,
    TokenType.IntLiteral,
    TokenType.FloatLiteral,
    TokenType.BoolLiteral,
    TokenType.NoneLiteral,
    TokenType.RParen,
    TokenType.RBracket,
    TokenType.RBrace,
    TokenType.ForeignEnd,
]);

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number;
    private col: number;
    private sawNewline: boolean = false;
    private tokens: Token[] = [];

    /**
     * @param input source text
     * @param line line of the first character, for embedded expressions
     * @param col column of the first character, for embedded expressions
     */
    constructor(input: string, line: number = 1, col: number = 1) {
        this.input = input;
        this.line = line;
        this.col = col;
    }

    public tokenize(): Token[] {
        this.tokens = [];

        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (char === "\n") {
                this.sawNewline = true;
                this.advance();
                continue;
            }

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            if (char === "#" || (char === "/" && this.peekChar() === "/")) {
                this.skipLineComment();
                continue;
            }

            if (char === "/" && this.peekChar() === "*") {
                this.skipBlockComment();
                continue;
            }

            if (char === "$") {
                this.readShellCommand();
                continue;
            }

            if (
                char === "<" &&
                this.isAlpha(this.peekChar()) &&
                this.expectsOperand()
            ) {
                this.readForeignBlock();
                continue;
            }

            if (char === '"' || char === "'") {
                this.readString(char);
                continue;
            }

            if (this.isDigit(char)) {
                this.readNumber();
                continue;
            }

            if (this.isAlpha(char)) {
                this.readIdentifier();
                continue;
            }

            const pair = char + this.peekChar();
            if (TWO_CHAR_OPERATORS[pair]) {
                this.push(TWO_CHAR_OPERATORS[pair], pair, this.line, this.col);
                this.advance();
                this.advance();
                continue;
            }

            if (ONE_CHAR_OPERATORS[char]) {
                this.push(ONE_CHAR_OPERATORS[char], char, this.line, this.col);
                this.advance();
                continue;
            }

            throw this.error(`Unexpected character '${char}'`);
        }

        this.push(TokenType.EOF, "", this.line, this.col);
        return this.tokens;
    }

    private push(
        type: TokenType,
        value: string,
        line: number,
        col: number,
        extra: Partial<Token> = {},
    ): Token {
        const token: Token = {
            type,
            value,
            line,
            col,
            newlineBefore: this.sawNewline,
            ...extra,
        };
        this.sawNewline = false;
        this.tokens.push(token);
        return token;
    }

    private expectsOperand(): boolean {
        const last = this.tokens[this.tokens.length - 1];
        if (!last || this.sawNewline) return true;
        return !OPERAND_END.has(last.type);
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private skipLineComment() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
    }

    private skipBlockComment() {
        const startLine = this.line;
        const startCol = this.col;
        this.advance(); // /
        this.advance(); // *

        while (this.position < this.input.length) {
            if (this.currentChar() === "*" && this.peekChar() === "/") {
                this.advance();
                this.advance();
                return;
            }
            if (this.currentChar() === "\n") this.sawNewline = true;
            this.advance();
        }

        throw this.error("Unterminated block comment", startLine, startCol);
    }

    private readNumber() {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";
        let isFloat = false;

        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            isFloat = true;
            value += ".";
            this.advance(); // consume dot

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                value += this.currentChar();
                this.advance();
            }
        }

        this.push(
            isFloat ? TokenType.FloatLiteral : TokenType.IntLiteral,
            value,
            startLine,
            startCol,
        );
    }

    private readIdentifier() {
        const startLine = this.line;
        const startCol = this.col;
        let value = "";

        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            value += this.currentChar();
            this.advance();
        }

        const type = KEYWORDS.get(value) ?? TokenType.Identifier;
        if (type === TokenType.BoolLiteral) {
            value = value.toLowerCase();
        }
        this.push(type, value, startLine, startCol, { length: value.length });
    }

    private readString(quote: string) {
        const startLine = this.line;
        const startCol = this.col;
        const startPos = this.position;
        const triple =
            this.peekChar() === quote && this.peekChar(2) === quote;

        for (let i = 0; i < (triple ? 3 : 1); i++) this.advance();

        const parts: TokenPart[] = [];
        let text = "";

        while (true) {
            if (this.position >= this.input.length) {
                throw this.error(
                    triple ? "Unterminated triple-quoted string" : "Unterminated string",
                    startLine,
                    startCol,
                );
            }

            const char = this.currentChar();

            if (triple) {
                if (
                    char === quote &&
                    this.peekChar() === quote &&
                    this.peekChar(2) === quote
                ) {
                    this.advance();
                    this.advance();
                    this.advance();
                    break;
                }
            } else if (char === quote) {
                this.advance();
                break;
            } else if (char === "\n") {
                throw this.error("Unterminated string", startLine, startCol);
            }

            if (char === "\\") {
                const next = this.peekChar();
                if (next === "(") {
                    if (text) parts.push({ kind: "text", value: text });
                    text = "";
                    this.advance(); // \
                    this.advance(); // (
                    parts.push(this.readEmbeddedExpression());
                    continue;
                }
                if (next in SIMPLE_ESCAPES) {
                    text += SIMPLE_ESCAPES[next];
                    this.advance();
                    this.advance();
                    continue;
                }
            }

            text += char;
            this.advance();
        }

        const length = this.position - startPos;

        if (parts.length === 0) {
            this.push(TokenType.StringLiteral, text, startLine, startCol, {
                length,
            });
            return;
        }

        if (text) parts.push({ kind: "text", value: text });
        this.push(
            TokenType.InterpolatedString,
            this.input.slice(startPos, this.position),
            startLine,
            startCol,
            { length, parts },
        );
    }

    /**
     * Reads the source of `\( ... )` up to the matching parenthesis.
     * Expects the opening parenthesis to be consumed already.
     */
    private readEmbeddedExpression(): TokenPart {
        const line = this.line;
        const col = this.col;
        const source = this.captureBalanced("(", ")", line, col);
        if (!source.trim()) {
            throw this.error("Empty interpolation", line, col);
        }
        return { kind: "expr", source, line, col };
    }

    private captureBalanced(
        open: string,
        close: string,
        line: number,
        col: number,
    ): string {
        let depth = 1;
        let captured = "";

        while (this.position < this.input.length) {
            const char = this.currentChar();

            if (char === '"' || char === "'") {
                captured += this.skipQuoted(char);
                continue;
            }

            if (char === open) depth++;
            if (char === close) {
                depth--;
                if (depth === 0) {
                    this.advance();
                    return captured;
                }
            }

            captured += char;
            this.advance();
        }

        throw this.error(`Unclosed '${open}'`, line, col);
    }

    private skipQuoted(quote: string): string {
        const line = this.line;
        const col = this.col;
        let raw = quote;
        this.advance();

        while (this.position < this.input.length) {
            const char = this.currentChar();
            raw += char;
            this.advance();
            if (char === "\\" && this.position < this.input.length) {
                raw += this.currentChar();
                this.advance();
                continue;
            }
            if (char === quote) return raw;
        }

        throw this.error("Unterminated string", line, col);
    }

    private readShellCommand() {
        const startLine = this.line;
        const startCol = this.col;
        this.advance(); // $

        const parts: TokenPart[] = [];
        let text = "";

        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            if (this.currentChar() === "\\" && this.peekChar() === "(") {
                if (text) parts.push({ kind: "text", value: text });
                text = "";
                this.advance();
                this.advance();
                parts.push(this.readEmbeddedExpression());
                continue;
            }
            text += this.currentChar();
            this.advance();
        }
        if (text) parts.push({ kind: "text", value: text });

        // Trim the command the way the line reads, around the outer parts only
        const first = parts[0];
        if (first?.kind === "text") first.value = first.value.trimStart();
        const last = parts[parts.length - 1];
        if (last?.kind === "text") last.value = last.value.trimEnd();

        const value = parts
            .map((p) => (p.kind === "text" ? p.value : `\\(${p.source})`))
            .join("");
        if (!value) {
            throw this.error("Empty shell command", startLine, startCol);
        }

        this.push(TokenType.ShellCommand, value, startLine, startCol, {
            parts: parts.filter((p) => p.kind === "expr" || p.value !== ""),
        });
    }

    // <name attr={expr} ...> raw code </name>
    private readForeignBlock() {
        this.push(TokenType.ForeignOpen, "<", this.line, this.col);
        this.advance();
        this.readIdentifier();
        const name = this.tokens[this.tokens.length - 1].value;

        while (true) {
            while (this.isWhitespace(this.currentChar() ?? "")) {
                if (this.currentChar() === "\n") this.sawNewline = true;
                this.advance();
            }

            if (this.position >= this.input.length) {
                throw this.error(`Unterminated <${name}> header`);
            }

            if (this.currentChar() === ">") {
                this.push(TokenType.ForeignClose, ">", this.line, this.col);
                this.advance();
                break;
            }

            if (!this.isAlpha(this.currentChar())) {
                throw this.error(
                    `Unexpected character '${this.currentChar()}' in <${name}> header`,
                );
            }
            this.readIdentifier();

            if (this.currentChar() !== "=" || this.peekChar() !== "{") {
                throw this.error("Expected '={' after attribute name");
            }
            this.push(TokenType.Equals, "=", this.line, this.col);
            this.advance();
            const braceLine = this.line;
            const braceCol = this.col;
            this.push(TokenType.LBrace, "{", braceLine, braceCol);
            this.advance();

            const exprLine = this.line;
            const exprCol = this.col;
            const source = this.captureBalanced("{", "}", braceLine, braceCol);
            const inner = new Lexer(source, exprLine, exprCol).tokenize();
            // Drop the nested EOF
            this.tokens.push(...inner.slice(0, -1));
            this.push(TokenType.RBrace, "}", this.line, this.col - 1);
        }

        const bodyLine = this.line;
        const bodyCol = this.col;
        const closing = `</${name}`;
        const end = this.findClosingTag(closing);
        if (end === -1) {
            throw this.error(
                `Unterminated <${name}> block`,
                bodyLine,
                bodyCol,
            );
        }

        let body = "";
        while (this.position < end) {
            body += this.currentChar();
            this.advance();
        }
        this.push(TokenType.ForeignBody, body, bodyLine, bodyCol);

        const endLine = this.line;
        const endCol = this.col;
        for (let i = 0; i < closing.length; i++) this.advance();
        while (this.currentChar() === " " || this.currentChar() === "\t") {
            this.advance();
        }
        if (this.currentChar() !== ">") {
            throw this.error(`Expected '>' to close </${name}`);
        }
        this.advance();
        this.push(TokenType.ForeignEnd, name, endLine, endCol, {
            length: this.col - endCol,
        });
    }

    private findClosingTag(closing: string): number {
        let from = this.position;
        while (true) {
            const index = this.input.indexOf(closing, from);
            if (index === -1) return -1;
            const after = this.input[index + closing.length] ?? "";
            // </js> closes <js>, </jsx> does not
            if (!/[a-zA-Z0-9_]/.test(after)) return index;
            from = index + closing.length;
        }
    }

    private error(
        message: string,
        line: number = this.line,
        col: number = this.col,
    ): YpshError {
        return new YpshError("LexError", message, { line, col });
    }
}
