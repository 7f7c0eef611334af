import { Token, TokenPart } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { Lexer } from "../lexer/Lexer";
import { AST, SourceLocation, TypeAnnotation } from "../types/ast";
import {
    BinaryOperator,
    CallExpression,
    DictLiteral,
    Expression,
    ForeignExpression,
    InterpolationPart,
    KeywordArgument,
    ListLiteral,
} from "../types/expression";
import {
    Statement,
    AssignmentOperator,
    AssignmentStatement,
    AssignmentTarget,
    BlockStatement,
    ClassStatement,
    DeclarationScope,
    DoCatchStatement,
    EnumStatement,
    ForStatement,
    FuncStatement,
    IfStatement,
    ImportStatement,
    Parameter,
    ReturnStatement,
    ShellStatement,
    SwitchCase,
    SwitchStatement,
    TemplateStatement,
    VarStatement,
    WhileStatement,
} from "./statements";
import { YpshError } from "../utils/Error";

const ASSIGNMENT_OPERATORS: Partial<Record<TokenType, AssignmentOperator>> = {
    [TokenType.Equals]: "=",
    [TokenType.PlusEquals]: "+=",
    [TokenType.MinusEquals]: "-=",
    [TokenType.MultiplyEquals]: "*=",
    [TokenType.DivideEquals]: "/=",
    [TokenType.ModuloEquals]: "%=",
};

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
    [TokenType.PlusOp]: "+",
    [TokenType.MinusOp]: "-",
    [TokenType.MultiplyOp]: "*",
    [TokenType.DivideOp]: "/",
    [TokenType.ModuloOp]: "%",
    [TokenType.Equal]: "==",
    [TokenType.NotEqual]: "!=",
    [TokenType.Less]: "<",
    [TokenType.LessEqual]: "<=",
    [TokenType.Greater]: ">",
    [TokenType.GreaterEqual]: ">=",
    [TokenType.And]: "&&",
    [TokenType.Or]: "||",
};

export class Parser {
    private tokens: Token[];
    private current: number = 0;
    private source: string;

    // Inside ( ), [ ] and dict literals line breaks do not end anything
    private nesting: number = 0;
    private loopDepth: number = 0;
    private functionDepth: number = 0;

    constructor(tokens: Token[], source: string = "") {
        this.tokens = tokens;
        this.source = source;
    }

    public parse(): AST {
        const statements: Statement[] = [];
        while (!this.isAtEnd()) {
            if (this.match(TokenType.Semicolon)) continue;
            statements.push(this.statement());
        }
        return { statements };
    }

    /**
     * Parses a lone expression, as found inside `\( ... )`.
     */
    public parseExpression(): Expression {
        const expr = this.expression();
        if (!this.isAtEnd()) {
            throw this.error(this.peek(), "Unexpected token after expression");
        }
        return expr;
    }

    private getLoc(token: Token): SourceLocation {
        const len = token.length || token.value.length || 1;
        return {
            line: token.line,
            col: token.col,
            len,
            endLine: token.line,
            endCol: token.col + len,
        };
    }

    private mergeLoc(start: SourceLocation, end?: SourceLocation): SourceLocation {
        if (!end) return start;

        const len =
            start.line === end.endLine ? end.endCol - start.col : start.len;

        return {
            line: start.line,
            col: start.col,
            len: len,
            endLine: end.endLine,
            endCol: end.endCol,
        };
    }

    private statement(): Statement {
        if (this.match(TokenType.Var, TokenType.Let)) {
            return this.varStatement(this.previous(), "default");
        }

        if (this.match(TokenType.Global, TokenType.Local)) {
            const modifier = this.previous();
            if (!this.match(TokenType.Var, TokenType.Let)) {
                throw this.error(
                    this.peek(),
                    `Expected 'var' or 'let' after '${modifier.value}'`,
                );
            }
            return this.varStatement(
                modifier,
                modifier.type === TokenType.Global ? "global" : "local",
            );
        }

        if (this.match(TokenType.Func)) return this.funcStatement();
        if (this.match(TokenType.If)) return this.ifStatement();
        if (this.match(TokenType.Switch)) return this.switchStatement();
        if (this.match(TokenType.For)) return this.forStatement();
        if (this.match(TokenType.While)) return this.whileStatement();
        if (this.match(TokenType.Return)) return this.returnStatement();
        if (this.match(TokenType.Template)) return this.templateStatement();
        if (this.match(TokenType.Class)) return this.classStatement();
        if (this.match(TokenType.Enum)) return this.enumStatement();
        if (this.match(TokenType.Do)) return this.doCatchStatement();
        if (this.match(TokenType.Import)) return this.importStatement();

        if (this.match(TokenType.Break, TokenType.Continue)) {
            const keyword = this.previous();
            if (this.loopDepth === 0) {
                throw this.error(keyword, `'${keyword.value}' outside of a loop`);
            }
            this.endStatement();
            return keyword.type === TokenType.Break
                ? { kind: "BreakStatement", loc: this.getLoc(keyword) }
                : { kind: "ContinueStatement", loc: this.getLoc(keyword) };
        }

        if (this.match(TokenType.ShellCommand)) {
            return this.shellStatement(this.previous());
        }

        if (this.check(TokenType.LBrace)) {
            return this.blockStatement();
        }

        return this.expressionOrAssignment();
    }

    /**
     * Statements end at `;`, `}`, end of input or a line break.
     */
    private endStatement() {
        if (this.match(TokenType.Semicolon)) return;
        if (
            this.isAtEnd() ||
            this.check(TokenType.RBrace) ||
            this.peek().newlineBefore
        ) {
            return;
        }
        throw this.error(this.peek(), "Expected end of statement");
    }

    private expressionOrAssignment(): Statement {
        const expr = this.expression();

        const operator = ASSIGNMENT_OPERATORS[this.peek().type];
        if (operator) {
            const operatorToken = this.advance();
            const target = this.toAssignmentTarget(expr, operatorToken);
            const value = this.expression();
            this.endStatement();
            return new AssignmentStatement(
                target,
                operator,
                value,
                this.mergeLoc(expr.loc, value.loc),
            );
        }

        this.endStatement();
        return {
            kind: "ExpressionStatement",
            expression: expr,
            loc: expr.loc,
        };
    }

    private toAssignmentTarget(
        expr: Expression,
        operatorToken: Token,
    ): AssignmentTarget {
        if (
            expr.type === "VarReference" ||
            expr.type === "MemberExpression" ||
            expr.type === "IndexExpression"
        ) {
            return expr;
        }
        throw this.error(
            operatorToken,
            "Invalid assignment target, expected a name, attribute or index",
        );
    }

    private varStatement(
        startToken: Token,
        scope: DeclarationScope,
    ): VarStatement {
        // `var`/`let` was matched before call
        const constant = this.previous().type === TokenType.Let;
        const nameToken = this.consume(
            TokenType.Identifier,
            "Expected variable name",
        );

        let annotation: TypeAnnotation | undefined;
        if (this.match(TokenType.Colon)) {
            annotation = this.typeAnnotation();
        }

        this.consume(TokenType.Equals, "Expected '=' after variable name");
        const value = this.expression();
        this.endStatement();

        return new VarStatement(
            nameToken.value,
            value,
            constant,
            scope,
            annotation,
            this.mergeLoc(this.getLoc(startToken), value.loc),
        );
    }

    private typeAnnotation(): TypeAnnotation {
        if (this.match(TokenType.Identifier, TokenType.Func)) {
            return this.previous().value;
        }
        if (this.match(TokenType.NoneLiteral)) {
            return "none";
        }
        throw this.error(this.peek(), "Expected type name");
    }

    private blockStatement(): BlockStatement {
        const startToken = this.consume(TokenType.LBrace, "Expected '{'");
        const statements: Statement[] = [];

        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            if (this.match(TokenType.Semicolon)) continue;
            statements.push(this.statement());
        }

        const endToken = this.consume(TokenType.RBrace, "Expected '}'");

        return {
            kind: "BlockStatement",
            statements,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private funcStatement(): FuncStatement {
        // func name(a, b: int = 1) -> int { body }
        const startToken = this.previous();
        const nameToken = this.consume(
            TokenType.Identifier,
            "Expected function name",
        );

        this.consume(TokenType.LParen, "Expected '(' after function name");
        const params: Parameter[] = [];
        const seen = new Set<string>();
        this.nesting++;
        while (!this.check(TokenType.RParen) && !this.isAtEnd()) {
            const paramToken = this.consume(
                TokenType.Identifier,
                "Expected parameter name",
            );
            if (seen.has(paramToken.value)) {
                throw this.error(
                    paramToken,
                    `Duplicate parameter '${paramToken.value}'`,
                );
            }
            seen.add(paramToken.value);

            const param: Parameter = {
                name: paramToken.value,
                loc: this.getLoc(paramToken),
            };
            if (this.match(TokenType.Colon)) {
                param.annotation = this.typeAnnotation();
            }
            if (this.match(TokenType.Equals)) {
                param.defaultValue = this.expression();
            }
            params.push(param);

            if (!this.match(TokenType.Comma)) break;
        }
        this.nesting--;
        this.consume(TokenType.RParen, "Expected ')' after parameters");

        let returnType: TypeAnnotation | undefined;
        if (this.match(TokenType.Arrow)) {
            returnType = this.typeAnnotation();
        }

        // A function body starts a fresh loop context
        const outerLoops = this.loopDepth;
        this.loopDepth = 0;
        this.functionDepth++;
        const body = this.blockStatement();
        this.functionDepth--;
        this.loopDepth = outerLoops;

        return new FuncStatement(
            nameToken.value,
            params,
            returnType,
            body,
            this.mergeLoc(this.getLoc(startToken), body.loc),
        );
    }

    private ifStatement(): IfStatement {
        const startToken = this.previous();
        const condition = this.expression();
        const thenBranch = this.blockStatement();

        let elseBranch: BlockStatement | IfStatement | undefined;
        if (this.match(TokenType.Elif)) {
            elseBranch = this.ifStatement();
        } else if (this.match(TokenType.Else)) {
            elseBranch = this.match(TokenType.If)
                ? this.ifStatement()
                : this.blockStatement();
        }

        return new IfStatement(
            condition,
            thenBranch,
            elseBranch,
            this.mergeLoc(
                this.getLoc(startToken),
                (elseBranch ?? thenBranch).loc,
            ),
        );
    }

    private switchStatement(): SwitchStatement {
        const startToken = this.previous();
        const discriminant = this.expression();
        this.consume(TokenType.LBrace, "Expected '{' after switch value");

        const cases: SwitchCase[] = [];
        let defaultCase: Statement | undefined;

        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            if (this.match(TokenType.Semicolon)) continue;

            if (this.match(TokenType.Case)) {
                const caseToken = this.previous();
                const values: Expression[] = [];
                do {
                    values.push(this.expression());
                } while (this.match(TokenType.Comma));
                this.consume(TokenType.Colon, "Expected ':' after case values");
                const body = this.caseBody(caseToken);
                cases.push({
                    values,
                    body,
                    loc: this.mergeLoc(this.getLoc(caseToken), body.loc),
                });
                continue;
            }

            if (this.match(TokenType.Default)) {
                const defaultToken = this.previous();
                if (defaultCase) {
                    throw this.error(defaultToken, "Duplicate 'default' arm");
                }
                this.consume(TokenType.Colon, "Expected ':' after 'default'");
                defaultCase = this.caseBody(defaultToken);
                continue;
            }

            throw this.error(this.peek(), "Expected 'case' or 'default'");
        }

        const endToken = this.consume(
            TokenType.RBrace,
            "Expected '}' after switch arms",
        );

        return {
            kind: "SwitchStatement",
            discriminant,
            cases,
            defaultCase,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    // Statements up to the next arm, wrapped into a block unless already one
    private caseBody(armToken: Token): Statement {
        const statements: Statement[] = [];
        while (
            !this.check(TokenType.Case, TokenType.Default, TokenType.RBrace) &&
            !this.isAtEnd()
        ) {
            if (this.match(TokenType.Semicolon)) continue;
            statements.push(this.statement());
        }

        if (statements.length === 1 && statements[0].kind === "BlockStatement") {
            return statements[0];
        }

        const startLoc = this.getLoc(armToken);
        const last = statements[statements.length - 1];
        return {
            kind: "BlockStatement",
            statements,
            loc: this.mergeLoc(startLoc, last?.loc),
        };
    }

    private forStatement(): ForStatement {
        const startToken = this.previous();
        const variable = this.consume(
            TokenType.Identifier,
            "Expected loop variable name",
        );
        this.consume(TokenType.In, "Expected 'in' after loop variable");
        const iterable = this.expression();
        const body = this.loopBody();

        return {
            kind: "ForStatement",
            variable: variable.value,
            iterable,
            body,
            loc: this.mergeLoc(this.getLoc(startToken), body.loc),
        };
    }

    private whileStatement(): WhileStatement {
        const startToken = this.previous();
        const condition = this.expression();
        const body = this.loopBody();

        return {
            kind: "WhileStatement",
            condition,
            body,
            loc: this.mergeLoc(this.getLoc(startToken), body.loc),
        };
    }

    private loopBody(): BlockStatement {
        this.loopDepth++;
        const body = this.blockStatement();
        this.loopDepth--;
        return body;
    }

    private returnStatement(): ReturnStatement {
        const keyword = this.previous();
        if (this.functionDepth === 0) {
            throw this.error(keyword, "'return' outside of a function");
        }

        let value: Expression | undefined;
        if (
            !this.check(TokenType.Semicolon, TokenType.RBrace) &&
            !this.isAtEnd() &&
            !this.peek().newlineBefore
        ) {
            value = this.expression();
        }
        this.endStatement();

        return {
            kind: "ReturnStatement",
            value,
            loc: this.mergeLoc(this.getLoc(keyword), value?.loc),
        };
    }

    private templateStatement(): TemplateStatement {
        const startToken = this.previous();
        const name = this.consume(TokenType.Identifier, "Expected template name");
        const { fields, methods, end } = this.typeBody(name.value);

        return {
            kind: "TemplateStatement",
            name: name.value,
            fields,
            methods,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(end)),
        };
    }

    private classStatement(): ClassStatement {
        const startToken = this.previous();
        const name = this.consume(TokenType.Identifier, "Expected class name");

        let parent: string | undefined;
        if (this.match(TokenType.Colon)) {
            parent = this.consume(
                TokenType.Identifier,
                "Expected parent template or class name",
            ).value;
        }

        const { fields, methods, end } = this.typeBody(name.value);

        return {
            kind: "ClassStatement",
            name: name.value,
            parent,
            fields,
            methods,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(end)),
        };
    }

    private typeBody(typeName: string) {
        this.consume(TokenType.LBrace, `Expected '{' after '${typeName}'`);
        const fields: VarStatement[] = [];
        const methods: FuncStatement[] = [];

        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            if (this.match(TokenType.Semicolon)) continue;

            if (this.match(TokenType.Var, TokenType.Let)) {
                fields.push(this.varStatement(this.previous(), "default"));
            } else if (this.match(TokenType.Func)) {
                methods.push(this.funcStatement());
            } else {
                throw this.error(
                    this.peek(),
                    `Only 'var', 'let' and 'func' declarations are allowed in '${typeName}'`,
                );
            }
        }

        const end = this.consume(TokenType.RBrace, "Expected '}'");
        return { fields, methods, end };
    }

    private enumStatement(): EnumStatement {
        // enum Color { case Red, Green; case Blue }
        const startToken = this.previous();
        const name = this.consume(TokenType.Identifier, "Expected enum name");
        this.consume(TokenType.LBrace, "Expected '{' after enum name");

        const cases: EnumStatement["cases"] = [];
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            if (this.match(TokenType.Semicolon, TokenType.Comma, TokenType.Case)) {
                continue;
            }
            const caseToken = this.consume(
                TokenType.Identifier,
                "Expected enum case name",
            );
            if (cases.some((c) => c.name === caseToken.value)) {
                throw this.error(
                    caseToken,
                    `Duplicate enum case '${caseToken.value}'`,
                );
            }
            cases.push({ name: caseToken.value, loc: this.getLoc(caseToken) });
        }

        const endToken = this.consume(TokenType.RBrace, "Expected '}'");

        return {
            kind: "EnumStatement",
            name: name.value,
            cases,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private doCatchStatement(): DoCatchStatement {
        const startToken = this.previous();
        const body = this.blockStatement();
        this.consume(TokenType.Catch, "Expected 'catch' after 'do' block");

        let errorName: string | undefined;
        if (this.match(TokenType.Identifier)) {
            errorName = this.previous().value;
        }
        const handler = this.blockStatement();

        return {
            kind: "DoCatchStatement",
            body,
            errorName,
            handler,
            loc: this.mergeLoc(this.getLoc(startToken), handler.loc),
        };
    }

    private shellStatement(token: Token): ShellStatement {
        return {
            kind: "ShellStatement",
            parts: this.interpolationParts(token.parts ?? []),
            loc: this.getLoc(token),
        };
    }

    private importStatement(): ImportStatement {
        const startToken = this.previous(); // 'import' was matched before call

        if (this.match(TokenType.LBrace)) {
            // Named imports: { a, b as c }
            const imports: { name: string; alias?: string }[] = [];
            while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
                const name = this.consume(
                    TokenType.Identifier,
                    "Expected import name",
                ).value;
                let alias: string | undefined;
                if (this.match(TokenType.As)) {
                    alias = this.consume(
                        TokenType.Identifier,
                        "Expected alias after 'as'",
                    ).value;
                }
                imports.push({ name, alias });
                if (!this.match(TokenType.Comma)) break;
            }
            this.consume(TokenType.RBrace, "Expected '}' after imports");
            this.consume(TokenType.From, "Expected 'from'");
            const moduleToken = this.consume(
                TokenType.StringLiteral,
                "Expected module path",
            );
            this.endStatement();

            return {
                kind: "ImportStatement",
                moduleName: moduleToken.value,
                imports,
                loc: this.mergeLoc(
                    this.getLoc(startToken),
                    this.getLoc(moduleToken),
                ),
            };
        }

        const moduleToken = this.consume(
            TokenType.StringLiteral,
            "Expected module path",
        );
        let endToken = moduleToken;
        let alias: string | undefined;
        if (this.match(TokenType.As)) {
            endToken = this.consume(
                TokenType.Identifier,
                "Expected alias after 'as'",
            );
            alias = endToken.value;
        }
        this.endStatement();

        return {
            kind: "ImportStatement",
            moduleName: moduleToken.value,
            alias,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private expression(): Expression {
        return this.ternary();
    }

    private ternary(): Expression {
        const condition = this.binary(0);

        if (!this.breaksLine() && this.match(TokenType.Question)) {
            const consequent = this.ternary();
            this.consume(TokenType.Colon, "Expected ':' in conditional expression");
            const alternate = this.ternary();
            return {
                type: "TernaryExpression",
                condition,
                consequent,
                alternate,
                loc: this.mergeLoc(condition.loc, alternate.loc),
            };
        }

        return condition;
    }

    // Loosest first: || && equality comparison additive multiplicative
    private static readonly LEVELS: TokenType[][] = [
        [TokenType.Or],
        [TokenType.And],
        [TokenType.Equal, TokenType.NotEqual],
        [
            TokenType.Less,
            TokenType.Greater,
            TokenType.LessEqual,
            TokenType.GreaterEqual,
        ],
        [TokenType.PlusOp, TokenType.MinusOp],
        [TokenType.MultiplyOp, TokenType.DivideOp, TokenType.ModuloOp],
    ];

    private binary(level: number): Expression {
        if (level >= Parser.LEVELS.length) return this.unary();

        let left = this.binary(level + 1);

        while (!this.breaksLine() && this.match(...Parser.LEVELS[level])) {
            const operator = BINARY_OPERATORS[this.previous().type];
            if (!operator) {
                throw this.error(this.previous(), "Unknown operator");
            }
            const right = this.binary(level + 1);
            left = {
                type: "BinaryExpression",
                operator,
                left,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.Bang, TokenType.MinusOp)) {
            const operatorToken = this.previous();
            const value = this.unary();
            return {
                type: "UnaryExpression",
                operator: operatorToken.type === TokenType.Bang ? "!" : "-",
                value,
                loc: this.mergeLoc(this.getLoc(operatorToken), value.loc),
            };
        }
        return this.postfix();
    }

    private postfix(): Expression {
        let expr = this.primary();

        while (true) {
            if (!this.breaksLine() && this.match(TokenType.LParen)) {
                expr = this.finishCall(expr);
            } else if (!this.breaksLine() && this.match(TokenType.LBracket)) {
                this.nesting++;
                const index = this.expression();
                this.nesting--;
                const endToken = this.consume(
                    TokenType.RBracket,
                    "Expected ']' after index",
                );
                expr = {
                    type: "IndexExpression",
                    object: expr,
                    index,
                    loc: this.mergeLoc(expr.loc, this.getLoc(endToken)),
                };
            } else if (this.match(TokenType.Dot)) {
                const property = this.consume(
                    TokenType.Identifier,
                    "Expected attribute name after '.'",
                );
                expr = {
                    type: "MemberExpression",
                    object: expr,
                    property: property.value,
                    loc: this.mergeLoc(expr.loc, this.getLoc(property)),
                };
            } else {
                return expr;
            }
        }
    }

    private finishCall(callee: Expression): CallExpression {
        const args: Expression[] = [];
        const keywordArguments: KeywordArgument[] = [];

        this.nesting++;
        while (!this.check(TokenType.RParen) && !this.isAtEnd()) {
            if (
                this.check(TokenType.Identifier) &&
                this.peekNext().type === TokenType.Equals
            ) {
                const nameToken = this.advance();
                this.advance(); // =
                const value = this.expression();
                keywordArguments.push({
                    name: nameToken.value,
                    value,
                    loc: this.mergeLoc(this.getLoc(nameToken), value.loc),
                });
            } else {
                const startToken = this.peek();
                const value = this.expression();
                if (keywordArguments.length > 0) {
                    throw this.error(
                        startToken,
                        "Positional argument after keyword argument",
                    );
                }
                args.push(value);
            }
            if (!this.match(TokenType.Comma)) break;
        }
        this.nesting--;

        const endToken = this.consume(
            TokenType.RParen,
            "Expected ')' after arguments",
        );
        return {
            type: "CallExpression",
            callee,
            arguments: args,
            keywordArguments,
            loc: this.mergeLoc(callee.loc, this.getLoc(endToken)),
        };
    }

    private primary(): Expression {
        if (this.match(TokenType.IntLiteral)) {
            const token = this.previous();
            return {
                type: "IntLiteral",
                value: parseInt(token.value, 10),
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.FloatLiteral)) {
            const token = this.previous();
            return {
                type: "FloatLiteral",
                value: parseFloat(token.value),
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.BoolLiteral)) {
            const token = this.previous();
            return {
                type: "BoolLiteral",
                value: token.value === "true",
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.NoneLiteral)) {
            return { type: "NoneLiteral", loc: this.getLoc(this.previous()) };
        }
        if (this.match(TokenType.StringLiteral)) {
            const token = this.previous();
            return {
                type: "StringLiteral",
                value: token.value,
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.InterpolatedString)) {
            const token = this.previous();
            return {
                type: "InterpolatedString",
                parts: this.interpolationParts(token.parts ?? []),
                loc: this.getLoc(token),
            };
        }
        if (this.match(TokenType.Identifier)) {
            const token = this.previous();
            return {
                type: "VarReference",
                varName: token.value,
                loc: this.getLoc(token),
            };
        }

        if (this.check(TokenType.ForeignOpen)) {
            return this.foreignExpression();
        }

        if (this.match(TokenType.LParen)) {
            const startParen = this.previous();
            this.nesting++;
            const expr = this.expression();
            this.nesting--;
            const endParen = this.consume(TokenType.RParen, "Expected ')'");
            expr.loc = this.mergeLoc(
                this.getLoc(startParen),
                this.getLoc(endParen),
            );
            return expr;
        }

        if (this.match(TokenType.LBracket)) {
            return this.listLiteral(this.previous());
        }

        if (this.match(TokenType.LBrace)) {
            return this.dictLiteral(this.previous());
        }

        throw this.error(this.peek(), "Expected expression");
    }

    private listLiteral(startToken: Token): ListLiteral {
        const elements: Expression[] = [];
        this.nesting++;
        while (!this.check(TokenType.RBracket) && !this.isAtEnd()) {
            elements.push(this.expression());
            if (!this.match(TokenType.Comma)) break;
        }
        this.nesting--;
        const endToken = this.consume(
            TokenType.RBracket,
            "Expected ']' after list elements",
        );
        return {
            type: "ListLiteral",
            elements,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private dictLiteral(startToken: Token): DictLiteral {
        const entries: DictLiteral["entries"] = [];
        this.nesting++;
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            if (!this.match(TokenType.StringLiteral, TokenType.Identifier)) {
                throw this.error(this.peek(), "Expected dictionary key");
            }
            const key = this.previous().value;
            this.consume(TokenType.Colon, "Expected ':' after dictionary key");
            entries.push({ key, value: this.expression() });
            if (!this.match(TokenType.Comma)) break;
        }
        this.nesting--;
        const endToken = this.consume(
            TokenType.RBrace,
            "Expected '}' after dictionary entries",
        );
        return {
            type: "DictLiteral",
            entries,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private foreignExpression(): ForeignExpression {
        // <name ctxField={value}> ... </name>
        const startToken = this.consume(TokenType.ForeignOpen, "Expected '<'");
        const runtimeName = this.consume(
            TokenType.Identifier,
            "Expected runtime name",
        ).value;
        const attributes: Record<string, Expression> = {};

        while (!this.check(TokenType.ForeignClose) && !this.isAtEnd()) {
            const attrName = this.consume(
                TokenType.Identifier,
                "Expected attribute name",
            ).value;
            this.consume(TokenType.Equals, "Expected '='");
            this.consume(TokenType.LBrace, "Expected '{'");
            this.nesting++;
            attributes[attrName] = this.expression();
            this.nesting--;
            this.consume(TokenType.RBrace, "Expected '}'");
        }
        this.consume(TokenType.ForeignClose, "Expected '>'");

        const codeToken = this.consume(
            TokenType.ForeignBody,
            "Expected runtime code body",
        );
        const endToken = this.consume(
            TokenType.ForeignEnd,
            `Expected closing tag </${runtimeName}>`,
        );

        return {
            type: "ForeignExpression",
            runtimeName,
            attributes,
            code: codeToken.value,
            loc: this.mergeLoc(this.getLoc(startToken), this.getLoc(endToken)),
        };
    }

    private interpolationParts(parts: TokenPart[]): InterpolationPart[] {
        return parts.map((part): InterpolationPart => {
            if (part.kind === "text") return part;
            const tokens = new Lexer(part.source, part.line, part.col).tokenize();
            const expression = new Parser(tokens, this.source).parseExpression();
            return { kind: "expr", expression };
        });
    }

    private breaksLine(): boolean {
        return this.nesting === 0 && this.peek().newlineBefore;
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private check(...types: TokenType[]): boolean {
        if (this.isAtEnd()) return false;
        const currentType = this.peek().type;
        return types.includes(currentType);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private peekNext(): Token {
        if (this.current + 1 >= this.tokens.length)
            return this.tokens[this.tokens.length - 1]; // Return EOF if out of bounds
        return this.tokens[this.current + 1];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private error(token: Token, message: string): YpshError {
        const found =
            token.type === TokenType.EOF ? "end of input" : `'${token.value}'`;
        return new YpshError(
            "ParseError",
            `${message}, found ${found}`,
            this.getLoc(token),
            { source: this.source },
        );
    }
}
