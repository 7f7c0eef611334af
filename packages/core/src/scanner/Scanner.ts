import path from "path";

import { BUILTIN_NAMES } from "../library/builtins";
import { AST, SourceLocation, Statement } from "../types/ast";
import { Expression, InterpolationPart } from "../types/expression";
import { FuncStatement } from "../parser/statements";
import { YpshError } from "../utils/Error";

interface ScanContext {
    names: Set<string>;
    parent?: ScanContext;
}

export interface ScannerResult {
    errors: YpshError[];
}

/**
 * Reports undeclared names without running the program. Declarations are
 * hoisted to the frame they bind in, so use-before-declaration inside a frame
 * is not reported.
 */
export class Scanner {
    private source: string;
    private file?: string;
    private errors: YpshError[] = [];
    public globalContext: ScanContext = { names: new Set() };

    constructor(source: string, file?: string) {
        this.source = source;
        this.file = file;
    }

    public scan(ast: AST): ScannerResult {
        this.errors = [];
        this.globalContext = { names: new Set<string>(BUILTIN_NAMES) };

        this.hoist(ast.statements, this.globalContext);
        for (const stmt of ast.statements) {
            this.scanStatement(stmt, this.globalContext);
        }

        return { errors: this.errors };
    }

    private root(ctx: ScanContext): ScanContext {
        return ctx.parent ? this.root(ctx.parent) : ctx;
    }

    private isDeclared(name: string, ctx: ScanContext): boolean {
        for (let c: ScanContext | undefined = ctx; c; c = c.parent) {
            if (c.names.has(name)) return true;
        }
        return false;
    }

    /**
     * Collects every name a frame declares, descending into blocks but not
     * into nested functions or type bodies.
     */
    private hoist(statements: Statement[], ctx: ScanContext) {
        for (const stmt of statements) {
            switch (stmt.kind) {
                case "VarStatement":
                    (stmt.scope === "global" ? this.root(ctx) : ctx).names.add(
                        stmt.name,
                    );
                    break;
                case "FuncStatement":
                case "TemplateStatement":
                case "ClassStatement":
                case "EnumStatement":
                    ctx.names.add(stmt.name);
                    break;
                case "ImportStatement":
                    if (stmt.imports) {
                        for (const imp of stmt.imports) {
                            ctx.names.add(imp.alias ?? imp.name);
                        }
                    } else {
                        const base = path.basename(
                            stmt.moduleName,
                            path.extname(stmt.moduleName),
                        );
                        ctx.names.add(stmt.alias ?? base);
                    }
                    break;
                case "BlockStatement":
                    this.hoist(stmt.statements, ctx);
                    break;
                case "IfStatement":
                    this.hoist([stmt.thenBranch], ctx);
                    if (stmt.elseBranch) this.hoist([stmt.elseBranch], ctx);
                    break;
                case "SwitchStatement":
                    this.hoist(
                        stmt.cases.map((c) => c.body),
                        ctx,
                    );
                    if (stmt.defaultCase) this.hoist([stmt.defaultCase], ctx);
                    break;
                case "ForStatement":
                    ctx.names.add(stmt.variable);
                    this.hoist(stmt.body.statements, ctx);
                    break;
                case "WhileStatement":
                    this.hoist(stmt.body.statements, ctx);
                    break;
                case "DoCatchStatement":
                    this.hoist(stmt.body.statements, ctx);
                    if (stmt.errorName) ctx.names.add(stmt.errorName);
                    this.hoist(stmt.handler.statements, ctx);
                    break;
            }
        }
    }

    private scanStatement(stmt: Statement, ctx: ScanContext) {
        switch (stmt.kind) {
            case "VarStatement":
                this.scanExpression(stmt.value, ctx);
                return;

            case "AssignmentStatement":
                this.scanExpression(stmt.assignee, ctx);
                this.scanExpression(stmt.value, ctx);
                return;

            case "ExpressionStatement":
                this.scanExpression(stmt.expression, ctx);
                return;

            case "BlockStatement":
                for (const s of stmt.statements) this.scanStatement(s, ctx);
                return;

            case "IfStatement":
                this.scanExpression(stmt.condition, ctx);
                this.scanStatement(stmt.thenBranch, ctx);
                if (stmt.elseBranch) this.scanStatement(stmt.elseBranch, ctx);
                return;

            case "SwitchStatement":
                this.scanExpression(stmt.discriminant, ctx);
                for (const arm of stmt.cases) {
                    for (const value of arm.values) this.scanExpression(value, ctx);
                    this.scanStatement(arm.body, ctx);
                }
                if (stmt.defaultCase) this.scanStatement(stmt.defaultCase, ctx);
                return;

            case "ForStatement":
                this.scanExpression(stmt.iterable, ctx);
                this.scanStatement(stmt.body, ctx);
                return;

            case "WhileStatement":
                this.scanExpression(stmt.condition, ctx);
                this.scanStatement(stmt.body, ctx);
                return;

            case "ReturnStatement":
                if (stmt.value) this.scanExpression(stmt.value, ctx);
                return;

            case "FuncStatement":
                this.scanFunction(stmt, ctx, false);
                return;

            case "TemplateStatement":
            case "ClassStatement":
                if (stmt.kind === "ClassStatement" && stmt.parent) {
                    if (!this.isDeclared(stmt.parent, ctx)) {
                        this.report(`Undeclared identifier '${stmt.parent}'`, stmt.loc);
                    }
                }
                // Field initializers run in the scope the type is declared in
                for (const field of stmt.fields) {
                    this.scanExpression(field.value, ctx);
                }
                for (const method of stmt.methods) {
                    this.scanFunction(method, ctx, true);
                }
                return;

            case "DoCatchStatement":
                this.scanStatement(stmt.body, ctx);
                this.scanStatement(stmt.handler, ctx);
                return;

            case "ShellStatement":
                this.scanParts(stmt.parts, ctx);
                return;

            case "EnumStatement":
            case "ImportStatement":
            case "BreakStatement":
            case "ContinueStatement":
                return;
        }
    }

    private scanFunction(fn: FuncStatement, ctx: ScanContext, isMethod: boolean) {
        const fnCtx: ScanContext = { names: new Set(), parent: ctx };
        if (isMethod) fnCtx.names.add("self");
        for (const param of fn.params) fnCtx.names.add(param.name);

        for (const param of fn.params) {
            if (param.defaultValue) this.scanExpression(param.defaultValue, fnCtx);
        }

        this.hoist(fn.body.statements, fnCtx);
        for (const s of fn.body.statements) this.scanStatement(s, fnCtx);
    }

    private scanParts(parts: InterpolationPart[], ctx: ScanContext) {
        for (const part of parts) {
            if (part.kind === "expr") this.scanExpression(part.expression, ctx);
        }
    }

    private scanExpression(expr: Expression, ctx: ScanContext) {
        switch (expr.type) {
            case "VarReference":
                if (!this.isDeclared(expr.varName, ctx)) {
                    this.report(`Undeclared identifier '${expr.varName}'`, expr.loc);
                }
                return;

            case "CallExpression":
                if (
                    expr.callee.type === "VarReference" &&
                    !this.isDeclared(expr.callee.varName, ctx)
                ) {
                    this.report(
                        `Call to undeclared function '${expr.callee.varName}'`,
                        expr.callee.loc,
                    );
                } else {
                    this.scanExpression(expr.callee, ctx);
                }
                for (const arg of expr.arguments) this.scanExpression(arg, ctx);
                for (const kw of expr.keywordArguments) {
                    this.scanExpression(kw.value, ctx);
                }
                return;

            case "InterpolatedString":
                this.scanParts(expr.parts, ctx);
                return;

            case "ListLiteral":
                for (const e of expr.elements) this.scanExpression(e, ctx);
                return;

            case "DictLiteral":
                for (const entry of expr.entries) this.scanExpression(entry.value, ctx);
                return;

            case "MemberExpression":
                this.scanExpression(expr.object, ctx);
                return;

            case "IndexExpression":
                this.scanExpression(expr.object, ctx);
                this.scanExpression(expr.index, ctx);
                return;

            case "ForeignExpression":
                for (const value of Object.values(expr.attributes)) {
                    this.scanExpression(value, ctx);
                }
                return;

            case "BinaryExpression":
                this.scanExpression(expr.left, ctx);
                this.scanExpression(expr.right, ctx);
                return;

            case "UnaryExpression":
                this.scanExpression(expr.value, ctx);
                return;

            case "TernaryExpression":
                this.scanExpression(expr.condition, ctx);
                this.scanExpression(expr.consequent, ctx);
                this.scanExpression(expr.alternate, ctx);
                return;

            default:
                return;
        }
    }

    private report(message: string, loc: SourceLocation) {
        this.errors.push(
            new YpshError("NameError", message, loc, {
                source: this.source,
                file: this.file,
            }),
        );
    }
}
