import path from "path";

import { AST, SourceLocation, Statement } from "../types/ast";
import {
    Expression,
    ForeignExpression,
    InterpolationPart,
} from "../types/expression";
import {
    AssignmentOperator,
    AssignmentStatement,
    ClassStatement,
    DoCatchStatement,
    ForStatement,
    FuncStatement,
    IfStatement,
    ImportStatement,
    ShellStatement,
    SwitchStatement,
    TemplateStatement,
    EnumStatement,
    WhileStatement,
} from "../parser/statements";
import { Lexer } from "../lexer/Lexer";
import { Parser } from "../parser/Parser";
import { Orchestrator } from "../orchestrator/Orchestrator";
import { ICommandRunner } from "../orchestrator/container/IRuntimeContainer";
import { BashContainer } from "../orchestrator/container/BashContainer";
import { createBuiltins } from "../library/builtins";
import { checkArity } from "../library/utils/native";
import { unify } from "../library/utils/unify";
import {
    ClassValue,
    EnumMemberValue,
    EnumValue,
    FuncValue,
    InstanceValue,
    ModuleValue,
    NONE,
    NativeValue,
    TemplateValue,
    Value,
    bool,
    dict,
    float,
    int,
    list,
    str,
} from "../values/Value";
import { Invoker, fromHost, toHost } from "../values/host";
import { YpshError } from "../utils/Error";
import { OutputSink, processOutput } from "../utils/output";
import { matchesAnnotation, typeName } from "../utils/typesystem";
import { Completion, normal } from "./Completion";
import { Environment } from "./Environment";
import { binaryOperation, isTruthy, valuesEqual } from "./operators";

export type ModuleLoader = (path: string, base: string) => string | null;

/**
 * Modules loaded during one session, shared by every interpreter of it.
 */
export interface ModuleRegistry {
    cache: Map<string, ModuleValue>;
    loading: Set<string>;
}

export interface InterpreterOptions {
    orchestrator?: Orchestrator;
    commandRunner?: ICommandRunner;
    output?: OutputSink;
    moduleLoader?: ModuleLoader;
    file?: string;
    modules?: ModuleRegistry;
}

interface NamedValue {
    name: string;
    value: Value;
}

const COMPOUND_OPERATORS = {
    "+=": "+",
    "-=": "-",
    "*=": "*",
    "/=": "/",
    "%=": "%",
} as const satisfies Record<Exclude<AssignmentOperator, "=">, string>;

export class Interpreter {
    public readonly globals: Environment = new Environment("global");
    private orchestrator?: Orchestrator;
    private commandRunner: ICommandRunner;
    private output: OutputSink;
    private source: string = "";

    // Module System
    private moduleLoader?: ModuleLoader;
    private currentFile: string;
    private modules: ModuleRegistry;

    private invoker: Invoker = (callee, args) => this.callValue(callee, args);

    constructor(options: InterpreterOptions = {}) {
        this.orchestrator = options.orchestrator;
        this.commandRunner =
            options.commandRunner ??
            options.orchestrator?.shell ??
            new BashContainer();
        this.output = options.output ?? processOutput;
        this.moduleLoader = options.moduleLoader;
        this.currentFile = options.file ?? "<main>";
        this.modules = options.modules ?? {
            cache: new Map(),
            loading: new Set(),
        };
        this.initializeBuiltins();
    }

    private initializeBuiltins() {
        const builtins = createBuiltins({
            output: this.output,
            commandRunner: this.commandRunner,
        });
        for (const [name, value] of builtins) {
            this.globals.define(name, value);
        }
    }

    /**
     * Runs a program in the global environment. Stops at the first
     * statement that does not complete normally.
     */
    public run(ast: AST, source: string): Completion {
        this.source = source;
        let last: Value = NONE;
        for (const statement of ast.statements) {
            const completion = this.execute(statement, this.globals);
            if (completion.kind !== "normal") return completion;
            last = completion.value;
        }
        return normal(last);
    }

    public getVariable(name: string): Value | undefined {
        return this.globals.get(name);
    }

    public execute(stmt: Statement, env: Environment): Completion {
        try {
            return this.executeStatement(stmt, env);
        } catch (e) {
            return { kind: "error", error: this.toError(e, stmt.loc) };
        }
    }

    public evaluate(expr: Expression, env: Environment): Value {
        try {
            return this.evaluateExpression(expr, env);
        } catch (e) {
            throw this.toError(e, expr.loc);
        }
    }

    private toError(e: unknown, loc: SourceLocation): YpshError {
        if (e instanceof YpshError) {
            return e.attach(loc, this.source, this.currentFile);
        }
        if (e instanceof RangeError && /call stack/i.test(e.message)) {
            return new YpshError(
                "Error",
                "Maximum recursion depth exceeded",
                loc,
                { source: this.source, file: this.currentFile },
            );
        }
        if (e instanceof RangeError) {
            return new YpshError("ValueError", e.message, loc, {
                source: this.source,
                file: this.currentFile,
            });
        }
        throw e;
    }

    private executeBlock(statements: Statement[], env: Environment): Completion {
        for (const statement of statements) {
            const completion = this.execute(statement, env);
            if (completion.kind !== "normal") return completion;
        }
        return normal(NONE);
    }

    private executeStatement(stmt: Statement, env: Environment): Completion {
        switch (stmt.kind) {
            case "VarStatement": {
                const value = this.evaluate(stmt.value, env);
                this.checkAnnotation(
                    value,
                    stmt.annotation,
                    env,
                    `Variable '${stmt.name}'`,
                );
                env.declare(stmt.name, value, stmt.constant, stmt.scope);
                return normal(NONE);
            }

            case "AssignmentStatement":
                this.executeAssignment(stmt, env);
                return normal(NONE);

            case "ExpressionStatement":
                return normal(this.evaluate(stmt.expression, env));

            case "BlockStatement":
                return this.executeBlock(
                    stmt.statements,
                    new Environment("block", env),
                );

            case "IfStatement":
                return this.executeIf(stmt, env);

            case "SwitchStatement":
                return this.executeSwitch(stmt, env);

            case "ForStatement":
                return this.executeFor(stmt, env);

            case "WhileStatement":
                return this.executeWhile(stmt, env);

            case "BreakStatement":
                return { kind: "break" };

            case "ContinueStatement":
                return { kind: "continue" };

            case "ReturnStatement":
                return {
                    kind: "return",
                    value: stmt.value ? this.evaluate(stmt.value, env) : NONE,
                };

            case "FuncStatement":
                env.declare(stmt.name, this.makeFunction(stmt, env));
                return normal(NONE);

            case "TemplateStatement":
                env.declare(stmt.name, this.makeTemplate(stmt, env));
                return normal(NONE);

            case "ClassStatement":
                env.declare(stmt.name, this.makeClass(stmt, env));
                return normal(NONE);

            case "EnumStatement":
                env.declare(stmt.name, this.makeEnum(stmt));
                return normal(NONE);

            case "DoCatchStatement":
                return this.executeDoCatch(stmt, env);

            case "ShellStatement":
                return this.executeShell(stmt, env);

            case "ImportStatement":
                return this.executeImport(stmt, env);
        }
    }

    private executeAssignment(stmt: AssignmentStatement, env: Environment) {
        const target = stmt.assignee;

        if (target.type === "VarReference") {
            const value =
                stmt.operator === "="
                    ? this.evaluate(stmt.value, env)
                    : this.compound(
                          stmt.operator,
                          this.lookup(target.varName, env),
                          stmt,
                          env,
                      );
            env.assign(target.varName, value);
            return;
        }

        const object = this.evaluate(target.object, env);

        if (target.type === "MemberExpression") {
            const value =
                stmt.operator === "="
                    ? this.evaluate(stmt.value, env)
                    : this.compound(
                          stmt.operator,
                          this.getAttribute(object, target.property),
                          stmt,
                          env,
                      );
            this.setAttribute(object, target.property, value);
            return;
        }

        const index = this.evaluate(target.index, env);
        const value =
            stmt.operator === "="
                ? this.evaluate(stmt.value, env)
                : this.compound(
                      stmt.operator,
                      this.getIndex(object, index),
                      stmt,
                      env,
                  );
        this.setIndex(object, index, value);
    }

    private compound(
        operator: Exclude<AssignmentOperator, "=">,
        current: Value,
        stmt: AssignmentStatement,
        env: Environment,
    ): Value {
        const right = this.evaluate(stmt.value, env);
        return binaryOperation(COMPOUND_OPERATORS[operator], current, right);
    }

    private executeIf(stmt: IfStatement, env: Environment): Completion {
        if (isTruthy(this.evaluate(stmt.condition, env))) {
            return this.execute(stmt.thenBranch, env);
        }
        if (stmt.elseBranch) {
            return this.execute(stmt.elseBranch, env);
        }
        return normal(NONE);
    }

    private executeSwitch(stmt: SwitchStatement, env: Environment): Completion {
        const value = this.evaluate(stmt.discriminant, env);

        for (const arm of stmt.cases) {
            for (const candidate of arm.values) {
                if (valuesEqual(value, this.evaluate(candidate, env))) {
                    return this.execute(arm.body, env);
                }
            }
        }

        if (stmt.defaultCase) {
            return this.execute(stmt.defaultCase, env);
        }
        return normal(NONE);
    }

    private executeFor(stmt: ForStatement, env: Environment): Completion {
        const items = this.iterate(this.evaluate(stmt.iterable, env));

        for (const item of items) {
            // Fresh frame per iteration, closures keep their own item
            const frame = new Environment("block", env);
            frame.define(stmt.variable, item);

            const completion = this.executeBlock(stmt.body.statements, frame);
            if (completion.kind === "break") break;
            if (completion.kind === "continue") continue;
            if (completion.kind !== "normal") return completion;
        }

        return normal(NONE);
    }

    private executeWhile(stmt: WhileStatement, env: Environment): Completion {
        while (isTruthy(this.evaluate(stmt.condition, env))) {
            const completion = this.execute(stmt.body, env);
            if (completion.kind === "break") break;
            if (completion.kind === "continue") continue;
            if (completion.kind !== "normal") return completion;
        }

        return normal(NONE);
    }

    private iterate(value: Value): Value[] {
        switch (value.type) {
            case "list":
                return [...value.value];
            case "dict":
                // Keys are taken once, changes made by the body are not seen
                return [...value.value.keys()].map(str);
            case "str":
                return Array.from(value.value, (char) => str(char));
            default:
                throw new YpshError(
                    "TypeError",
                    `'${typeName(value)}' is not iterable`,
                );
        }
    }

    private executeDoCatch(stmt: DoCatchStatement, env: Environment): Completion {
        const completion = this.execute(stmt.body, env);
        if (completion.kind !== "error") return completion;

        const frame = new Environment("block", env);
        if (stmt.errorName) {
            frame.define(stmt.errorName, this.errorPayload(completion.error));
        }
        return this.executeBlock(stmt.handler.statements, frame);
    }

    private errorPayload(error: YpshError): Value {
        if (error.payload) return error.payload;

        const payload = dict([
            ["name", str(error.kind)],
            ["message", str(error.rawMessage)],
            ["line", error.loc ? int(error.loc.line) : NONE],
            ["col", error.loc ? int(error.loc.col) : NONE],
        ]);
        if (error.exitCode !== undefined) {
            payload.value.set("code", int(error.exitCode));
        }
        return payload;
    }

    private executeShell(stmt: ShellStatement, env: Environment): Completion {
        const command = this.interpolate(stmt.parts, env);
        const result = this.commandRunner.runCommand(command);

        if (result.stdout) this.output.write(result.stdout);
        if (result.stderr) this.output.error(result.stderr);

        if (result.code !== 0) {
            throw new YpshError(
                "ShellCommandError",
                `Command exited with code ${result.code}: ${command}`,
                undefined,
                { exitCode: result.code },
            );
        }
        return normal(NONE);
    }

    private executeImport(stmt: ImportStatement, env: Environment): Completion {
        const module = this.loadModule(stmt.moduleName);

        if (!stmt.imports) {
            env.declare(stmt.alias ?? module.name, module);
            return normal(NONE);
        }

        for (const imp of stmt.imports) {
            const value = module.env.getOwn(imp.name);
            if (!value) {
                throw new YpshError(
                    "ImportError",
                    `Module '${stmt.moduleName}' has no binding '${imp.name}'`,
                );
            }
            env.declare(imp.alias ?? imp.name, value);
        }
        return normal(NONE);
    }

    private loadModule(moduleName: string): ModuleValue {
        const key = moduleName.startsWith(".")
            ? path.join(path.dirname(this.currentFile), moduleName)
            : moduleName;

        const cached = this.modules.cache.get(key);
        if (cached) return cached;

        if (this.modules.loading.has(key)) {
            throw new YpshError(
                "ImportError",
                `Circular import of '${moduleName}'`,
            );
        }

        if (!this.moduleLoader) {
            throw new YpshError(
                "ImportError",
                `Module loader not configured. Cannot import '${moduleName}'`,
            );
        }

        const moduleCode = this.moduleLoader(moduleName, this.currentFile);
        if (moduleCode === null) {
            throw new YpshError(
                "ImportError",
                `Module '${moduleName}' not found`,
            );
        }

        let ast: AST;
        try {
            ast = new Parser(new Lexer(moduleCode).tokenize(), moduleCode).parse();
        } catch (e) {
            if (e instanceof YpshError) {
                const where = e.loc ? ` (line ${e.loc.line}:${e.loc.col})` : "";
                throw new YpshError(
                    "ImportError",
                    `Error in module '${moduleName}'${where}: ${e.rawMessage}`,
                );
            }
            throw e;
        }

        const moduleInterpreter = new Interpreter({
            orchestrator: this.orchestrator,
            commandRunner: this.commandRunner,
            output: this.output,
            moduleLoader: this.moduleLoader,
            file: key,
            modules: this.modules,
        });

        this.modules.loading.add(key);
        let completion: Completion;
        try {
            completion = moduleInterpreter.run(ast, moduleCode);
        } finally {
            this.modules.loading.delete(key);
        }

        if (completion.kind === "error") {
            throw completion.error;
        }

        const module: ModuleValue = {
            type: "module",
            name: path.basename(moduleName, path.extname(moduleName)),
            env: moduleInterpreter.globals,
        };
        this.modules.cache.set(key, module);
        return module;
    }

    private evaluateExpression(expr: Expression, env: Environment): Value {
        switch (expr.type) {
            case "StringLiteral":
                return str(expr.value);
            case "IntLiteral":
                return int(expr.value);
            case "FloatLiteral":
                return float(expr.value);
            case "BoolLiteral":
                return bool(expr.value);
            case "NoneLiteral":
                return NONE;
            case "InterpolatedString":
                return str(this.interpolate(expr.parts, env));
            case "ListLiteral":
                return list(expr.elements.map((e) => this.evaluate(e, env)));
            case "DictLiteral":
                return dict(
                    expr.entries.map(({ key, value }): [string, Value] => [
                        key,
                        this.evaluate(value, env),
                    ]),
                );
            case "VarReference":
                return this.lookup(expr.varName, env);

            case "UnaryExpression": {
                const value = this.evaluate(expr.value, env);
                if (expr.operator === "!") return bool(!isTruthy(value));
                if (value.type === "int") return int(-value.value);
                if (value.type === "float") return float(-value.value);
                throw new YpshError(
                    "TypeError",
                    `Bad operand type for unary -: '${typeName(value)}'`,
                );
            }

            case "BinaryExpression": {
                const left = this.evaluate(expr.left, env);
                if (expr.operator === "&&") {
                    return bool(
                        isTruthy(left) && isTruthy(this.evaluate(expr.right, env)),
                    );
                }
                if (expr.operator === "||") {
                    return bool(
                        isTruthy(left) || isTruthy(this.evaluate(expr.right, env)),
                    );
                }
                const right = this.evaluate(expr.right, env);
                return binaryOperation(expr.operator, left, right);
            }

            case "TernaryExpression":
                return isTruthy(this.evaluate(expr.condition, env))
                    ? this.evaluate(expr.consequent, env)
                    : this.evaluate(expr.alternate, env);

            case "IndexExpression": {
                const object = this.evaluate(expr.object, env);
                const index = this.evaluate(expr.index, env);
                return this.getIndex(object, index);
            }

            case "MemberExpression":
                return this.getAttribute(
                    this.evaluate(expr.object, env),
                    expr.property,
                );

            case "CallExpression": {
                const callee = this.evaluate(expr.callee, env);
                const args = expr.arguments.map((a) => this.evaluate(a, env));
                const kwargs = expr.keywordArguments.map((k) => ({
                    name: k.name,
                    value: this.evaluate(k.value, env),
                }));
                return this.callValue(callee, args, kwargs);
            }

            case "ForeignExpression":
                return this.evaluateForeign(expr, env);
        }
    }

    private lookup(name: string, env: Environment): Value {
        const value = env.get(name);
        if (!value) {
            throw new YpshError("NameError", `Name '${name}' is not defined`);
        }
        return value;
    }

    private interpolate(parts: InterpolationPart[], env: Environment): string {
        return parts
            .map((part) =>
                part.kind === "text"
                    ? part.value
                    : unify(this.evaluate(part.expression, env)),
            )
            .join("");
    }

    private evaluateForeign(
        block: ForeignExpression,
        env: Environment,
    ): Value {
        if (!this.orchestrator) {
            throw new YpshError(
                "ForeignExecutionError",
                `No orchestrator attached, cannot run <${block.runtimeName}> block`,
            );
        }

        // Pass context into runtime
        const ctx: Record<string, unknown> = {};
        for (const [key, valueExpr] of Object.entries(block.attributes)) {
            ctx[key] = toHost(this.evaluate(valueExpr, env), this.invoker);
        }

        let result: unknown;
        try {
            // Execute code inside container, via orchestrator
            result = this.orchestrator.execute(block.runtimeName, block.code, ctx);
        } catch (e) {
            if (e instanceof YpshError) throw e;
            throw new YpshError(
                "ForeignExecutionError",
                `<${block.runtimeName}> block failed: ${errorMessage(e)}`,
            );
        }

        return fromHost(result);
    }

    public callValue(
        callee: Value,
        args: Value[],
        kwargs: NamedValue[] = [],
    ): Value {
        switch (callee.type) {
            case "func":
                return this.callFunction(callee, args, kwargs);
            case "method":
                return this.callFunction(callee.fn, args, kwargs, callee.receiver);
            case "native":
                return this.callNative(callee, args, kwargs);
            case "class":
                return this.instantiate(callee, args, kwargs);
            case "template":
                throw new YpshError(
                    "TypeError",
                    `Cannot instantiate template '${callee.name}'`,
                    undefined,
                    { hint: `Declare a class based on it: class My${callee.name}: ${callee.name} { }` },
                );
            default:
                throw new YpshError(
                    "TypeError",
                    `'${typeName(callee)}' is not callable`,
                );
        }
    }

    private callNative(
        callee: NativeValue,
        args: Value[],
        kwargs: NamedValue[],
    ): Value {
        if (kwargs.length > 0) {
            throw new YpshError(
                "ArityError",
                `${callee.name}() does not take keyword arguments`,
            );
        }
        const arityError = checkArity(callee.name, callee.fn.signature, args.length);
        if (arityError) {
            throw new YpshError("ArityError", arityError);
        }
        return callee.fn(...args);
    }

    private callFunction(
        fn: FuncValue,
        args: Value[],
        kwargs: NamedValue[],
        receiver?: InstanceValue,
    ): Value {
        const decl = fn.declaration;
        const frame = new Environment("function", fn.closure);

        let params = decl.params;
        if (receiver) {
            // An explicit leading `self` takes the receiver positionally
            frame.define("self", receiver);
            if (params[0]?.name === "self") params = params.slice(1);
        }

        if (args.length > params.length) {
            throw new YpshError(
                "ArityError",
                `${fn.name}() takes ${params.length} positional argument${params.length === 1 ? "" : "s"} but ${args.length} were given`,
            );
        }

        const keywords = new Map<string, Value>();
        for (const { name, value } of kwargs) {
            if (!params.some((p) => p.name === name)) {
                throw new YpshError(
                    "ArityError",
                    `${fn.name}() got an unexpected keyword argument '${name}'`,
                );
            }
            if (keywords.has(name)) {
                throw new YpshError(
                    "ArityError",
                    `${fn.name}() got multiple values for argument '${name}'`,
                );
            }
            keywords.set(name, value);
        }

        params.forEach((param, i) => {
            const keyword = keywords.get(param.name);
            let value: Value;
            if (i < args.length) {
                if (keyword) {
                    throw new YpshError(
                        "ArityError",
                        `${fn.name}() got multiple values for argument '${param.name}'`,
                    );
                }
                value = args[i];
            } else if (keyword) {
                value = keyword;
            } else if (param.defaultValue) {
                // Defaults see the parameters bound before them
                value = this.evaluate(param.defaultValue, frame);
            } else {
                throw new YpshError(
                    "ArityError",
                    `${fn.name}() missing required argument '${param.name}'`,
                );
            }

            this.checkAnnotation(
                value,
                param.annotation,
                frame,
                `Argument '${param.name}' of ${fn.name}()`,
            );
            frame.define(param.name, value);
        });

        const completion = this.executeBlock(decl.body.statements, frame);
        switch (completion.kind) {
            case "error":
                throw completion.error;
            case "return":
                this.checkAnnotation(
                    completion.value,
                    decl.returnType,
                    frame,
                    `Return value of ${fn.name}()`,
                );
                return completion.value;
            default:
                return NONE;
        }
    }

    private checkAnnotation(
        value: Value,
        annotation: string | undefined,
        env: Environment,
        subject: string,
    ) {
        if (!annotation) return;
        if (!matchesAnnotation(value, annotation, (name) => env.get(name))) {
            throw new YpshError(
                "TypeError",
                `${subject} must be '${annotation}', got '${typeName(value)}'`,
            );
        }
    }

    private makeFunction(stmt: FuncStatement, env: Environment): FuncValue {
        return {
            type: "func",
            name: stmt.name,
            declaration: stmt,
            closure: env,
        };
    }

    private makeMethods(
        methods: FuncStatement[],
        env: Environment,
    ): Map<string, FuncValue> {
        return new Map(
            methods.map((m): [string, FuncValue] => [
                m.name,
                this.makeFunction(m, env),
            ]),
        );
    }

    private makeTemplate(stmt: TemplateStatement, env: Environment): TemplateValue {
        return {
            type: "template",
            name: stmt.name,
            fields: stmt.fields,
            methods: this.makeMethods(stmt.methods, env),
            closure: env,
        };
    }

    private makeClass(stmt: ClassStatement, env: Environment): ClassValue {
        let parent: ClassValue | TemplateValue | undefined;

        if (stmt.parent) {
            const resolved = env.get(stmt.parent);
            if (!resolved) {
                throw new YpshError(
                    "NameError",
                    `Parent '${stmt.parent}' of class '${stmt.name}' is not defined`,
                );
            }
            if (resolved.type !== "class" && resolved.type !== "template") {
                throw new YpshError(
                    "TypeError",
                    `Class '${stmt.name}' cannot extend '${typeName(resolved)}', expected a template or class`,
                );
            }
            parent = resolved;
        }

        return {
            type: "class",
            name: stmt.name,
            fields: stmt.fields,
            methods: this.makeMethods(stmt.methods, env),
            parent,
            closure: env,
        };
    }

    private makeEnum(stmt: EnumStatement): EnumValue {
        const enumValue: EnumValue = { type: "enum", name: stmt.name, cases: [] };
        enumValue.cases = stmt.cases.map(
            (c, ordinal): EnumMemberValue => ({
                type: "member",
                owner: enumValue,
                ordinal,
                name: c.name,
            }),
        );
        return enumValue;
    }

    private instantiate(
        cls: ClassValue,
        args: Value[],
        kwargs: NamedValue[],
    ): InstanceValue {
        const instance: InstanceValue = {
            type: "instance",
            cls,
            fields: new Map(),
            constants: new Set(),
        };

        // Root of the chain first, so subclasses override parent fields
        const chain: (ClassValue | TemplateValue)[] = [];
        for (
            let owner: ClassValue | TemplateValue | undefined = cls;
            owner;
            owner = owner.type === "class" ? owner.parent : undefined
        ) {
            chain.unshift(owner);
        }

        for (const owner of chain) {
            for (const field of owner.fields) {
                const value = this.evaluate(field.value, owner.closure);
                this.checkAnnotation(
                    value,
                    field.annotation,
                    owner.closure,
                    `Field '${field.name}' of ${cls.name}`,
                );
                instance.fields.set(field.name, value);
                if (field.constant) instance.constants.add(field.name);
                else instance.constants.delete(field.name);
            }
        }

        const init = this.findMethod(cls, "__init__");
        if (init) {
            this.callFunction(init, args, kwargs, instance);
        } else if (args.length > 0 || kwargs.length > 0) {
            throw new YpshError(
                "ArityError",
                `${cls.name}() takes no arguments`,
            );
        }

        return instance;
    }

    private findMethod(
        owner: ClassValue | TemplateValue,
        name: string,
    ): FuncValue | undefined {
        let current: ClassValue | TemplateValue | undefined = owner;
        while (current) {
            const method = current.methods.get(name);
            if (method) return method;
            current = current.type === "class" ? current.parent : undefined;
        }
        return undefined;
    }

    private getAttribute(object: Value, name: string): Value {
        switch (object.type) {
            case "instance": {
                const field = object.fields.get(name);
                if (field) return field;
                const method = this.findMethod(object.cls, name);
                if (method) return { type: "method", receiver: object, fn: method };
                break;
            }
            case "class":
            case "template": {
                const method = this.findMethod(object, name);
                if (method) return method;
                break;
            }
            case "enum": {
                const member = object.cases.find((c) => c.name === name);
                if (member) return member;
                break;
            }
            case "member":
                if (name === "name") return str(object.name);
                if (name === "ordinal") return int(object.ordinal);
                break;
            case "dict": {
                const entry = object.value.get(name);
                if (entry) return entry;
                break;
            }
            case "module": {
                const binding = object.env.getOwn(name);
                if (binding) return binding;
                break;
            }
        }

        throw new YpshError(
            "AttributeError",
            `'${typeName(object)}' has no attribute '${name}'`,
        );
    }

    private setAttribute(object: Value, name: string, value: Value) {
        switch (object.type) {
            case "instance":
                if (object.constants.has(name)) {
                    throw new YpshError(
                        "ImmutableAssignmentError",
                        `Cannot assign to constant field '${name}'`,
                    );
                }
                object.fields.set(name, value);
                return;
            case "dict":
                object.value.set(name, value);
                return;
            case "module":
                if (!object.env.hasOwn(name)) break;
                object.env.assign(name, value);
                return;
        }

        throw new YpshError(
            "AttributeError",
            `Cannot set attribute '${name}' on '${typeName(object)}'`,
        );
    }

    private getIndex(object: Value, index: Value): Value {
        if (object.type === "list" || object.type === "str") {
            const items =
                object.type === "list" ? object.value : Array.from(object.value);
            if (index.type !== "int") {
                throw new YpshError(
                    "TypeError",
                    `${object.type} index must be 'int', got '${typeName(index)}'`,
                );
            }
            if (index.value < 0 || index.value >= items.length) {
                throw new YpshError(
                    "IndexError",
                    `${object.type} index ${index.value} out of range`,
                );
            }
            const item = items[index.value];
            return typeof item === "string" ? str(item) : item;
        }

        if (object.type === "dict") {
            if (index.type !== "str") {
                throw new YpshError(
                    "TypeError",
                    `dict key must be 'str', got '${typeName(index)}'`,
                );
            }
            const value = object.value.get(index.value);
            if (!value) {
                throw new YpshError("KeyError", `Key '${index.value}' not found`);
            }
            return value;
        }

        throw new YpshError(
            "TypeError",
            `'${typeName(object)}' is not indexable`,
        );
    }

    private setIndex(object: Value, index: Value, value: Value) {
        if (object.type === "list") {
            if (index.type !== "int") {
                throw new YpshError(
                    "TypeError",
                    `list index must be 'int', got '${typeName(index)}'`,
                );
            }
            if (index.value < 0 || index.value >= object.value.length) {
                throw new YpshError(
                    "IndexError",
                    `list assignment index ${index.value} out of range`,
                );
            }
            object.value[index.value] = value;
            return;
        }

        if (object.type === "dict") {
            if (index.type !== "str") {
                throw new YpshError(
                    "TypeError",
                    `dict key must be 'str', got '${typeName(index)}'`,
                );
            }
            object.value.set(index.value, value);
            return;
        }

        throw new YpshError(
            "TypeError",
            `'${typeName(object)}' does not support item assignment`,
        );
    }
}

function errorMessage(e: unknown): string {
    // Errors thrown inside a vm context are not instances of this realm's Error
    if (typeof e === "object" && e !== null && "message" in e) {
        return String(e.message);
    }
    return String(e);
}
