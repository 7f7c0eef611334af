import readline from "readline";
import chalk from "chalk";

import { Lexer } from "../lexer/Lexer";
import { Parser } from "../parser/Parser";
import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST } from "../types/ast";
import { unify } from "../library/utils/unify";
import { YpshError } from "../utils/Error";
import { OutputSink, processOutput } from "../utils/output";
import { Interpreter, InterpreterOptions } from "./Interpreter";

const OPENERS = new Set([TokenType.LParen, TokenType.LBrace, TokenType.LBracket]);
const CLOSERS = new Set([TokenType.RParen, TokenType.RBrace, TokenType.RBracket]);

// Lexer errors that more input can still fix
const INCOMPLETE =
    /^Unterminated (block comment|triple-quoted string|<[^>]+> block)$/;

/**
 * Interactive session over one persistent interpreter. Lines are buffered
 * until brackets balance, then evaluated as one entry.
 */
export class Repl {
    private interpreter: Interpreter;
    private output: OutputSink;
    private buffer: string[] = [];
    public finished = false;

    constructor(options: InterpreterOptions = {}) {
        this.output = options.output ?? processOutput;
        this.interpreter = new Interpreter({ file: "<repl>", ...options });
    }

    public get prompt(): string {
        return this.buffer.length > 0 ? "... " : ">>> ";
    }

    /**
     * Takes one line of input. Returns false once the session has ended.
     */
    public feed(line: string): boolean {
        if (this.buffer.length === 0 && /^\s*(exit|quit)\s*$/.test(line)) {
            this.finished = true;
            return false;
        }

        this.buffer.push(line);
        const source = this.buffer.join("\n");
        if (needsMoreInput(source)) return true;

        this.buffer = [];
        if (source.trim() !== "") this.evaluate(source);
        return true;
    }

    public evaluate(source: string): void {
        let ast: AST;
        try {
            ast = new Parser(new Lexer(source).tokenize(), source).parse();
        } catch (e) {
            if (!(e instanceof YpshError)) throw e;
            this.report(e.attach(undefined, source));
            return;
        }

        const completion = this.interpreter.run(ast, source);
        if (completion.kind === "error") {
            this.report(completion.error);
            return;
        }

        const last = ast.statements[ast.statements.length - 1];
        if (
            completion.kind === "normal" &&
            last?.kind === "ExpressionStatement" &&
            completion.value.type !== "none"
        ) {
            this.output.write(unify(completion.value) + "\n");
        }
    }

    private report(error: YpshError) {
        this.output.error(error.format() + "\n");
    }
}

/**
 * True while the source has an unclosed bracket, block comment, `"""`
 * string or foreign block.
 */
export function needsMoreInput(source: string): boolean {
    let tokens: Token[];
    try {
        tokens = new Lexer(source).tokenize();
    } catch (e) {
        if (e instanceof YpshError) return INCOMPLETE.test(e.rawMessage);
        throw e;
    }

    let depth = 0;
    for (const token of tokens) {
        if (OPENERS.has(token.type)) depth++;
        else if (CLOSERS.has(token.type)) depth--;
    }
    return depth > 0;
}

export function startRepl(options: InterpreterOptions = {}): Promise<void> {
    const repl = new Repl(options);
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: repl.prompt,
    });

    console.log(chalk.green("YPSH interactive shell. Type 'exit' to quit."));
    rl.prompt();

    return new Promise((resolve) => {
        rl.on("line", (line) => {
            if (!repl.feed(line)) {
                rl.close();
                return;
            }
            rl.setPrompt(repl.prompt);
            rl.prompt();
        });
        rl.on("close", () => resolve());
    });
}
