import { Lexer } from "../src/lexer/Lexer";
import { Parser } from "../src/parser/Parser";
import { Interpreter, InterpreterOptions } from "../src/interpreter/Interpreter";
import { Completion } from "../src/interpreter/Completion";
import {
    CommandResult,
    ICommandRunner,
} from "../src/orchestrator/container/IRuntimeContainer";
import { AST } from "../src/types/ast";
import { YpshError } from "../src/utils/Error";
import { OutputSink } from "../src/utils/output";

export interface CapturedOutput extends OutputSink {
    stdout: string;
    stderr: string;
}

export function captureOutput(): CapturedOutput {
    const captured: CapturedOutput = {
        stdout: "",
        stderr: "",
        write(text) {
            captured.stdout += text;
        },
        error(text) {
            captured.stderr += text;
        },
    };
    return captured;
}

/**
 * Command runner that records commands instead of spawning them.
 */
export class FakeRunner implements ICommandRunner {
    public commands: string[] = [];
    public cwd = "/work";

    constructor(
        private respond: (command: string) => Partial<CommandResult> = () => ({}),
    ) {}

    runCommand(command: string): CommandResult {
        this.commands.push(command);
        return { code: 0, stdout: "", stderr: "", ...this.respond(command) };
    }
}

export function parse(source: string): AST {
    return new Parser(new Lexer(source).tokenize(), source).parse();
}

export function execute(source: string, options: InterpreterOptions = {}) {
    const output = captureOutput();
    const interpreter = new Interpreter({
        commandRunner: new FakeRunner(),
        output,
        ...options,
    });
    const completion: Completion = interpreter.run(parse(source), source);
    return { interpreter, completion, output };
}

/** Runs a program that must succeed and returns what it printed. */
export function runOk(source: string, options: InterpreterOptions = {}): string {
    const { completion, output } = execute(source, options);
    if (completion.kind === "error") throw completion.error;
    return output.stdout;
}

/** Runs a program that must fail and returns the uncaught error. */
export function runError(
    source: string,
    options: InterpreterOptions = {},
): YpshError {
    const { completion } = execute(source, options);
    if (completion.kind !== "error") {
        throw new Error(`Expected an error, got '${completion.kind}'`);
    }
    return completion.error;
}

export function lines(...source: string[]): string {
    return source.join("\n");
}
